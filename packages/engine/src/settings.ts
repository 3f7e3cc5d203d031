/**
 * Engine settings and their defaults
 */

import type { AttributeDefinition, ToleranceConfig, VersionCriterion } from '@loanledger/core';
import type { RetryConfig } from './runtime/retry.js';
import { validatePrecedence } from './versioning/comparator.js';

export interface VersionPrecedenceConfig {
  /** Criteria order for every instrument type without an override */
  default?: VersionCriterion[];
  byInstrumentType?: Record<string, VersionCriterion[]>;
}

export interface OracleSettings {
  timeoutMs: number;
  maxConcurrency: number;
  retry: RetryConfig;
}

export interface EngineSettings {
  /** Fingerprint similarity at or above which two documents are grouped */
  similarityThreshold: number;
  /** Type labels less similar than this veto a fingerprint edge */
  labelSimilarityThreshold: number;
  fallbackChain: string[];
  attributes: AttributeDefinition[];
  tolerance: ToleranceConfig;
  versionPrecedence: VersionPrecedenceConfig;
  ruleConcurrency: number;
  oracle: OracleSettings;
}

export const DEFAULT_FALLBACK_CHAIN = [
  'transmittal_summary',
  'application_form',
  'non_standard_application',
];

export const DEFAULT_TOLERANCE: ToleranceConfig = { epsAbs: 0.1, epsPct: 0.5 };

export const DEFAULT_ORACLE_SETTINGS: OracleSettings = {
  timeoutMs: 60_000,
  maxConcurrency: 8,
  retry: { attempts: 3, baseDelayMs: 200, maxDelayMs: 5000, jitter: 0.2 },
};

export const DEFAULT_ATTRIBUTES: AttributeDefinition[] = [
  { name: 'loan_amount', unit: 'USD', fields: ['loan_amount', 'loan_amt', 'base_loan_amount'] },
  { name: 'note_rate', unit: '%', fields: ['note_rate', 'interest_rate'] },
  { name: 'loan_term_months', unit: 'months', fields: ['loan_term_months', 'loan_term'] },
  { name: 'loan_type', fields: ['loan_type'] },
  { name: 'loan_purpose', fields: ['loan_purpose'] },
  { name: 'property_state', fields: ['property_state', 'state'] },
  { name: 'application_date', fields: ['application_date'] },
  { name: 'appraised_value', unit: 'USD', fields: ['appraised_value', 'property_value'] },
  { name: 'monthly_income', unit: 'USD', fields: ['monthly_income', 'total_monthly_income'] },
  { name: 'monthly_debt', unit: 'USD', fields: ['monthly_debt', 'total_monthly_debt'] },
  { name: 'housing_payment', unit: 'USD', fields: ['housing_payment', 'proposed_housing_payment'] },
  { name: 'dti_ratio', unit: '%', fields: ['dti_ratio', 'total_dti', 'back_end_ratio'] },
  { name: 'ltv_ratio', unit: '%', fields: ['ltv_ratio', 'ltv'] },
  { name: 'cltv_ratio', unit: '%', fields: ['cltv_ratio', 'cltv'] },
  {
    name: 'apr',
    unit: '%',
    fields: ['apr', 'annual_percentage_rate'],
    chain: ['closing_disclosure', 'loan_estimate'],
  },
  {
    name: 'finance_charge',
    unit: 'USD',
    fields: ['finance_charge'],
    chain: ['closing_disclosure', 'loan_estimate'],
  },
  {
    name: 'points_and_fees',
    unit: 'USD',
    fields: ['points_and_fees', 'total_points_and_fees'],
    chain: ['closing_disclosure', 'loan_estimate'],
  },
  {
    name: 'le_delivery_date',
    fields: ['issue_date', 'date_issued'],
    chain: ['loan_estimate'],
  },
  {
    name: 'cd_delivery_date',
    fields: ['issue_date', 'date_issued'],
    chain: ['closing_disclosure'],
  },
  {
    name: 'closing_date',
    fields: ['closing_date'],
    chain: ['closing_disclosure', 'transmittal_summary'],
  },
];

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  similarityThreshold: 0.9,
  labelSimilarityThreshold: 0.85,
  fallbackChain: DEFAULT_FALLBACK_CHAIN,
  attributes: DEFAULT_ATTRIBUTES,
  tolerance: DEFAULT_TOLERANCE,
  versionPrecedence: {},
  ruleConcurrency: 8,
  oracle: DEFAULT_ORACLE_SETTINGS,
};

function checkPrecedence(config: VersionPrecedenceConfig = {}): VersionPrecedenceConfig {
  const byInstrumentType = config.byInstrumentType;
  return {
    ...(config.default ? { default: validatePrecedence(config.default) } : {}),
    ...(byInstrumentType
      ? {
          byInstrumentType: Object.fromEntries(
            Object.entries(byInstrumentType).map(([type, criteria]) => [type, validatePrecedence(criteria)])
          ),
        }
      : {}),
  };
}

/**
 * Merge partial settings over the defaults
 *
 * @throws EngineError INVALID_CONFIG when a version precedence names an unknown
 * or repeated criterion
 */
export function resolveEngineSettings(partial: Partial<EngineSettings> = {}): EngineSettings {
  return {
    ...DEFAULT_ENGINE_SETTINGS,
    ...partial,
    versionPrecedence: checkPrecedence(partial.versionPrecedence),
    tolerance: { ...DEFAULT_TOLERANCE, ...(partial.tolerance ?? {}) },
    oracle: {
      ...DEFAULT_ORACLE_SETTINGS,
      ...(partial.oracle ?? {}),
      retry: { ...DEFAULT_ORACLE_SETTINGS.retry, ...(partial.oracle?.retry ?? {}) },
    },
  };
}
