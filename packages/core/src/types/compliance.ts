/**
 * Compliance Types
 *
 * Declarative rule definitions and append-only rule results.
 */

import type { CalculationStep, VerificationStatus } from './provenance.js';
import type { SourceTier } from './reconciliation.js';

export type RuleCategory = 'TILA' | 'RESPA' | 'ATR_QM' | 'HPML' | 'STATE' | 'DATA_INTEGRITY';

export type Severity = 'Critical' | 'High' | 'Medium' | 'Low' | 'Info';

export type ComplianceStatus = 'PASS' | 'FAIL' | 'WARNING' | 'NA' | 'ERROR' | 'PENDING_REVIEW';

export type ComparisonOperator = '<' | '<=' | '>' | '>=' | '==' | '!=';

/** Value a rule reads */
export type Operand =
  | { attribute: string }
  | { calculation: string }
  | { value: number };

export type RuleLogic =
  | {
      kind: 'threshold';
      operand: Operand;
      operator: ComparisonOperator;
      value: number;
      /** Passing values within this distance of the limit yield WARNING */
      warnMargin?: number;
    }
  | {
      kind: 'ratio';
      numerator: Operand;
      denominator: Operand;
      /** Multiplier applied to the ratio (100 for percentages) */
      scale?: number;
      operator: ComparisonOperator;
      value: number;
      warnMargin?: number;
    }
  | {
      kind: 'tolerance';
      left: Operand;
      right: Operand;
      tolerance: number;
      /** Differences above tolerance but within this yield WARNING */
      warnTolerance?: number;
    }
  | {
      kind: 'date_window';
      from: { attribute: string };
      to: { attribute: string };
      minDays?: number;
      maxDays?: number;
    }
  | { kind: 'verification'; attribute: string }
  | { kind: 'all'; conditions: RuleLogic[] }
  | { kind: 'manual'; instructions?: string };

export interface RuleApplicability {
  /** Loan types the rule applies to; all when absent */
  loanTypes?: string[];
  /** Property states the rule applies to; all when absent */
  states?: string[];
  excludedStates?: string[];
}

/**
 * Immutable, externally curated rule definition
 */
export interface ComplianceRule {
  code: string;
  name: string;
  category: RuleCategory;
  severity: Severity;
  applicability: RuleApplicability;
  /** ISO date the rule takes effect */
  effectiveFrom: string;
  /** ISO date after which the rule no longer applies */
  effectiveTo?: string;
  logic: RuleLogic;
  requiresManualReview: boolean;
  /** Fallback-sourced inputs send the rule to review */
  requirePrimarySource?: boolean;
  regulationReference?: string;
  remediation?: string;
}

/**
 * Loan facts used for rule applicability
 */
export interface LoanProfile {
  loanId: string;
  loanType?: string;
  propertyState?: string;
  /** ISO date */
  applicationDate?: string;
}

export interface EvidenceDocument {
  documentId: string;
  page: number | null;
  label: string;
}

export interface EvidenceValue {
  name: string;
  value: string | number | boolean;
  unit?: string;
  sourceDocumentId: string | null;
  sourcePage: number | null;
  sourceTier: SourceTier | 'calculated' | null;
}

export interface EvidenceCalculation {
  attributeName: string;
  derivedValue: number | null;
  verification: VerificationStatus;
  steps: CalculationStep[];
}

export interface EvidenceBundle {
  documents: EvidenceDocument[];
  values: EvidenceValue[];
  calculations: EvidenceCalculation[];
  rationale: string;
  /** True when the bundle could not cite every input */
  partial: boolean;
}

/**
 * Result of one rule for one loan in one execution. Never mutated.
 */
export interface ComplianceResult {
  resultId: string;
  loanId: string;
  executionId: string;
  ruleCode: string;
  ruleName: string;
  category: RuleCategory;
  severity: Severity;
  status: ComplianceStatus;
  message: string;
  expectedValue: string | null;
  actualValue: string | null;
  variance: string | null;
  evidence: EvidenceBundle | null;
  manualReview: boolean;
  regulationReference?: string;
  checkedAt: Date;
}

export interface ComplianceSummary {
  total: number;
  passed: number;
  failed: number;
  warnings: number;
  notApplicable: number;
  errors: number;
  pendingReview: number;
  manualReview: number;
}

export interface ComplianceReport {
  loanId: string;
  executionId: string;
  executedAt: Date;
  overallStatus: Exclude<ComplianceStatus, 'NA' | 'ERROR'>;
  summary: ComplianceSummary;
  results: ComplianceResult[];
}
