/**
 * Provenance Types
 *
 * Calculation steps and per-attribute derivation traces.
 */

import type { FailureRecord } from './failure.js';

export type StepKind = 'source' | 'formula' | 'adjustment';

export type FormulaName =
  | 'sum'
  | 'subtract'
  | 'multiply'
  | 'divide'
  | 'percentage'
  | 'normalize_period';

export type Period = 'annual' | 'monthly' | 'biweekly' | 'weekly';

/**
 * Where a source step reads its value from
 */
export type SourceLocator =
  | { documentId: string; field: string; page?: number }
  | { instrumentType: string; field: string };

export type DerivationStepSpec =
  | {
      id: string;
      kind: 'source';
      description: string;
      from: SourceLocator;
      rationale?: string;
    }
  | {
      id: string;
      kind: 'formula';
      description: string;
      formula: FormulaName;
      inputs: string[];
      /** For 'percentage' */
      percent?: number;
      /** For 'normalize_period' */
      fromPeriod?: Period;
      toPeriod?: Period;
      rationale?: string;
    }
  | {
      id: string;
      kind: 'adjustment';
      description: string;
      input: string;
      factor: number;
      rationale: string;
    };

/**
 * Declarative recipe deriving one attribute
 */
export interface DerivationRecipe {
  attributeName: string;
  steps: DerivationStepSpec[];
}

/**
 * Node of a provenance DAG
 */
export interface CalculationStep {
  id: string;
  /** Topological position, starting at 1 */
  order: number;
  kind: StepKind;
  description: string;
  value: number;
  documentId?: string;
  page?: number;
  formula?: string;
  rationale?: string;
  parentIds: string[];
}

export type VerificationStatus =
  | 'MATCH'
  | 'MINOR_VARIANCE'
  | 'MISMATCH'
  | 'UNVERIFIABLE'
  | 'VERIFICATION_ERROR';

export interface ToleranceConfig {
  /** Absolute tolerance (e.g. 0.10 dollars) */
  epsAbs: number;
  /** Relative tolerance in percent (e.g. 0.5 = 0.5%) */
  epsPct: number;
}

export interface VerificationOutcome {
  status: VerificationStatus;
  absoluteDifference?: number;
  variancePct?: number;
}

export interface CalculationTrace {
  loanId: string;
  attributeName: string;
  steps: CalculationStep[];
  terminalStepId: string | null;
  derivedValue: number | null;
  expectedValue: number | null;
  verification: VerificationOutcome;
  error?: FailureRecord;
}
