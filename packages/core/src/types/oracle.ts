/**
 * Oracle Types
 *
 * Contract of the external classification/extraction service.
 */

import type { LoanDocument } from './document.js';
import type { StructuredFields } from './field-value.js';

export type FinalityIndicator = 'final' | 'preliminary' | 'initial' | 'unknown';

/**
 * Validated oracle judgment for one document
 */
export interface OracleJudgment {
  /** Coarse type label as returned by the oracle */
  typeLabel: string;
  /** Optional hint that documents sharing it are drafts of one instrument */
  groupingHint?: string;
  finalityIndicator: FinalityIndicator;
  hasSignature?: boolean;
  /** ISO date (YYYY-MM-DD) */
  documentDate?: string;
  structuredFields: StructuredFields;
}

/** Request sent to the oracle */
export type OracleRequest = Pick<
  LoanDocument,
  'id' | 'loanId' | 'pageCount' | 'fileName' | 'content'
>;

/**
 * External classification oracle. Returns untyped JSON; callers validate it.
 */
export interface ClassificationOracle {
  classify(request: OracleRequest, signal?: AbortSignal): Promise<unknown>;
}
