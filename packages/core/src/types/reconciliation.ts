/**
 * Reconciliation Types
 *
 * Instrument groups, version records and reconciled attributes.
 */

import type { PresentFieldValue } from './field-value.js';

export type GroupStatus = 'unresolved' | 'resolved';

export type VersionRole = 'master' | 'superseded' | 'unique';

/** Criteria the version comparator can rank on (document id is always last) */
export type VersionCriterion = 'finality' | 'signature' | 'documentDate' | 'pageCount';

/**
 * Position of one document within its group
 */
export interface VersionRecord {
  documentId: string;
  /** 0 = master; strict total order within the group */
  rank: number;
  role: VersionRole;
  /** Criterion that ranked this document below its predecessor */
  decidedBy?: VersionCriterion | 'documentId';
  /** True when only the document id separated it from its predecessor */
  arbitraryTiebreak: boolean;
}

/**
 * Documents believed to be drafts of one logical instrument
 */
export interface InstrumentGroup {
  groupKey: string;
  loanId: string;
  /** Member document ids, sorted */
  documentIds: string[];
  /** Normalized instrument type of the group */
  instrumentType: string;
  keySource: 'oracle' | 'fingerprint';
  status: GroupStatus;
  /** Populated once resolved */
  versions: VersionRecord[];
  masterDocumentId: string | null;
}

/**
 * A fingerprint edge the oracle overruled
 */
export interface GroupingConflict {
  documentIds: [string, string];
  similarity: number;
  reason: 'hint_mismatch' | 'type_mismatch';
  detail: string;
}

export type SourceTier = 'primary' | 'fallback' | 'manual';

/**
 * Reconciled loan attribute.
 *
 * Sourced attributes always carry a document reference; unsourced ones have a null value.
 */
export type Attribute =
  | {
      name: string;
      status: 'sourced';
      value: PresentFieldValue;
      unit?: string;
      sourceDocumentId: string;
      sourcePage: number | null;
      sourceTier: SourceTier;
      sourceInstrumentType: string | null;
      /** Index in the fallback chain; chain length for manual entries */
      tierIndex: number;
      /** Field name the value was read from */
      sourceField: string;
    }
  | {
      name: string;
      status: 'unsourced';
      value: null;
      unit?: string;
      sourceDocumentId: null;
      sourcePage: null;
      sourceTier: null;
      sourceInstrumentType: null;
      tierIndex: null;
      sourceField: null;
    };

/**
 * Configured loan attribute
 */
export interface AttributeDefinition {
  name: string;
  unit?: string;
  /** Field names to look for in oracle payloads (defaults to [name]) */
  fields?: string[];
  /** Overrides the default fallback chain */
  chain?: string[];
}

/**
 * Value entered by a reviewer, citing the document it was read from
 */
export interface ManualEntry {
  attributeName: string;
  value: PresentFieldValue;
  documentId: string;
  page: number;
  enteredBy: string;
}
