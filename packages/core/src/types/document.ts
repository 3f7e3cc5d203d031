/**
 * Document Types
 *
 * Raw documents as handed over by ingestion, and the engine's per-document record.
 */

import type { OracleJudgment } from './oracle.js';

/** Perceptual hashes computed by ingestion from the first page image */
export interface VisualHashes {
  phash?: string;
  dhash?: string;
  ahash?: string;
}

/**
 * Immutable raw document. Owned by ingestion; read-only to the engine.
 */
export interface LoanDocument {
  /** Document ID (unique within the loan) */
  id: string;
  /** Loan the document belongs to */
  loanId: string;
  /** Number of pages */
  pageCount: number;
  /** Original file name (informational) */
  fileName?: string;
  /** Extracted text layer, if any */
  content?: string;
  /** Ingestion-supplied SHA-256 of the document content (hex) */
  exactHash?: string;
  /** Ingestion-supplied perceptual hashes (hex) */
  visualHashes?: VisualHashes;
}

/** Kinds of perceptual hash the identity store compares */
export type PerceptualHashKind = 'phash' | 'dhash' | 'ahash' | 'simhash';

export type PerceptualHash = Partial<Record<PerceptualHashKind, string>>;

export interface Fingerprint {
  exactHash: string | null;
  perceptualHash: PerceptualHash;
}

/** Outcome of the content identity stage */
export type IdentityStatus = 'ok' | 'duplicate' | 'unfingerprintable';

/** Outcome of the classification stage */
export type ClassificationStatus = 'pending' | 'classified' | 'needs_review' | 'skipped';

/**
 * Engine-side view of a document after fingerprinting and classification.
 */
export interface DocumentRecord {
  document: LoanDocument;
  fingerprint: Fingerprint | null;
  identityStatus: IdentityStatus;
  /** Set when identityStatus is 'duplicate' */
  duplicateOf?: string;
  classificationStatus: ClassificationStatus;
  judgment?: OracleJudgment;
  /** Why the document needs manual review */
  reviewReason?: string;
}
