/**
 * Document fingerprints
 *
 * Exact hashes identify byte-identical content; perceptual hashes let
 * near-identical scans of the same page match.
 */

import { createHash } from 'node:crypto';
import { EngineError } from '@loanledger/core';
import type {
  Fingerprint,
  LoanDocument,
  PerceptualHash,
  PerceptualHashKind,
} from '@loanledger/core';
import { hammingDistance, isHex } from './hashing/hamming.js';
import { simhash } from './hashing/simhash.js';

/** Text layers shorter than this are treated as scans without text */
export const MIN_TEXT_LENGTH = 50;

export const PERCEPTUAL_HASH_KINDS: readonly PerceptualHashKind[] = [
  'ahash',
  'dhash',
  'phash',
  'simhash',
];

const SHA256_HEX_LENGTH = 64;

export function normalizeContent(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function fingerprintFailure(document: LoanDocument, message: string): EngineError {
  return new EngineError({
    code: 'FINGERPRINT_FAILURE',
    message,
    suggestion: 'Re-ingest the document or review it manually.',
    context: { loanId: document.loanId, documentId: document.id },
  });
}

function suppliedExactHash(document: LoanDocument): string | null {
  if (document.exactHash === undefined) return null;
  const hash = document.exactHash.trim().toLowerCase();
  if (hash.length !== SHA256_HEX_LENGTH || !isHex(hash)) {
    throw fingerprintFailure(document, `Malformed exact hash for document ${document.id}`);
  }
  return hash;
}

function suppliedVisualHashes(document: LoanDocument): PerceptualHash {
  const out: PerceptualHash = {};
  const visual = document.visualHashes;
  if (!visual) return out;

  for (const kind of ['ahash', 'dhash', 'phash'] as const) {
    const raw = visual[kind];
    if (raw === undefined) continue;
    const hash = raw.trim().toLowerCase();
    if (hash.length === 0 || !isHex(hash)) {
      throw fingerprintFailure(document, `Malformed ${kind} for document ${document.id}`);
    }
    out[kind] = hash;
  }
  return out;
}

/**
 * Compute the fingerprint of a document.
 *
 * @throws EngineError FINGERPRINT_FAILURE when no hash can be produced or a
 * supplied hash is malformed
 */
export function fingerprint(document: LoanDocument): Fingerprint {
  const text = document.content ? normalizeContent(document.content) : '';
  const hasText = text.length >= MIN_TEXT_LENGTH;

  let exactHash = suppliedExactHash(document);
  if (exactHash === null && hasText) {
    exactHash = createHash('sha256').update(text, 'utf8').digest('hex');
  }

  const perceptualHash = suppliedVisualHashes(document);
  if (hasText) {
    const textHash = simhash(text);
    if (textHash) perceptualHash.simhash = textHash;
  }

  if (exactHash === null && Object.keys(perceptualHash).length === 0) {
    throw fingerprintFailure(
      document,
      `Document ${document.id} has no usable content or hashes`
    );
  }

  return { exactHash, perceptualHash };
}

export function isExactDuplicate(a: Fingerprint, b: Fingerprint): boolean {
  return a.exactHash !== null && a.exactHash === b.exactHash;
}

/**
 * Similarity in [0, 1]: mean of 1 - hamming/bits over the hash kinds both
 * fingerprints carry at equal length. Exact duplicates score 1; fingerprints
 * with nothing comparable score 0.
 */
export function similarity(a: Fingerprint, b: Fingerprint): number {
  if (isExactDuplicate(a, b)) return 1;

  let total = 0;
  let compared = 0;
  for (const kind of PERCEPTUAL_HASH_KINDS) {
    const left = a.perceptualHash[kind];
    const right = b.perceptualHash[kind];
    if (left === undefined || right === undefined) continue;

    const distance = hammingDistance(left, right);
    if (distance === null) continue;

    total += 1 - distance / (left.length * 4);
    compared++;
  }

  return compared === 0 ? 0 : total / compared;
}
