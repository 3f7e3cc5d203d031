import { createHash } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { EngineError } from '@loanledger/core';
import type { Fingerprint, LoanDocument } from '@loanledger/core';
import { fingerprint, isExactDuplicate, similarity } from '../src/fingerprint.js';

const TEXT = 'Uniform Underwriting and Transmittal Summary for loan 1001, borrower Jane Example';

function doc(id: string, extra: Partial<LoanDocument> = {}): LoanDocument {
  return { id, loanId: 'L1', pageCount: 3, ...extra };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof EngineError ? err.code : 'not-an-engine-error';
  }
  return undefined;
}

describe('fingerprint', () => {
  it('hashes whitespace-normalized text content', () => {
    const a = fingerprint(doc('a', { content: TEXT }));
    const b = fingerprint(doc('b', { content: `  ${TEXT.replace(/ /g, '\n\t ')}  ` }));

    expect(a.exactHash).toBe(createHash('sha256').update(TEXT, 'utf8').digest('hex'));
    expect(b.exactHash).toBe(a.exactHash);
    expect(a.perceptualHash.simhash).toMatch(/^[0-9a-f]{16}$/);
  });

  it('prefers ingestion-supplied hashes', () => {
    const supplied = 'A'.repeat(64);
    const print = fingerprint(
      doc('a', { exactHash: supplied, visualHashes: { phash: 'FFFF0000FFFF0000' } })
    );
    expect(print).toEqual({
      exactHash: 'a'.repeat(64),
      perceptualHash: { phash: 'ffff0000ffff0000' },
    });
  });

  it('skips short text layers', () => {
    const print = fingerprint(doc('a', { content: 'page 1', visualHashes: { dhash: '00ff' } }));
    expect(print).toEqual({ exactHash: null, perceptualHash: { dhash: '00ff' } });
  });

  it('fails when nothing can be hashed', () => {
    expect(codeOf(() => fingerprint(doc('a', { content: 'scan' })))).toBe('FINGERPRINT_FAILURE');
  });

  it('fails on malformed supplied hashes', () => {
    expect(codeOf(() => fingerprint(doc('a', { exactHash: 'xyz' })))).toBe('FINGERPRINT_FAILURE');
    expect(
      codeOf(() => fingerprint(doc('a', { content: TEXT, visualHashes: { ahash: 'not-hex' } })))
    ).toBe('FINGERPRINT_FAILURE');
  });
});

describe('similarity', () => {
  const base: Fingerprint = {
    exactHash: null,
    perceptualHash: { phash: 'ffffffffffffffff', dhash: '0000000000000000' },
  };

  it('averages over shared hash kinds', () => {
    const other: Fingerprint = {
      exactHash: null,
      perceptualHash: { phash: 'fffffffffffffff0', dhash: 'ff00000000000000', ahash: '00' },
    };
    expect(similarity(base, other)).toBe(0.90625);
  });

  it('is 1 for exact duplicates', () => {
    const a: Fingerprint = { exactHash: 'ab'.repeat(32), perceptualHash: {} };
    const b: Fingerprint = { exactHash: 'ab'.repeat(32), perceptualHash: {} };
    expect(isExactDuplicate(a, b)).toBe(true);
    expect(similarity(a, b)).toBe(1);
  });

  it('is 0 when nothing is comparable', () => {
    const other: Fingerprint = { exactHash: null, perceptualHash: { phash: 'ffff' } };
    expect(similarity(base, other)).toBe(0);
    expect(isExactDuplicate(base, other)).toBe(false);
  });
});
