/**
 * Content Identity Store
 *
 * Fingerprints a loan's documents once, marks exact duplicates and answers
 * pairwise similarity queries for grouping.
 */

import { Logger, wrapError } from '@loanledger/core';
import type { DocumentRecord, FailureRecord, Fingerprint, LoanDocument } from '@loanledger/core';
import { fingerprint, isExactDuplicate, similarity } from './fingerprint.js';

export interface IdentityStoreOptions {
  logger?: Logger;
}

export interface RegistrationResult {
  /** One record per input document, sorted by id */
  records: DocumentRecord[];
  failures: FailureRecord[];
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class IdentityStore {
  private readonly fingerprints = new Map<string, Fingerprint>();
  private readonly logger: Logger;

  constructor(options: IdentityStoreOptions = {}) {
    this.logger = options.logger ?? Logger.silent();
  }

  /**
   * Fingerprint documents and classify their identity.
   *
   * Unfingerprintable documents are routed to manual review. Among exact
   * duplicates the lowest id is kept; the others are retained for audit but
   * skipped by every later stage.
   */
  register(documents: LoanDocument[]): RegistrationResult {
    const records: DocumentRecord[] = [];
    const failures: FailureRecord[] = [];
    const canonicalByHash = new Map<string, string>();

    const sorted = [...documents].sort((a, b) => compareIds(a.id, b.id));

    for (const document of sorted) {
      let print: Fingerprint;
      try {
        print = fingerprint(document);
      } catch (err) {
        const error = wrapError(err, 'FINGERPRINT_FAILURE', {
          loanId: document.loanId,
          documentId: document.id,
        });
        this.logger.warn('fingerprint failed', {
          documentId: document.id,
          code: error.code,
          error: error.message,
        });
        failures.push({
          stage: 'identity',
          code: error.code,
          message: error.message,
          documentId: document.id,
        });
        records.push({
          document,
          fingerprint: null,
          identityStatus: 'unfingerprintable',
          classificationStatus: 'skipped',
          reviewReason: error.message,
        });
        continue;
      }

      this.fingerprints.set(document.id, print);

      const canonical = print.exactHash ? canonicalByHash.get(print.exactHash) : undefined;
      if (canonical !== undefined) {
        this.logger.debug('exact duplicate', { documentId: document.id, duplicateOf: canonical });
        records.push({
          document,
          fingerprint: print,
          identityStatus: 'duplicate',
          duplicateOf: canonical,
          classificationStatus: 'skipped',
        });
        continue;
      }

      if (print.exactHash) {
        canonicalByHash.set(print.exactHash, document.id);
      }
      records.push({
        document,
        fingerprint: print,
        identityStatus: 'ok',
        classificationStatus: 'pending',
      });
    }

    return { records, failures };
  }

  fingerprintOf(documentId: string): Fingerprint | undefined {
    return this.fingerprints.get(documentId);
  }

  isExactDuplicate(a: string, b: string): boolean {
    const left = this.fingerprints.get(a);
    const right = this.fingerprints.get(b);
    return left !== undefined && right !== undefined && isExactDuplicate(left, right);
  }

  /** 0 when either document was never fingerprinted */
  similarity(a: string, b: string): number {
    const left = this.fingerprints.get(a);
    const right = this.fingerprints.get(b);
    if (left === undefined || right === undefined) return 0;
    return similarity(left, right);
  }
}
