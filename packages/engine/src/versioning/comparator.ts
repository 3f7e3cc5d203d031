/**
 * Composite version comparator
 *
 * Ranks drafts of one instrument. Criteria apply in the configured order;
 * the document id always breaks remaining ties so the order is total.
 */

import { EngineError } from '@loanledger/core';
import type { FinalityIndicator, VersionCriterion } from '@loanledger/core';
import type { VersionPrecedenceConfig } from '../settings.js';

export interface VersionCandidate {
  documentId: string;
  finality: FinalityIndicator;
  hasSignature?: boolean;
  /** ISO date */
  documentDate?: string;
  pageCount: number;
}

export interface VersionComparison {
  /** Negative when `a` ranks before `b` */
  order: number;
  decidedBy: VersionCriterion | 'documentId';
}

export const VERSION_CRITERIA: readonly VersionCriterion[] = [
  'finality',
  'signature',
  'documentDate',
  'pageCount',
];

export const DEFAULT_VERSION_PRECEDENCE: VersionCriterion[] = [...VERSION_CRITERIA];

const FINALITY_RANK: Record<FinalityIndicator, number> = {
  final: 3,
  preliminary: 2,
  initial: 1,
  unknown: 0,
};

function compareCriterion(
  criterion: VersionCriterion,
  a: VersionCandidate,
  b: VersionCandidate
): number {
  switch (criterion) {
    case 'finality':
      return FINALITY_RANK[b.finality] - FINALITY_RANK[a.finality];
    case 'signature':
      return (b.hasSignature === true ? 1 : 0) - (a.hasSignature === true ? 1 : 0);
    case 'documentDate': {
      if (a.documentDate === b.documentDate) return 0;
      if (a.documentDate === undefined) return 1;
      if (b.documentDate === undefined) return -1;
      return a.documentDate > b.documentDate ? -1 : 1;
    }
    case 'pageCount':
      return b.pageCount - a.pageCount;
  }
}

export function compareVersions(
  a: VersionCandidate,
  b: VersionCandidate,
  precedence: readonly VersionCriterion[] = DEFAULT_VERSION_PRECEDENCE
): VersionComparison {
  for (const criterion of precedence) {
    const order = compareCriterion(criterion, a, b);
    if (order !== 0) return { order, decidedBy: criterion };
  }
  const order = a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0;
  return { order, decidedBy: 'documentId' };
}

/**
 * @throws EngineError INVALID_CONFIG on unknown or repeated criteria
 */
export function validatePrecedence(criteria: readonly string[]): VersionCriterion[] {
  const seen = new Set<VersionCriterion>();
  for (const name of criteria) {
    const criterion = VERSION_CRITERIA.find((c) => c === name);
    if (criterion === undefined) {
      throw new EngineError({
        code: 'INVALID_CONFIG',
        message: `Unknown version criterion: ${name}`,
        suggestion: `Use any of: ${VERSION_CRITERIA.join(', ')}`,
      });
    }
    if (seen.has(criterion)) {
      throw new EngineError({
        code: 'INVALID_CONFIG',
        message: `Version criterion listed twice: ${name}`,
      });
    }
    seen.add(criterion);
  }
  return [...seen];
}

export function precedenceFor(
  instrumentType: string,
  config: VersionPrecedenceConfig = {}
): VersionCriterion[] {
  return (
    config.byInstrumentType?.[instrumentType] ?? config.default ?? DEFAULT_VERSION_PRECEDENCE
  );
}
