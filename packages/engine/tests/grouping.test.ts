import { describe, expect, it, vi } from 'vitest';
import { Logger } from '@loanledger/core';
import { groupInstruments } from '../src/grouping/instrument-grouping.js';
import type { GroupingCandidate } from '../src/grouping/instrument-grouping.js';
import { UnionFind } from '../src/grouping/union-find.js';
import { judgment } from './fixtures.js';

function similarityTable(scores: Record<string, number>): (a: string, b: string) => number {
  return (a, b) => scores[[a, b].sort().join('|')] ?? 0;
}

describe('UnionFind', () => {
  it('merges sets and reports connectivity', () => {
    const sets = new UnionFind(4);
    expect(sets.union(0, 1)).toBe(true);
    expect(sets.union(2, 3)).toBe(true);
    expect(sets.connected(0, 2)).toBe(false);
    expect(sets.union(1, 3)).toBe(true);
    expect(sets.union(0, 2)).toBe(false);
    expect(sets.connected(0, 3)).toBe(true);
  });
});

describe('groupInstruments', () => {
  const candidates: GroupingCandidate[] = [
    { documentId: 'd1', judgment: judgment('Loan Estimate', {}, { groupingHint: 'LE' }) },
    { documentId: 'd2', judgment: judgment('Loan Estimate', {}, { groupingHint: 'LE' }) },
    { documentId: 'd3', judgment: judgment('Closing Disclosure') },
    { documentId: 'd4', judgment: judgment('Loan Estimate') },
  ];
  const similarity = similarityTable({ 'd1|d4': 0.92, 'd3|d4': 0.95 });

  it('joins hinted documents and similar documents of the same type', () => {
    const { groups } = groupInstruments('L1', candidates, similarity);

    expect(groups.map((g) => [g.groupKey, g.documentIds, g.instrumentType, g.keySource])).toEqual([
      ['hint:LE', ['d1', 'd2', 'd4'], 'loan_estimate', 'oracle'],
      ['fp:d3', ['d3'], 'closing_disclosure', 'fingerprint'],
    ]);
    expect(groups.every((g) => g.status === 'unresolved' && g.masterDocumentId === null)).toBe(true);
  });

  it('lets the oracle type veto a fingerprint edge and logs the conflict', () => {
    const logger = new Logger({ level: 'warn' });
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);

    const { conflicts } = groupInstruments('L1', candidates, similarity, { logger });

    expect(conflicts).toEqual([
      {
        documentIds: ['d3', 'd4'],
        similarity: 0.95,
        reason: 'type_mismatch',
        detail: 'instrument types differ: closing_disclosure / loan_estimate',
      },
    ]);
    expect(warn).toHaveBeenCalledWith('grouping_conflict', {
      loanId: 'L1',
      documentIds: ['d3', 'd4'],
      similarity: 0.95,
      reason: 'type_mismatch',
    });
  });

  it('keeps documents with different hints apart however similar they are', () => {
    const { groups, conflicts } = groupInstruments(
      'L1',
      [
        { documentId: 'a', judgment: judgment('Loan Estimate', {}, { groupingHint: 'LE-1' }) },
        { documentId: 'b', judgment: judgment('Loan Estimate', {}, { groupingHint: 'LE-2' }) },
      ],
      () => 0.99
    );

    expect(groups.map((g) => g.groupKey)).toEqual(['hint:LE-1', 'hint:LE-2']);
    expect(conflicts.map((c) => c.reason)).toEqual(['hint_mismatch']);
  });

  it('does not bridge two hinted instruments through an unhinted look-alike', () => {
    const { groups, conflicts } = groupInstruments(
      'L1',
      [
        { documentId: 'a', judgment: judgment('Loan Estimate', {}, { groupingHint: 'LE-1' }) },
        { documentId: 'b', judgment: judgment('Loan Estimate', {}, { groupingHint: 'LE-2' }) },
        { documentId: 'c', judgment: judgment('Loan Estimate') },
      ],
      similarityTable({ 'a|c': 0.95, 'b|c': 0.95 })
    );

    expect(groups.map((g) => [g.groupKey, g.documentIds])).toEqual([
      ['hint:LE-1', ['a', 'c']],
      ['hint:LE-2', ['b']],
    ]);
    expect(conflicts).toEqual([
      {
        documentIds: ['b', 'c'],
        similarity: 0.95,
        reason: 'hint_mismatch',
        detail: 'grouping hints differ: LE-2 / LE-1',
      },
    ]);
  });

  it('gives the same groups for any input order', () => {
    const forward = groupInstruments('L1', candidates, similarity);
    const reversed = groupInstruments('L1', [...candidates].reverse(), similarity);
    expect(reversed).toEqual(forward);
  });

  it('ignores edges below the similarity threshold', () => {
    const { groups } = groupInstruments('L1', candidates, similarity, { similarityThreshold: 0.93 });
    expect(groups.map((g) => g.documentIds)).toEqual([['d1', 'd2'], ['d3'], ['d4']]);
  });
});
