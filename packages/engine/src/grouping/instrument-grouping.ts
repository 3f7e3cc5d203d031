/**
 * Instrument Grouping
 *
 * Clusters classified documents into instruments. Oracle grouping hints
 * always join documents; fingerprint similarity joins them unless the oracle
 * says otherwise, directly or through a set already carrying another hint.
 */

import { Logger } from '@loanledger/core';
import type { GroupingConflict, InstrumentGroup, OracleJudgment } from '@loanledger/core';
import { labelSimilarity, normalizeInstrumentType } from '@loanledger/identity';
import { UnionFind } from './union-find.js';

export interface GroupingCandidate {
  documentId: string;
  judgment: OracleJudgment;
}

export type SimilarityFn = (a: string, b: string) => number;

export interface GroupingOptions {
  similarityThreshold?: number;
  labelSimilarityThreshold?: number;
  logger?: Logger;
}

export interface GroupingResult {
  /** Ordered by smallest member id */
  groups: InstrumentGroup[];
  conflicts: GroupingConflict[];
}

interface Member {
  id: string;
  hint: string | undefined;
  instrumentType: string;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Most frequent type among members; ties go to the alphabetically first */
function dominantType(members: Member[]): string {
  const counts = new Map<string, number>();
  for (const member of members) {
    counts.set(member.instrumentType, (counts.get(member.instrumentType) ?? 0) + 1);
  }
  let best = '';
  let bestCount = 0;
  for (const [type, count] of [...counts.entries()].sort(([a], [b]) => compareStrings(a, b))) {
    if (count > bestCount) {
      best = type;
      bestCount = count;
    }
  }
  return best;
}

export function groupInstruments(
  loanId: string,
  candidates: GroupingCandidate[],
  similarity: SimilarityFn,
  options: GroupingOptions = {}
): GroupingResult {
  const threshold = options.similarityThreshold ?? 0.9;
  const labelThreshold = options.labelSimilarityThreshold ?? 0.85;
  const logger = options.logger ?? Logger.silent();

  const members: Member[] = candidates
    .map((c) => ({
      id: c.documentId,
      hint: c.judgment.groupingHint,
      instrumentType: normalizeInstrumentType(c.judgment.typeLabel),
    }))
    .sort((a, b) => compareStrings(a.id, b.id));

  const sets = new UnionFind(members.length);
  const conflicts: GroupingConflict[] = [];

  // Oracle hint edges
  const firstByHint = new Map<string, number>();
  members.forEach((member, index) => {
    if (!member.hint) return;
    const first = firstByHint.get(member.hint);
    if (first === undefined) {
      firstByHint.set(member.hint, index);
    } else {
      sets.union(first, index);
    }
  });

  // A set carries at most one hint; fingerprint edges must not merge two
  const hintByRoot = new Map<number, string>();
  for (const [hint, index] of firstByHint) {
    hintByRoot.set(sets.find(index), hint);
  }

  // Fingerprint edges, visited in sorted id order
  for (let i = 0; i < members.length; i++) {
    for (let j = i + 1; j < members.length; j++) {
      const a = members[i];
      const b = members[j];
      if (!a || !b) continue;

      const score = similarity(a.id, b.id);
      if (score < threshold) continue;

      const rootA = sets.find(i);
      const rootB = sets.find(j);
      if (rootA === rootB) continue;
      const hintA = hintByRoot.get(rootA);
      const hintB = hintByRoot.get(rootB);

      let conflict: GroupingConflict | null = null;
      if (hintA !== undefined && hintB !== undefined && hintA !== hintB) {
        conflict = {
          documentIds: [a.id, b.id],
          similarity: score,
          reason: 'hint_mismatch',
          detail: `grouping hints differ: ${hintA} / ${hintB}`,
        };
      } else {
        const labelScore = labelSimilarity(a.instrumentType, b.instrumentType);
        if (labelScore < labelThreshold) {
          conflict = {
            documentIds: [a.id, b.id],
            similarity: score,
            reason: 'type_mismatch',
            detail: `instrument types differ: ${a.instrumentType} / ${b.instrumentType}`,
          };
        }
      }

      if (conflict) {
        logger.warn('grouping_conflict', {
          loanId,
          documentIds: conflict.documentIds,
          similarity: score,
          reason: conflict.reason,
        });
        conflicts.push(conflict);
        continue;
      }

      sets.union(i, j);
      const hint = hintA ?? hintB;
      if (hint !== undefined) hintByRoot.set(sets.find(i), hint);
    }
  }

  const byRoot = new Map<number, Member[]>();
  members.forEach((member, index) => {
    const root = sets.find(index);
    const list = byRoot.get(root) ?? [];
    list.push(member);
    byRoot.set(root, list);
  });

  const groups = [...byRoot.values()].map((cluster): InstrumentGroup => {
    const hints = cluster
      .map((m) => m.hint)
      .filter((h): h is string => h !== undefined && h.length > 0)
      .sort(compareStrings);
    const smallestHint = hints[0];
    const documentIds = cluster.map((m) => m.id);
    const firstId = documentIds[0] ?? '';

    return {
      groupKey: smallestHint !== undefined ? `hint:${smallestHint}` : `fp:${firstId}`,
      loanId,
      documentIds,
      instrumentType: dominantType(cluster),
      keySource: smallestHint !== undefined ? 'oracle' : 'fingerprint',
      status: 'unresolved',
      versions: [],
      masterDocumentId: null,
    };
  });

  groups.sort((a, b) => compareStrings(a.documentIds[0] ?? '', b.documentIds[0] ?? ''));

  return { groups, conflicts };
}
