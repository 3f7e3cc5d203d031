import type { DocumentRecord, InstrumentGroup, StructuredFields } from '@loanledger/core';
import type { VersionPrecedenceConfig } from '../settings.js';
import { compareVersions, precedenceFor } from '../versioning/comparator.js';
import type { VersionCandidate } from '../versioning/comparator.js';

/** Authoritative document of one instrument type */
export interface MasterSource {
  instrumentType: string;
  groupKey: string;
  documentId: string;
  pageCount: number;
  fields: StructuredFields;
}

export function toVersionCandidate(record: DocumentRecord): VersionCandidate {
  const judgment = record.judgment;
  return {
    documentId: record.document.id,
    finality: judgment?.finalityIndicator ?? 'unknown',
    hasSignature: judgment?.hasSignature,
    documentDate: judgment?.documentDate,
    pageCount: record.document.pageCount,
  };
}

/**
 * Pick one master per instrument type. When several resolved groups share a
 * type, the group whose master wins the version comparator supplies it.
 */
export function selectMasters(
  groups: InstrumentGroup[],
  documents: ReadonlyMap<string, DocumentRecord>,
  precedence: VersionPrecedenceConfig = {}
): Map<string, MasterSource> {
  const best = new Map<string, { source: MasterSource; candidate: VersionCandidate }>();

  for (const group of groups) {
    if (group.status !== 'resolved' || group.masterDocumentId === null) continue;
    const record = documents.get(group.masterDocumentId);
    if (!record?.judgment) continue;

    const candidate = toVersionCandidate(record);
    const source: MasterSource = {
      instrumentType: group.instrumentType,
      groupKey: group.groupKey,
      documentId: record.document.id,
      pageCount: record.document.pageCount,
      fields: record.judgment.structuredFields,
    };

    const current = best.get(group.instrumentType);
    const criteria = precedenceFor(group.instrumentType, precedence);
    if (!current || compareVersions(candidate, current.candidate, criteria).order < 0) {
      best.set(group.instrumentType, { source, candidate });
    }
  }

  return new Map([...best.entries()].map(([type, entry]) => [type, entry.source]));
}
