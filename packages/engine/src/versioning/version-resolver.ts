/**
 * Version Resolution
 *
 * UNRESOLVED -> RESOLVED. Every resolution recomputes the full order from the
 * member list, so resolving again gives the same result.
 */

import { EngineError, Logger } from '@loanledger/core';
import type { InstrumentGroup, VersionRecord } from '@loanledger/core';
import type { VersionPrecedenceConfig } from '../settings.js';
import { compareVersions, precedenceFor } from './comparator.js';
import type { VersionCandidate } from './comparator.js';

export class VersionResolver {
  private readonly logger: Logger;

  constructor(
    private readonly precedence: VersionPrecedenceConfig = {},
    logger?: Logger
  ) {
    this.logger = logger ?? Logger.silent();
  }

  /**
   * @throws EngineError MISSING_REFERENCE when a member has no candidate
   */
  resolve(group: InstrumentGroup, candidates: ReadonlyMap<string, VersionCandidate>): InstrumentGroup {
    const criteria = precedenceFor(group.instrumentType, this.precedence);

    const members = group.documentIds.map((id) => {
      const candidate = candidates.get(id);
      if (!candidate) {
        throw new EngineError({
          code: 'MISSING_REFERENCE',
          message: `No version data for document ${id} in group ${group.groupKey}`,
          context: { loanId: group.loanId, documentId: id },
        });
      }
      return candidate;
    });

    const ordered = [...members].sort((a, b) => compareVersions(a, b, criteria).order);
    const single = ordered.length === 1;

    const versions = ordered.map((candidate, rank): VersionRecord => {
      if (rank === 0) {
        return {
          documentId: candidate.documentId,
          rank,
          role: single ? 'unique' : 'master',
          arbitraryTiebreak: false,
        };
      }

      const previous = ordered[rank - 1];
      const { decidedBy } = previous
        ? compareVersions(previous, candidate, criteria)
        : { decidedBy: undefined };
      const arbitraryTiebreak = decidedBy === 'documentId';
      if (arbitraryTiebreak) {
        this.logger.info('version order decided by document id', {
          loanId: group.loanId,
          groupKey: group.groupKey,
          documentId: candidate.documentId,
        });
      }

      return {
        documentId: candidate.documentId,
        rank,
        role: 'superseded',
        decidedBy,
        arbitraryTiebreak,
      };
    });

    return {
      ...group,
      status: 'resolved',
      versions,
      masterDocumentId: ordered[0]?.documentId ?? null,
    };
  }

  resolveAll(
    groups: InstrumentGroup[],
    candidates: ReadonlyMap<string, VersionCandidate>
  ): InstrumentGroup[] {
    return groups.map((group) => this.resolve(group, candidates));
  }
}
