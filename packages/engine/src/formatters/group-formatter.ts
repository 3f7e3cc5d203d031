import type { GroupingConflict, InstrumentGroup } from '@loanledger/core';

export function formatInstrumentGroups(
  loanId: string,
  groups: InstrumentGroup[],
  conflicts: GroupingConflict[]
): string {
  const lines: string[] = [];

  lines.push(`## Instrument Groups: ${loanId}`);
  lines.push(`Groups: ${groups.length}`);
  lines.push('');

  for (const group of groups) {
    lines.push(`**${group.instrumentType}** (${group.groupKey}, ${group.status})`);
    for (const version of group.versions) {
      const decided = version.decidedBy ? ` by ${version.decidedBy}` : '';
      const arbitrary = version.arbitraryTiebreak ? ' [arbitrary tiebreak]' : '';
      lines.push(`- #${version.rank} ${version.documentId}: ${version.role}${decided}${arbitrary}`);
    }
    if (group.versions.length === 0) {
      lines.push(`- ${group.documentIds.join(', ')}`);
    }
  }

  if (conflicts.length > 0) {
    lines.push('');
    lines.push(`### Conflicts (${conflicts.length})`);
    for (const conflict of conflicts) {
      lines.push(
        `- ${conflict.documentIds.join(' / ')}: ${conflict.reason} (similarity ${conflict.similarity.toFixed(3)}) ${conflict.detail}`
      );
    }
  }

  return lines.join('\n').trimEnd();
}
