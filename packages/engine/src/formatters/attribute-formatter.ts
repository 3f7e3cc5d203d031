/**
 * Attribute Formatter
 *
 * Formats reconciled attributes for MCP consumption.
 */

import { formatFieldValue } from '@loanledger/core';
import type { Attribute } from '@loanledger/core';
import { formatCitation } from './utils.js';

export function formatAttributes(loanId: string, attributes: Attribute[]): string {
  const lines: string[] = [];
  const sourced = attributes.filter((a) => a.status === 'sourced');
  const unsourced = attributes.filter((a) => a.status === 'unsourced');

  lines.push(`## Reconciled Attributes: ${loanId}`);
  lines.push(`Sourced: ${sourced.length} of ${attributes.length}`);
  lines.push('');

  if (sourced.length > 0) {
    lines.push('### Sourced');
    for (const attribute of sourced) {
      if (attribute.status !== 'sourced') continue;
      const unit = attribute.unit ? ` ${attribute.unit}` : '';
      const where = attribute.sourceInstrumentType ?? 'manual entry';
      lines.push(
        `- ${attribute.name}: ${formatFieldValue(attribute.value)}${unit} [${attribute.sourceTier}: ${where}, ${formatCitation(attribute.sourceDocumentId, attribute.sourcePage)}]`
      );
    }
    lines.push('');
  }

  if (unsourced.length > 0) {
    lines.push('### Unsourced');
    lines.push(unsourced.map((a) => a.name).join(', '));
  }

  return lines.join('\n').trimEnd();
}
