import type { CalculationTrace } from '@loanledger/core';
import { formatCitation } from './utils.js';

/**
 * Format a calculation trace as a numbered list of steps
 */
export function formatCalculationTrace(trace: CalculationTrace): string {
  const lines: string[] = [];

  lines.push(`## Calculation Trace: ${trace.attributeName}`);
  lines.push(`Loan: ${trace.loanId}`);
  lines.push(`Verification: ${trace.verification.status}`);
  if (trace.derivedValue !== null) lines.push(`Derived value: ${trace.derivedValue}`);
  if (trace.expectedValue !== null) lines.push(`Reported value: ${trace.expectedValue}`);
  if (trace.verification.absoluteDifference !== undefined) {
    lines.push(`Difference: ${trace.verification.absoluteDifference}`);
  }
  if (trace.error) lines.push(`Error [${trace.error.code}]: ${trace.error.message}`);
  lines.push('');

  if (trace.steps.length > 0) {
    lines.push('### Steps');
    for (const step of trace.steps) {
      const detail =
        step.kind === 'source'
          ? ` from ${formatCitation(step.documentId ?? null, step.page)}`
          : step.formula
            ? ` = ${step.formula}`
            : '';
      lines.push(`${step.order}. [${step.id}] ${step.description}: ${step.value}${detail}`);
      if (step.rationale) lines.push(`   Rationale: ${step.rationale}`);
    }
  }

  return lines.join('\n').trimEnd();
}
