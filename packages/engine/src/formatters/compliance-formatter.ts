/**
 * Compliance Report Formatter
 */

import type { ComplianceReport, ComplianceResult } from '@loanledger/core';
import { formatCitation } from './utils.js';

const STATUS_ORDER: Record<ComplianceResult['status'], number> = {
  FAIL: 0,
  ERROR: 1,
  WARNING: 2,
  PENDING_REVIEW: 3,
  PASS: 4,
  NA: 5,
};

function formatResult(result: ComplianceResult): string[] {
  const lines: string[] = [];
  const review = result.manualReview ? ' [manual review]' : '';
  lines.push(`**${result.ruleCode}** ${result.status} (${result.severity})${review}: ${result.ruleName}`);
  lines.push(`- ${result.message}`);
  if (result.expectedValue !== null || result.actualValue !== null) {
    lines.push(`- Expected: ${result.expectedValue ?? 'n/a'}; actual: ${result.actualValue ?? 'n/a'}`);
  }
  if (result.regulationReference) lines.push(`- Reference: ${result.regulationReference}`);
  if (result.evidence && result.evidence.documents.length > 0) {
    const cited = result.evidence.documents.map((d) => formatCitation(d.documentId, d.page));
    lines.push(`- Evidence: ${cited.join(', ')}${result.evidence.partial ? ' (partial)' : ''}`);
  }
  return lines;
}

export function formatComplianceReport(report: ComplianceReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(`## Compliance Report: ${report.loanId}`);
  lines.push(`Execution: ${report.executionId}`);
  lines.push(`Executed: ${report.executedAt.toISOString()}`);
  lines.push(`Overall status: ${report.overallStatus}`);
  lines.push('');

  lines.push('### Summary');
  lines.push(`- Rules: ${summary.total}`);
  lines.push(`- Passed: ${summary.passed}`);
  lines.push(`- Failed: ${summary.failed}`);
  lines.push(`- Warnings: ${summary.warnings}`);
  lines.push(`- Errors: ${summary.errors}`);
  lines.push(`- Pending review: ${summary.pendingReview}`);
  lines.push(`- Not applicable: ${summary.notApplicable}`);
  lines.push(`- Flagged for manual review: ${summary.manualReview}`);
  lines.push('');

  const ordered = [...report.results].sort(
    (a, b) => STATUS_ORDER[a.status] - STATUS_ORDER[b.status] || a.ruleCode.localeCompare(b.ruleCode)
  );
  lines.push('### Results');
  for (const result of ordered) {
    lines.push(...formatResult(result));
  }

  return lines.join('\n').trimEnd();
}
