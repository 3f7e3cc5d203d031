import type {
  EvidenceBundle,
  EvidenceCalculation,
  EvidenceDocument,
  EvidenceValue,
} from '@loanledger/core';
import type { LogicOutcome } from './logic-evaluator.js';

function documentKey(doc: EvidenceDocument): string {
  return `${doc.documentId}\u0000${doc.page ?? ''}`;
}

/**
 * Collect the documents, values and traces behind a rule outcome.
 * `partial` marks bundles where a non-constant input cites no document.
 */
export function buildEvidence(outcome: LogicOutcome, rationale: string): EvidenceBundle {
  const documents = new Map<string, EvidenceDocument>();
  const values = new Map<string, EvidenceValue>();
  const calculations = new Map<string, EvidenceCalculation>();
  let partial = false;

  for (const operand of outcome.operands) {
    if (operand.tier === null) continue;

    if (operand.documents.length === 0) partial = true;
    for (const doc of operand.documents) {
      const key = documentKey(doc);
      if (!documents.has(key)) documents.set(key, doc);
    }
    if (operand.evidence && !values.has(operand.evidence.name)) {
      values.set(operand.evidence.name, operand.evidence);
    }
    if ('calculation' in operand && operand.calculation) {
      calculations.set(operand.calculation.attributeName, operand.calculation);
    }
  }

  if (outcome.status !== 'PENDING_REVIEW' && outcome.operands.length === 0) {
    partial = true;
  }

  const sortedDocuments = [...documents.values()].sort((a, b) =>
    a.documentId === b.documentId
      ? (a.page ?? 0) - (b.page ?? 0)
      : a.documentId < b.documentId
        ? -1
        : 1
  );

  return {
    documents: sortedDocuments,
    values: [...values.values()],
    calculations: [...calculations.values()],
    rationale,
    partial,
  };
}
