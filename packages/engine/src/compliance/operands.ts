/**
 * Operand resolution for rule logic
 */

import { EngineError, formatFieldValue } from '@loanledger/core';
import type {
  Attribute,
  CalculationTrace,
  EvidenceCalculation,
  EvidenceDocument,
  EvidenceValue,
  Operand,
  SourceTier,
} from '@loanledger/core';

export interface RuleInputs {
  attributes: ReadonlyMap<string, Attribute>;
  traces: ReadonlyMap<string, CalculationTrace>;
}

export interface ResolvedOperand {
  label: string;
  value: number;
  /** Null for constants */
  tier: SourceTier | 'calculated' | null;
  evidence: EvidenceValue | null;
  documents: EvidenceDocument[];
  calculation?: EvidenceCalculation;
}

export interface ResolvedDate {
  label: string;
  /** ISO date */
  value: string;
  tier: SourceTier;
  evidence: EvidenceValue;
  documents: EvidenceDocument[];
}

type SourcedAttribute = Extract<Attribute, { status: 'sourced' }>;

function missing(name: string, message: string): EngineError {
  return new EngineError({
    code: 'MISSING_ATTRIBUTE',
    message,
    suggestion: `Source ${name} from a document or enter it manually, then re-run compliance.`,
    context: { attributeName: name },
  });
}

function sourcedAttribute(inputs: RuleInputs, name: string): SourcedAttribute {
  const attribute = inputs.attributes.get(name);
  if (!attribute) {
    throw missing(name, `Attribute ${name} is not reconciled for this loan`);
  }
  if (attribute.status !== 'sourced') {
    throw missing(name, `Attribute ${name} has no source document`);
  }
  return attribute;
}

export function attributeEvidence(attribute: SourcedAttribute): {
  evidence: EvidenceValue;
  documents: EvidenceDocument[];
} {
  const origin =
    attribute.sourceTier === 'manual'
      ? 'manual entry'
      : `${attribute.sourceInstrumentType ?? 'document'} (${attribute.sourceTier})`;
  return {
    evidence: {
      name: attribute.name,
      value: attribute.value.value,
      ...(attribute.unit !== undefined ? { unit: attribute.unit } : {}),
      sourceDocumentId: attribute.sourceDocumentId,
      sourcePage: attribute.sourcePage,
      sourceTier: attribute.sourceTier,
    },
    documents: [
      {
        documentId: attribute.sourceDocumentId,
        page: attribute.sourcePage,
        label: `${attribute.name} from ${origin}`,
      },
    ],
  };
}

export function traceEvidence(trace: CalculationTrace): {
  calculation: EvidenceCalculation;
  documents: EvidenceDocument[];
} {
  const documents: EvidenceDocument[] = [];
  for (const step of trace.steps) {
    if (step.kind !== 'source' || step.documentId === undefined) continue;
    documents.push({
      documentId: step.documentId,
      page: step.page ?? null,
      label: `${trace.attributeName}: ${step.description}`,
    });
  }
  return {
    calculation: {
      attributeName: trace.attributeName,
      derivedValue: trace.derivedValue,
      verification: trace.verification.status,
      steps: trace.steps,
    },
    documents,
  };
}

/**
 * @throws EngineError MISSING_ATTRIBUTE when the operand has no usable value
 */
export function resolveNumber(operand: Operand, inputs: RuleInputs): ResolvedOperand {
  if ('value' in operand) {
    return { label: String(operand.value), value: operand.value, tier: null, evidence: null, documents: [] };
  }

  if ('attribute' in operand) {
    const attribute = sourcedAttribute(inputs, operand.attribute);
    if (attribute.value.kind !== 'number') {
      throw missing(
        attribute.name,
        `Attribute ${attribute.name} is not numeric (${formatFieldValue(attribute.value)})`
      );
    }
    const { evidence, documents } = attributeEvidence(attribute);
    return {
      label: attribute.name,
      value: attribute.value.value,
      tier: attribute.sourceTier,
      evidence,
      documents,
    };
  }

  const trace = inputs.traces.get(operand.calculation);
  if (!trace || trace.derivedValue === null) {
    const reason = trace?.error ? ` (${trace.error.code}: ${trace.error.message})` : '';
    throw missing(operand.calculation, `Calculation ${operand.calculation} is unavailable${reason}`);
  }
  const { calculation, documents } = traceEvidence(trace);
  return {
    label: `calculated ${trace.attributeName}`,
    value: trace.derivedValue,
    tier: 'calculated',
    evidence: {
      name: `calculated ${trace.attributeName}`,
      value: trace.derivedValue,
      sourceDocumentId: null,
      sourcePage: null,
      sourceTier: 'calculated',
    },
    documents,
    calculation,
  };
}

/**
 * @throws EngineError MISSING_ATTRIBUTE when the attribute is absent or not a date
 */
export function resolveDate(ref: { attribute: string }, inputs: RuleInputs): ResolvedDate {
  const attribute = sourcedAttribute(inputs, ref.attribute);
  if (attribute.value.kind !== 'date') {
    throw missing(
      attribute.name,
      `Attribute ${attribute.name} is not a date (${formatFieldValue(attribute.value)})`
    );
  }
  const { evidence, documents } = attributeEvidence(attribute);
  return {
    label: attribute.name,
    value: attribute.value.value,
    tier: attribute.sourceTier,
    evidence,
    documents,
  };
}
