import type {
  Attribute,
  ClassificationOracle,
  DocumentRecord,
  ExtractedField,
  FinalityIndicator,
  LoanDocument,
  OracleJudgment,
  OracleRequest,
  PresentFieldValue,
  SourceTier,
} from '@loanledger/core';

export function num(value: number, page?: number): ExtractedField {
  return page === undefined ? { value: { kind: 'number', value } } : { value: { kind: 'number', value }, page };
}

export function judgment(
  typeLabel: string,
  fields: Record<string, ExtractedField> = {},
  extra: { groupingHint?: string; finalityIndicator?: FinalityIndicator; documentDate?: string; hasSignature?: boolean } = {}
): OracleJudgment {
  return {
    typeLabel,
    finalityIndicator: extra.finalityIndicator ?? 'unknown',
    structuredFields: fields,
    ...(extra.groupingHint !== undefined ? { groupingHint: extra.groupingHint } : {}),
    ...(extra.documentDate !== undefined ? { documentDate: extra.documentDate } : {}),
    ...(extra.hasSignature !== undefined ? { hasSignature: extra.hasSignature } : {}),
  };
}

export function document(id: string, pageCount = 3, loanId = 'L1'): LoanDocument {
  return { id, loanId, pageCount };
}

export function classifiedRecord(doc: LoanDocument, judged: OracleJudgment): DocumentRecord {
  return {
    document: doc,
    fingerprint: { exactHash: null, perceptualHash: {} },
    identityStatus: 'ok',
    classificationStatus: 'classified',
    judgment: judged,
  };
}

export function sourced(
  name: string,
  value: PresentFieldValue,
  options: { tier?: SourceTier; tierIndex?: number; documentId?: string; page?: number | null } = {}
): Attribute {
  const tier = options.tier ?? 'primary';
  return {
    name,
    status: 'sourced',
    value,
    sourceDocumentId: options.documentId ?? 'ts-1',
    sourcePage: options.page === undefined ? 1 : options.page,
    sourceTier: tier,
    sourceInstrumentType: tier === 'manual' ? null : 'transmittal_summary',
    tierIndex: options.tierIndex ?? (tier === 'primary' ? 0 : 1),
    sourceField: name,
  };
}

/**
 * Oracle answering from a table of raw responses keyed by document id
 */
export class ScriptedOracle implements ClassificationOracle {
  readonly calls: string[] = [];

  constructor(private readonly responses: Record<string, unknown>) {}

  async classify(request: OracleRequest): Promise<unknown> {
    this.calls.push(request.id);
    const response = this.responses[request.id];
    if (response === undefined) throw new Error(`no scripted response for ${request.id}`);
    return response;
  }
}

/** Counter-based id factory for deterministic ids */
export function sequence(prefix: string): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/** Application, two Loan Estimate drafts, a 1008 and a byte-identical copy of it */
export const LOAN_DOCUMENTS: LoanDocument[] = [
  { id: 'app-1', loanId: 'L1', pageCount: 4, exactHash: 'a'.repeat(64) },
  { id: 'le-1', loanId: 'L1', pageCount: 3, exactHash: 'b'.repeat(64) },
  { id: 'le-2', loanId: 'L1', pageCount: 3, exactHash: 'c'.repeat(64) },
  { id: 'ts-1', loanId: 'L1', pageCount: 2, exactHash: 'd'.repeat(64) },
  { id: 'ts-2', loanId: 'L1', pageCount: 2, exactHash: 'D'.repeat(64) },
];

export const ORACLE_RESPONSES: Record<string, unknown> = {
  'app-1': {
    type_label: 'Uniform Residential Loan Application',
    structured_fields: {
      application_date: { value: '03/01/2024', page: 1 },
      base_monthly_income: { value: '$7,000.00', page: 2 },
      other_monthly_income: { value: 1000, page: 2 },
      loan_amount: { value: 299000, page: 1 },
    },
  },
  'le-1': {
    type_label: 'Loan Estimate',
    grouping_hint: 'LE',
    finality_indicator: 'preliminary',
    structured_fields: { apr: { value: '6.90%', page: 1 }, issue_date: { value: '2024-03-02', page: 1 } },
  },
  'le-2': {
    type_label: 'Loan Estimate',
    grouping_hint: 'LE',
    finality_indicator: 'final',
    structured_fields: { apr: { value: '6.95%', page: 1 }, issue_date: { value: '2024-03-04', page: 1 } },
  },
  'ts-1': {
    type_label: 'Transmittal Summary (1008)',
    structured_fields: {
      loan_type: { value: 'Conventional', page: 1 },
      property_state: { value: 'tx', page: 1 },
      loan_amount: { value: 300000, page: 1 },
      appraised_value: { value: 400000, page: 1 },
      ltv_ratio: { value: 75, page: 1 },
      total_monthly_debt: { value: 3000, page: 2 },
      total_monthly_income: { value: 8000, page: 2 },
      dti_ratio: { value: '37.5%', page: 2 },
    },
  },
};
