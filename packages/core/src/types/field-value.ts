/**
 * Field Value Types
 *
 * Strict internal representation of values the oracle extracts from documents.
 * Oracle payloads are coerced into these variants at the boundary.
 */

export type FieldValue =
  | { kind: 'missing' }
  | { kind: 'text'; value: string }
  | { kind: 'number'; value: number }
  /** ISO calendar date (YYYY-MM-DD) */
  | { kind: 'date'; value: string }
  | { kind: 'bool'; value: boolean };

export type FieldValueKind = FieldValue['kind'];

/** A present (non-missing) value */
export type PresentFieldValue = Exclude<FieldValue, { kind: 'missing' }>;

/**
 * A single extracted field with the page it was read from (if known)
 */
export interface ExtractedField {
  value: FieldValue;
  page?: number;
}

/** Structured payload keyed by field name */
export type StructuredFields = Record<string, ExtractedField>;
