/**
 * Zod schemas for validating oracle responses
 *
 * The oracle answers in loosely shaped JSON (snake_case or camelCase keys,
 * bare values or {value, page} objects). Everything is normalized here so
 * nothing untyped reaches the deterministic core.
 */

import { z } from 'zod';
import { EngineError } from '../errors/index.js';
import type {
  ExtractedField,
  FinalityIndicator,
  OracleJudgment,
  StructuredFields,
} from '../types/index.js';
import { coerceFieldValue, parseCalendarDate } from '../utils/field-values.js';
import { formatZodIssues } from './format.js';

const FORBIDDEN_FIELD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

const pageSchema = z.coerce.number().int().min(1);

/** A field given as {value, page} */
const fieldObjectSchema = z
  .object({
    value: z.unknown(),
    page: pageSchema.optional().catch(undefined),
  })
  .passthrough();

/** Raw oracle response */
export const oracleResponseSchema = z
  .object({
    type_label: z.string().optional(),
    typeLabel: z.string().optional(),
    document_type: z.string().optional(),
    grouping_hint: z.string().nullish(),
    groupingHint: z.string().nullish(),
    finality_indicator: z.string().nullish(),
    finalityIndicator: z.string().nullish(),
    has_signature: z.union([z.boolean(), z.string()]).nullish(),
    hasSignature: z.union([z.boolean(), z.string()]).nullish(),
    document_date: z.string().nullish(),
    documentDate: z.string().nullish(),
    structured_fields: z.record(z.unknown()).nullish(),
    structuredFields: z.record(z.unknown()).nullish(),
  })
  .passthrough()
  .superRefine((value, ctx) => {
    const label = value.type_label ?? value.typeLabel ?? value.document_type;
    if (!label || label.trim().length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Missing type label',
        path: ['type_label'],
      });
    }
  });

export type OracleResponseInput = z.infer<typeof oracleResponseSchema>;

export function normalizeFinality(raw: string | null | undefined): FinalityIndicator {
  if (!raw) return 'unknown';
  const text = raw.toLowerCase();
  if (text.includes('prelim') || text.includes('draft')) return 'preliminary';
  // "not final", "non-final": a draft
  if (/\b(?:not|non)[\s_-]*final/.test(text)) return 'preliminary';
  if (text.includes('final')) return 'final';
  if (text.includes('initial')) return 'initial';
  return 'unknown';
}

function normalizeSignature(raw: boolean | string | null | undefined): boolean | undefined {
  if (typeof raw === 'boolean') return raw;
  if (typeof raw !== 'string') return undefined;
  const text = raw.trim().toLowerCase();
  if (['yes', 'true', 'signed', 'y'].includes(text)) return true;
  if (['no', 'false', 'unsigned', 'n'].includes(text)) return false;
  return undefined;
}

function normalizeField(raw: unknown): ExtractedField {
  const asObject = fieldObjectSchema.safeParse(raw);
  if (asObject.success && typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
    const field: ExtractedField = { value: coerceFieldValue(asObject.data.value) };
    if (asObject.data.page !== undefined) {
      field.page = asObject.data.page;
    }
    return field;
  }
  return { value: coerceFieldValue(raw) };
}

function normalizeFields(raw: Record<string, unknown> | null | undefined): StructuredFields {
  const out: StructuredFields = {};
  if (!raw) return out;
  for (const [key, value] of Object.entries(raw)) {
    const name = key.trim();
    if (!name || FORBIDDEN_FIELD_KEYS.has(name)) continue;
    out[name] = normalizeField(value);
  }
  return out;
}

/**
 * Validate and normalize an oracle response.
 *
 * @throws EngineError INVALID_ORACLE_RESPONSE
 */
export function parseOracleJudgment(raw: unknown, documentId?: string): OracleJudgment {
  const result = oracleResponseSchema.safeParse(raw);
  if (!result.success) {
    throw new EngineError({
      code: 'INVALID_ORACLE_RESPONSE',
      message: `Oracle response failed validation: ${formatZodIssues(result.error).join('; ')}`,
      suggestion: 'Re-run classification for this document or classify it manually.',
      context: { documentId },
    });
  }

  const data = result.data;
  const typeLabel = (data.type_label ?? data.typeLabel ?? data.document_type ?? '').trim();
  const hint = (data.grouping_hint ?? data.groupingHint ?? '').trim();
  const rawDate = data.document_date ?? data.documentDate;
  const documentDate = rawDate ? parseCalendarDate(rawDate) : null;
  const hasSignature = normalizeSignature(data.has_signature ?? data.hasSignature);

  const judgment: OracleJudgment = {
    typeLabel,
    finalityIndicator: normalizeFinality(data.finality_indicator ?? data.finalityIndicator),
    structuredFields: normalizeFields(data.structured_fields ?? data.structuredFields),
  };
  if (hint) judgment.groupingHint = hint;
  if (hasSignature !== undefined) judgment.hasSignature = hasSignature;
  if (documentDate) judgment.documentDate = documentDate;

  return judgment;
}
