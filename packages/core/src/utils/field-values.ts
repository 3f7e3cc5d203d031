/**
 * Field value coercion
 *
 * Oracle values arrive loosely typed ("$1,234.50", "03/15/2024", "TRUE", null, ...).
 * These helpers turn them into FieldValue variants.
 */

import type { FieldValue, PresentFieldValue } from '../types/index.js';

const MISSING: FieldValue = { kind: 'missing' };

const MISSING_MARKERS = new Set(['', 'n/a', 'na', 'null', 'none', 'unknown', '-', '--']);

const NUMERIC_PATTERN = /^(\()?(-)?\$?\s*(\d{1,3}(?:,\d{3})+|\d+)?(\.\d+)?\s*(%)?(\))?$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:T[\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function pad(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

function buildIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Parse an ISO (YYYY-MM-DD, optionally with time) or US (MM/DD/YYYY) date.
 * Returns the calendar date as YYYY-MM-DD, or null.
 */
export function parseCalendarDate(input: string): string | null {
  const text = input.trim();

  const iso = ISO_DATE_PATTERN.exec(text);
  if (iso) {
    return buildIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = US_DATE_PATTERN.exec(text);
  if (us) {
    return buildIsoDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  return null;
}

/**
 * Parse currency, percentage and plain numeric strings.
 * "(1,200.00)" is negative, as on accounting statements.
 */
export function parseNumeric(input: string): number | null {
  const text = input.trim();
  const match = NUMERIC_PATTERN.exec(text);
  if (!match) return null;

  const [, openParen, minus, whole, fraction, , closeParen] = match;
  if (whole === undefined && fraction === undefined) return null;
  if (Boolean(openParen) !== Boolean(closeParen)) return null;

  const digits = `${(whole ?? '0').replace(/,/g, '')}${fraction ?? ''}`;
  const value = Number(digits);
  if (!Number.isFinite(value)) return null;

  return openParen || minus ? -value : value;
}

/**
 * Coerce a raw oracle value into a FieldValue.
 */
export function coerceFieldValue(raw: unknown): FieldValue {
  if (raw === null || raw === undefined) return MISSING;

  if (typeof raw === 'boolean') {
    return { kind: 'bool', value: raw };
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { kind: 'number', value: raw } : MISSING;
  }

  if (raw instanceof Date) {
    if (isNaN(raw.getTime())) return MISSING;
    return { kind: 'date', value: raw.toISOString().slice(0, 10) };
  }

  if (typeof raw === 'string') {
    const text = raw.trim();
    const lowered = text.toLowerCase();

    if (MISSING_MARKERS.has(lowered)) return MISSING;
    if (lowered === 'true') return { kind: 'bool', value: true };
    if (lowered === 'false') return { kind: 'bool', value: false };

    const date = parseCalendarDate(text);
    if (date) return { kind: 'date', value: date };

    const num = parseNumeric(text);
    if (num !== null) return { kind: 'number', value: num };

    return { kind: 'text', value: text };
  }

  if (typeof raw === 'object') {
    try {
      return { kind: 'text', value: JSON.stringify(raw) };
    } catch {
      return MISSING;
    }
  }

  return { kind: 'text', value: String(raw) };
}

export function isPresent(value: FieldValue | null | undefined): value is PresentFieldValue {
  return value !== null && value !== undefined && value.kind !== 'missing';
}

/**
 * Numeric view of a value; only number variants qualify.
 */
export function fieldToNumber(value: FieldValue | null | undefined): number | null {
  return value?.kind === 'number' ? value.value : null;
}

/**
 * Plain JSON view of a value
 */
export function fieldToPlain(value: FieldValue | null | undefined): string | number | boolean | null {
  if (!isPresent(value)) return null;
  return value.value;
}

export function formatFieldValue(value: FieldValue | null | undefined): string {
  if (!isPresent(value)) return '(missing)';
  switch (value.kind) {
    case 'number':
      return String(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'date':
    case 'text':
      return value.value;
  }
}
