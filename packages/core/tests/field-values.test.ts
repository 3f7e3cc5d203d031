import { describe, expect, it } from 'vitest';
import {
  coerceFieldValue,
  fieldToNumber,
  fieldToPlain,
  formatFieldValue,
  isPresent,
  parseCalendarDate,
  parseNumeric,
} from '../src/utils/field-values.js';

describe('parseNumeric', () => {
  it('parses currency with thousands separators', () => {
    expect(parseNumeric('$21,759.79')).toBe(21759.79);
  });

  it('parses percentages as their number', () => {
    expect(parseNumeric('43.5%')).toBe(43.5);
  });

  it('treats parentheses as negative', () => {
    expect(parseNumeric('(1,200.00)')).toBe(-1200);
    expect(parseNumeric('-15')).toBe(-15);
  });

  it('rejects malformed separators and unbalanced parentheses', () => {
    expect(parseNumeric('1,2')).toBeNull();
    expect(parseNumeric('(12')).toBeNull();
    expect(parseNumeric('$')).toBeNull();
  });
});

describe('parseCalendarDate', () => {
  it('accepts ISO and US dates', () => {
    expect(parseCalendarDate('2024-03-15')).toBe('2024-03-15');
    expect(parseCalendarDate('2024-03-15T10:30:00Z')).toBe('2024-03-15');
    expect(parseCalendarDate('3/5/2024')).toBe('2024-03-05');
  });

  it('rejects impossible calendar dates', () => {
    expect(parseCalendarDate('2023-02-29')).toBeNull();
    expect(parseCalendarDate('13/01/2024')).toBeNull();
  });
});

describe('coerceFieldValue', () => {
  it('maps missing markers to missing', () => {
    expect(coerceFieldValue(null)).toEqual({ kind: 'missing' });
    expect(coerceFieldValue(' N/A ')).toEqual({ kind: 'missing' });
    expect(coerceFieldValue('')).toEqual({ kind: 'missing' });
    expect(coerceFieldValue(Number.NaN)).toEqual({ kind: 'missing' });
  });

  it('infers the variant from strings', () => {
    expect(coerceFieldValue('TRUE')).toEqual({ kind: 'bool', value: true });
    expect(coerceFieldValue('03/15/2024')).toEqual({ kind: 'date', value: '2024-03-15' });
    expect(coerceFieldValue('$1,234.50')).toEqual({ kind: 'number', value: 1234.5 });
    expect(coerceFieldValue('Conventional')).toEqual({ kind: 'text', value: 'Conventional' });
  });

  it('keeps native scalars', () => {
    expect(coerceFieldValue(0)).toEqual({ kind: 'number', value: 0 });
    expect(coerceFieldValue(false)).toEqual({ kind: 'bool', value: false });
  });

  it('serializes objects as text', () => {
    expect(coerceFieldValue({ a: 1 })).toEqual({ kind: 'text', value: '{"a":1}' });
  });
});

describe('field value views', () => {
  it('exposes numbers only from number variants', () => {
    expect(fieldToNumber({ kind: 'number', value: 7 })).toBe(7);
    expect(fieldToNumber({ kind: 'text', value: '7' })).toBeNull();
    expect(fieldToNumber(null)).toBeNull();
  });

  it('formats and unwraps values', () => {
    expect(isPresent({ kind: 'missing' })).toBe(false);
    expect(fieldToPlain({ kind: 'date', value: '2024-01-02' })).toBe('2024-01-02');
    expect(formatFieldValue({ kind: 'missing' })).toBe('(missing)');
    expect(formatFieldValue({ kind: 'bool', value: true })).toBe('true');
  });
});
