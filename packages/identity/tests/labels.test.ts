import { describe, expect, it } from 'vitest';
import { labelSimilarity } from '../src/similarity/label-similarity.js';
import { normalizeInstrumentType } from '../src/similarity/instrument-types.js';

describe('normalizeInstrumentType', () => {
  it('maps known labels to canonical types', () => {
    expect(normalizeInstrumentType('Form 1008 Transmittal')).toBe('transmittal_summary');
    expect(normalizeInstrumentType('URLA - Lender')).toBe('application_form_lender');
    expect(normalizeInstrumentType('Uniform Residential Loan Application (1003)')).toBe(
      'application_form'
    );
    expect(normalizeInstrumentType('Non-Standard Application')).toBe('non_standard_application');
    expect(normalizeInstrumentType('Notice of Right to Cancel')).toBe('right_to_cancel');
    expect(normalizeInstrumentType('Closing Disclosure')).toBe('closing_disclosure');
  });

  it('snake-cases unknown labels', () => {
    expect(normalizeInstrumentType('Hazard Insurance Binder!')).toBe('hazard_insurance_binder');
    expect(normalizeInstrumentType('x'.repeat(80))).toHaveLength(50);
  });
});

describe('labelSimilarity', () => {
  it('ignores case and punctuation', () => {
    expect(labelSimilarity('Closing Disclosure', 'closing-disclosure')).toBe(1);
  });

  it('scales edit distance by the longer label', () => {
    expect(labelSimilarity('abc', 'abd')).toBeCloseTo(2 / 3, 10);
    expect(labelSimilarity('', 'note')).toBe(0);
  });
});
