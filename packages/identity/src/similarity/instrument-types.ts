/**
 * Canonical instrument types
 *
 * Oracle labels vary ("Form 1008", "Uniform Underwriting and Transmittal
 * Summary", "URLA - Lender"). Grouping and the fallback chain work on the
 * canonical names below.
 */

interface InstrumentTypeRule {
  type: string;
  /** Every pattern in a group must match; any group may match */
  match: string[][];
}

const INSTRUMENT_TYPE_RULES: InstrumentTypeRule[] = [
  { type: 'transmittal_summary', match: [['1008'], ['transmittal']] },
  { type: 'scif', match: [['1103'], ['scif']] },
  { type: 'non_standard_application', match: [['non', 'standard', 'application']] },
  {
    type: 'application_form_lender',
    match: [
      ['urla', 'lender'],
      ['1003', 'lender'],
    ],
  },
  { type: 'application_form', match: [['urla'], ['1003'], ['loan application']] },
  { type: 'closing_disclosure', match: [['closing disclosure']] },
  { type: 'loan_estimate', match: [['loan estimate']] },
  { type: 'right_to_cancel', match: [['right to cancel'], ['rescission']] },
  { type: 'form_4506', match: [['4506']] },
  { type: 'flood_notice', match: [['flood', 'notice']] },
  { type: 'rate_lock', match: [['rate lock']] },
  { type: 'borrower_certification', match: [['borrower', 'certification']] },
  { type: 'taxpayer_consent', match: [['taxpayer consent']] },
  { type: 'note', match: [['promissory note']] },
];

const MAX_TYPE_LENGTH = 50;

/**
 * Map an oracle type label to its canonical instrument type.
 * Unknown labels become snake_case, capped at 50 characters.
 */
export function normalizeInstrumentType(label: string): string {
  const text = label.toLowerCase().replace(/[-_]+/g, ' ').replace(/\s+/g, ' ').trim();

  for (const rule of INSTRUMENT_TYPE_RULES) {
    if (rule.match.some((group) => group.every((pattern) => text.includes(pattern)))) {
      return rule.type;
    }
  }

  return text
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_TYPE_LENGTH);
}
