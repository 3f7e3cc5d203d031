import type { ComplianceRule, LoanProfile } from '@loanledger/core';

export type ApplicabilityDecision =
  | { status: 'applicable' }
  | { status: 'not_applicable'; reason: string }
  /** A restriction exists but the loan fact it needs is unknown */
  | { status: 'undetermined'; reason: string };

function normalize(value: string): string {
  return value.trim().toUpperCase();
}

/**
 * Decide whether a rule applies to a loan.
 *
 * The effective window is checked against the loan's application date, or
 * `asOf` when the application date is unknown.
 */
export function checkApplicability(
  rule: ComplianceRule,
  profile: LoanProfile,
  asOf: string
): ApplicabilityDecision {
  const date = profile.applicationDate ?? asOf;
  if (date < rule.effectiveFrom) {
    return { status: 'not_applicable', reason: `Rule effective from ${rule.effectiveFrom}` };
  }
  if (rule.effectiveTo !== undefined && date > rule.effectiveTo) {
    return { status: 'not_applicable', reason: `Rule expired on ${rule.effectiveTo}` };
  }

  const { loanTypes, states, excludedStates } = rule.applicability;

  if (loanTypes && loanTypes.length > 0) {
    if (!profile.loanType) {
      return { status: 'undetermined', reason: 'Loan type is unknown' };
    }
    const loanType = normalize(profile.loanType);
    if (!loanTypes.some((t) => normalize(t) === loanType)) {
      return { status: 'not_applicable', reason: `Not applicable to ${profile.loanType} loans` };
    }
  }

  const restrictsState =
    (states !== undefined && states.length > 0) ||
    (excludedStates !== undefined && excludedStates.length > 0);
  if (restrictsState) {
    if (!profile.propertyState) {
      return { status: 'undetermined', reason: 'Property state is unknown' };
    }
    const state = normalize(profile.propertyState);
    if (states && states.length > 0 && !states.some((s) => normalize(s) === state)) {
      return { status: 'not_applicable', reason: `Not applicable in ${state}` };
    }
    if (excludedStates?.some((s) => normalize(s) === state)) {
      return { status: 'not_applicable', reason: `Excluded in ${state}` };
    }
  }

  return { status: 'applicable' };
}
