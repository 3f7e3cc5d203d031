import type { ToleranceConfig, VerificationOutcome, VerificationStatus } from '@loanledger/core';

function round6(value: number): number {
  return Number.isFinite(value) ? Math.round(value * 1e6) / 1e6 : value;
}

/**
 * Compare a derived value with the authoritative one.
 *
 * MATCH when the absolute difference is under `epsAbs`, MINOR_VARIANCE when the
 * relative difference is under `epsPct` percent, MISMATCH otherwise.
 */
export function compareWithTolerance(
  calculated: number,
  expected: number,
  tolerance: ToleranceConfig
): VerificationOutcome {
  const difference = Math.abs(calculated - expected);
  const variancePct =
    expected === 0 ? (difference === 0 ? 0 : Infinity) : (difference / Math.abs(expected)) * 100;

  let status: VerificationStatus;
  if (difference < tolerance.epsAbs) {
    status = 'MATCH';
  } else if (variancePct < tolerance.epsPct) {
    status = 'MINOR_VARIANCE';
  } else {
    status = 'MISMATCH';
  }

  return {
    status,
    absoluteDifference: round6(difference),
    variancePct: round6(variancePct),
  };
}

export function isVerified(status: VerificationStatus): boolean {
  return status === 'MATCH' || status === 'MINOR_VARIANCE';
}
