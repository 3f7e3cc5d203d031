/**
 * Rule logic evaluation
 *
 * Pure functions from a logic descriptor and the reconciled record to a
 * status. Missing inputs throw MISSING_ATTRIBUTE; the rule engine turns that
 * into ERROR, never FAIL.
 */

import { EngineError } from '@loanledger/core';
import type { ComparisonOperator, ComplianceStatus, RuleLogic } from '@loanledger/core';
import { resolveDate, resolveNumber, traceEvidence, attributeEvidence } from './operands.js';
import type { ResolvedDate, ResolvedOperand, RuleInputs } from './operands.js';

export type LogicStatus = Exclude<ComplianceStatus, 'NA'>;

export interface LogicOutcome {
  status: LogicStatus;
  message: string;
  expected: string | null;
  actual: string | null;
  variance: string | null;
  operands: Array<ResolvedOperand | ResolvedDate>;
}

/** Higher is worse; `all` reports the worst member */
const STATUS_WEIGHT: Record<LogicStatus, number> = {
  PASS: 0,
  PENDING_REVIEW: 1,
  WARNING: 2,
  ERROR: 3,
  FAIL: 4,
};

const MS_PER_DAY = 86_400_000;

export function formatNumber(value: number): string {
  return String(Math.round(value * 10_000) / 10_000);
}

export function compare(actual: number, operator: ComparisonOperator, limit: number): boolean {
  switch (operator) {
    case '<':
      return actual < limit;
    case '<=':
      return actual <= limit;
    case '>':
      return actual > limit;
    case '>=':
      return actual >= limit;
    case '==':
      return actual === limit;
    case '!=':
      return actual !== limit;
  }
}

function limitOutcome(
  label: string,
  actual: number,
  operator: ComparisonOperator,
  limit: number,
  warnMargin: number | undefined,
  operands: ResolvedOperand[]
): LogicOutcome {
  const passed = compare(actual, operator, limit);
  const distance = Math.abs(actual - limit);
  const directional = operator !== '==' && operator !== '!=';
  const near = passed && directional && warnMargin !== undefined && distance <= warnMargin;

  const status: LogicStatus = !passed ? 'FAIL' : near ? 'WARNING' : 'PASS';
  const shown = formatNumber(actual);
  const message = !passed
    ? `${label} ${shown} does not satisfy ${operator} ${formatNumber(limit)}`
    : near
      ? `${label} ${shown} is within ${formatNumber(warnMargin ?? 0)} of the ${formatNumber(limit)} limit`
      : `${label} ${shown} satisfies ${operator} ${formatNumber(limit)}`;

  return {
    status,
    message,
    expected: `${operator} ${formatNumber(limit)}`,
    actual: shown,
    variance: formatNumber(actual - limit),
    operands,
  };
}

function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY);
}

/**
 * @throws EngineError MISSING_ATTRIBUTE
 */
export function evaluateLogic(logic: RuleLogic, inputs: RuleInputs): LogicOutcome {
  switch (logic.kind) {
    case 'threshold': {
      const operand = resolveNumber(logic.operand, inputs);
      return limitOutcome(operand.label, operand.value, logic.operator, logic.value, logic.warnMargin, [
        operand,
      ]);
    }

    case 'ratio': {
      const numerator = resolveNumber(logic.numerator, inputs);
      const denominator = resolveNumber(logic.denominator, inputs);
      if (denominator.value === 0) {
        return {
          status: 'ERROR',
          message: `${denominator.label} is zero; ratio is undefined`,
          expected: `${logic.operator} ${formatNumber(logic.value)}`,
          actual: null,
          variance: null,
          operands: [numerator, denominator],
        };
      }
      const ratio = (numerator.value / denominator.value) * (logic.scale ?? 1);
      return limitOutcome(
        `${numerator.label} / ${denominator.label}`,
        ratio,
        logic.operator,
        logic.value,
        logic.warnMargin,
        [numerator, denominator]
      );
    }

    case 'tolerance': {
      const left = resolveNumber(logic.left, inputs);
      const right = resolveNumber(logic.right, inputs);
      const difference = Math.abs(left.value - right.value);
      const status: LogicStatus =
        difference <= logic.tolerance
          ? 'PASS'
          : logic.warnTolerance !== undefined && difference <= logic.warnTolerance
            ? 'WARNING'
            : 'FAIL';
      const verb = status === 'PASS' ? 'within' : 'exceeds';
      return {
        status,
        message: `${left.label} and ${right.label} differ by ${formatNumber(difference)}, ${verb} tolerance ${formatNumber(logic.tolerance)}`,
        expected: formatNumber(right.value),
        actual: formatNumber(left.value),
        variance: formatNumber(left.value - right.value),
        operands: [left, right],
      };
    }

    case 'date_window': {
      const from = resolveDate(logic.from, inputs);
      const to = resolveDate(logic.to, inputs);
      const days = daysBetween(from.value, to.value);
      const tooEarly = logic.minDays !== undefined && days < logic.minDays;
      const tooLate = logic.maxDays !== undefined && days > logic.maxDays;
      const window = [
        logic.minDays !== undefined ? `>= ${logic.minDays}` : undefined,
        logic.maxDays !== undefined ? `<= ${logic.maxDays}` : undefined,
      ]
        .filter((part): part is string => part !== undefined)
        .join(' and ');
      const passed = !tooEarly && !tooLate;
      return {
        status: passed ? 'PASS' : 'FAIL',
        message: `${days} days from ${from.label} (${from.value}) to ${to.label} (${to.value}); required ${window} days`,
        expected: `${window} days`,
        actual: `${days} days`,
        variance: null,
        operands: [from, to],
      };
    }

    case 'verification': {
      const trace = inputs.traces.get(logic.attribute);
      if (!trace) {
        throw new EngineError({
          code: 'MISSING_ATTRIBUTE',
          message: `No calculation trace for ${logic.attribute}`,
          context: { attributeName: logic.attribute },
        });
      }
      const { calculation, documents } = traceEvidence(trace);
      const operands: ResolvedOperand[] = [];
      if (trace.derivedValue !== null) {
        operands.push({
          label: `calculated ${trace.attributeName}`,
          value: trace.derivedValue,
          tier: 'calculated',
          evidence: null,
          documents,
          calculation,
        });
      }
      const attribute = inputs.attributes.get(logic.attribute);
      if (attribute?.status === 'sourced' && trace.expectedValue !== null) {
        const cited = attributeEvidence(attribute);
        operands.push({
          label: attribute.name,
          value: trace.expectedValue,
          tier: attribute.sourceTier,
          evidence: cited.evidence,
          documents: cited.documents,
        });
      }

      const outcome = trace.verification;
      const status: LogicStatus =
        outcome.status === 'MATCH'
          ? 'PASS'
          : outcome.status === 'MINOR_VARIANCE'
            ? 'WARNING'
            : outcome.status === 'MISMATCH'
              ? 'FAIL'
              : 'ERROR';
      const detail = trace.error ? `: ${trace.error.message}` : '';
      return {
        status,
        message: `Verification of ${logic.attribute}: ${outcome.status}${detail}`,
        expected: trace.expectedValue !== null ? formatNumber(trace.expectedValue) : null,
        actual: trace.derivedValue !== null ? formatNumber(trace.derivedValue) : null,
        variance:
          outcome.absoluteDifference !== undefined ? formatNumber(outcome.absoluteDifference) : null,
        operands,
      };
    }

    case 'all': {
      const outcomes = logic.conditions.map((condition) => evaluateLogic(condition, inputs));
      let worst: LogicStatus = 'PASS';
      for (const outcome of outcomes) {
        if (STATUS_WEIGHT[outcome.status] > STATUS_WEIGHT[worst]) worst = outcome.status;
      }
      const relevant = outcomes.filter((o) => o.status === worst);
      return {
        status: worst,
        message: relevant.map((o) => o.message).join('; '),
        expected: relevant.length === 1 ? (relevant[0]?.expected ?? null) : null,
        actual: relevant.length === 1 ? (relevant[0]?.actual ?? null) : null,
        variance: relevant.length === 1 ? (relevant[0]?.variance ?? null) : null,
        operands: outcomes.flatMap((o) => o.operands),
      };
    }

    case 'manual':
      return {
        status: 'PENDING_REVIEW',
        message: logic.instructions ?? 'Manual review required',
        expected: null,
        actual: null,
        variance: null,
        operands: [],
      };
  }
}
