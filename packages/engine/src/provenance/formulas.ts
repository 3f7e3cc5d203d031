import { EngineError } from '@loanledger/core';
import type { DerivationStepSpec, Period } from '@loanledger/core';

type FormulaStep = Extract<DerivationStepSpec, { kind: 'formula' }>;

export const PERIODS_PER_YEAR: Record<Period, number> = {
  annual: 1,
  monthly: 12,
  biweekly: 26,
  weekly: 52,
};

function invalid(step: FormulaStep, message: string): EngineError {
  return new EngineError({
    code: 'INVALID_DERIVATION',
    message: `Step ${step.id} (${step.formula}): ${message}`,
    suggestion: 'Fix the derivation recipe.',
  });
}

function requireArity(step: FormulaStep, inputs: number[], min: number, max = Infinity): void {
  if (inputs.length < min || inputs.length > max) {
    const expected = max === min ? `${min}` : max === Infinity ? `at least ${min}` : `${min}-${max}`;
    throw invalid(step, `expected ${expected} inputs, got ${inputs.length}`);
  }
}

function compute(step: FormulaStep, inputs: number[]): number {
  switch (step.formula) {
    case 'sum':
      requireArity(step, inputs, 1);
      return inputs.reduce((acc, v) => acc + v, 0);
    case 'subtract': {
      requireArity(step, inputs, 2);
      const [first = 0, ...rest] = inputs;
      return rest.reduce((acc, v) => acc - v, first);
    }
    case 'multiply':
      requireArity(step, inputs, 2);
      return inputs.reduce((acc, v) => acc * v, 1);
    case 'divide': {
      requireArity(step, inputs, 2, 2);
      const [numerator = 0, denominator = 0] = inputs;
      if (denominator === 0) throw invalid(step, 'division by zero');
      return numerator / denominator;
    }
    case 'percentage':
      requireArity(step, inputs, 1, 1);
      if (step.percent === undefined) throw invalid(step, 'percent is required');
      return ((inputs[0] ?? 0) * step.percent) / 100;
    case 'normalize_period':
      requireArity(step, inputs, 1, 1);
      if (!step.fromPeriod || !step.toPeriod) {
        throw invalid(step, 'fromPeriod and toPeriod are required');
      }
      return ((inputs[0] ?? 0) * PERIODS_PER_YEAR[step.fromPeriod]) / PERIODS_PER_YEAR[step.toPeriod];
  }
}

/**
 * Evaluate a formula step over its parents' values (in declared input order).
 *
 * @throws EngineError INVALID_DERIVATION
 */
export function applyFormula(step: FormulaStep, inputs: number[]): number {
  const result = compute(step, inputs);
  if (!Number.isFinite(result)) throw invalid(step, 'result is not a finite number');
  return result;
}

/** Human-readable formula, e.g. `sum(base_income, bonus_income)` */
export function describeFormula(step: FormulaStep): string {
  const args = step.inputs.join(', ');
  switch (step.formula) {
    case 'percentage':
      return `percentage(${args}, ${step.percent ?? '?'}%)`;
    case 'normalize_period':
      return `normalize_period(${args}, ${step.fromPeriod ?? '?'} -> ${step.toPeriod ?? '?'})`;
    default:
      return `${step.formula}(${args})`;
  }
}
