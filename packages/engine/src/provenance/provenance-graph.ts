/**
 * Calculation Provenance Graph
 *
 * Builds a DAG of calculation steps from a derivation recipe, evaluates it and
 * checks the terminal value against the reconciled attribute. Every value in
 * the graph traces back to a document page.
 */

import { EngineError, Logger, fieldToNumber, wrapError } from '@loanledger/core';
import type {
  Attribute,
  CalculationStep,
  CalculationTrace,
  DerivationRecipe,
  DerivationStepSpec,
  DocumentRecord,
  ExtractedField,
  ToleranceConfig,
  VerificationOutcome,
} from '@loanledger/core';
import type { MasterSource } from '../attributes/master-selection.js';
import { DEFAULT_TOLERANCE } from '../settings.js';
import { applyFormula, describeFormula } from './formulas.js';
import { compareWithTolerance } from './tolerance.js';

export interface ProvenanceContext {
  loanId: string;
  documents: ReadonlyMap<string, DocumentRecord>;
  masters: ReadonlyMap<string, MasterSource>;
  attributes: ReadonlyMap<string, Attribute>;
  tolerance?: ToleranceConfig;
}

interface ResolvedSource {
  value: number;
  documentId: string;
  page?: number;
}

function parentsOf(step: DerivationStepSpec): string[] {
  switch (step.kind) {
    case 'source':
      return [];
    case 'formula':
      return step.inputs;
    case 'adjustment':
      return [step.input];
  }
}

/**
 * Validate references and order steps topologically; ties keep declaration order.
 *
 * @throws EngineError INVALID_DERIVATION, PROVENANCE_CYCLE
 */
export function orderSteps(recipe: DerivationRecipe): DerivationStepSpec[] {
  const context = { attributeName: recipe.attributeName };
  const indexById = new Map<string, number>();

  recipe.steps.forEach((step, index) => {
    if (indexById.has(step.id)) {
      throw new EngineError({
        code: 'INVALID_DERIVATION',
        message: `Duplicate step id ${step.id}`,
        context,
      });
    }
    indexById.set(step.id, index);
  });

  const indegree = recipe.steps.map(() => 0);
  const children = recipe.steps.map((): number[] => []);
  const referenced = new Set<string>();

  recipe.steps.forEach((step, index) => {
    for (const parentId of parentsOf(step)) {
      const parentIndex = indexById.get(parentId);
      if (parentIndex === undefined) {
        throw new EngineError({
          code: 'INVALID_DERIVATION',
          message: `Step ${step.id} references unknown step ${parentId}`,
          context,
        });
      }
      referenced.add(parentId);
      indegree[index] = (indegree[index] ?? 0) + 1;
      children[parentIndex]?.push(index);
    }
  });

  const ready = recipe.steps.map((_, i) => i).filter((i) => indegree[i] === 0);
  const ordered: DerivationStepSpec[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    const index = ready.shift();
    if (index === undefined) break;
    const step = recipe.steps[index];
    if (step) ordered.push(step);

    for (const child of children[index] ?? []) {
      const remaining = (indegree[child] ?? 0) - 1;
      indegree[child] = remaining;
      if (remaining === 0) ready.push(child);
    }
  }

  if (ordered.length < recipe.steps.length) {
    const stuck = recipe.steps.filter((s) => !ordered.includes(s)).map((s) => s.id);
    throw new EngineError({
      code: 'PROVENANCE_CYCLE',
      message: `Derivation of ${recipe.attributeName} contains a cycle through: ${stuck.join(', ')}`,
      suggestion: 'Remove the circular step reference from the recipe.',
      context,
    });
  }

  const terminals = recipe.steps.filter((s) => !referenced.has(s.id));
  if (terminals.length !== 1) {
    throw new EngineError({
      code: 'INVALID_DERIVATION',
      message: `Derivation of ${recipe.attributeName} must end in exactly one step (found ${terminals.length}: ${terminals.map((s) => s.id).join(', ')})`,
      context,
    });
  }

  return ordered;
}

export class ProvenanceGraphBuilder {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? Logger.silent();
  }

  build(recipe: DerivationRecipe, ctx: ProvenanceContext): CalculationTrace {
    const steps: CalculationStep[] = [];

    try {
      const ordered = orderSteps(recipe);
      const values = new Map<string, number>();

      for (const spec of ordered) {
        const step = this.evaluateStep(spec, values, recipe, ctx);
        step.order = steps.length + 1;
        steps.push(step);
        values.set(step.id, step.value);
      }

      // Every other step is an ancestor of the single terminal, so it sorts last
      const terminalStep = steps[steps.length - 1];
      if (!terminalStep) {
        throw new EngineError({
          code: 'INVALID_DERIVATION',
          message: `Derivation of ${recipe.attributeName} has no steps`,
          context: { attributeName: recipe.attributeName },
        });
      }

      const { expectedValue, verification } = this.verify(
        terminalStep.value,
        ctx.attributes.get(recipe.attributeName),
        ctx.tolerance ?? DEFAULT_TOLERANCE
      );

      return {
        loanId: ctx.loanId,
        attributeName: recipe.attributeName,
        steps,
        terminalStepId: terminalStep.id,
        derivedValue: terminalStep.value,
        expectedValue,
        verification,
      };
    } catch (err) {
      const error = wrapError(err, 'INVALID_DERIVATION', { attributeName: recipe.attributeName });
      this.logger.warn('provenance failed', {
        loanId: ctx.loanId,
        attributeName: recipe.attributeName,
        code: error.code,
        error: error.message,
      });

      const page = error.context.page;
      return {
        loanId: ctx.loanId,
        attributeName: recipe.attributeName,
        steps,
        terminalStepId: null,
        derivedValue: null,
        expectedValue: null,
        verification: { status: 'VERIFICATION_ERROR' },
        error: {
          stage: 'provenance',
          code: error.code,
          message: error.message,
          attributeName: recipe.attributeName,
          ...(error.context.documentId !== undefined ? { documentId: error.context.documentId } : {}),
          ...(typeof page === 'number' ? { page } : {}),
        },
      };
    }
  }

  buildAll(recipes: DerivationRecipe[], ctx: ProvenanceContext): CalculationTrace[] {
    return recipes.map((recipe) => this.build(recipe, ctx));
  }

  private evaluateStep(
    spec: DerivationStepSpec,
    values: ReadonlyMap<string, number>,
    recipe: DerivationRecipe,
    ctx: ProvenanceContext
  ): CalculationStep {
    const base = {
      id: spec.id,
      order: 0,
      kind: spec.kind,
      description: spec.description,
      parentIds: [...parentsOf(spec)],
    };
    const valueOf = (id: string): number => values.get(id) ?? Number.NaN;

    switch (spec.kind) {
      case 'source': {
        const source = this.resolveSource(spec, recipe, ctx);
        return {
          ...base,
          value: source.value,
          documentId: source.documentId,
          ...(source.page !== undefined ? { page: source.page } : {}),
          ...(spec.rationale ? { rationale: spec.rationale } : {}),
        };
      }
      case 'formula':
        return {
          ...base,
          value: applyFormula(spec, spec.inputs.map(valueOf)),
          formula: describeFormula(spec),
          ...(spec.rationale ? { rationale: spec.rationale } : {}),
        };
      case 'adjustment': {
        if (spec.rationale.trim().length === 0) {
          throw new EngineError({
            code: 'INVALID_DERIVATION',
            message: `Adjustment ${spec.id} has no rationale`,
            context: { attributeName: recipe.attributeName },
          });
        }
        const value = valueOf(spec.input) * spec.factor;
        if (!Number.isFinite(value)) {
          throw new EngineError({
            code: 'INVALID_DERIVATION',
            message: `Adjustment ${spec.id} produced a non-finite value`,
            context: { attributeName: recipe.attributeName },
          });
        }
        return {
          ...base,
          value,
          formula: `${spec.input} * ${spec.factor}`,
          rationale: spec.rationale,
        };
      }
    }
  }

  private resolveSource(
    spec: Extract<DerivationStepSpec, { kind: 'source' }>,
    recipe: DerivationRecipe,
    ctx: ProvenanceContext
  ): ResolvedSource {
    const from = spec.from;
    const attributeName = recipe.attributeName;

    let documentId: string;
    let pageCount: number;
    let field: ExtractedField | undefined;
    let page: number | undefined;

    if ('documentId' in from) {
      const record = ctx.documents.get(from.documentId);
      if (!record) {
        throw new EngineError({
          code: 'MISSING_REFERENCE',
          message: `Step ${spec.id} cites document ${from.documentId}, which is not part of loan ${ctx.loanId}`,
          context: { attributeName, documentId: from.documentId },
        });
      }
      documentId = from.documentId;
      pageCount = record.document.pageCount;
      field = record.judgment?.structuredFields[from.field];
      page = from.page ?? field?.page;
    } else {
      const master = ctx.masters.get(from.instrumentType);
      if (!master) {
        throw new EngineError({
          code: 'MISSING_REFERENCE',
          message: `Step ${spec.id} needs a ${from.instrumentType} master, but the loan has none`,
          context: { attributeName, instrumentType: from.instrumentType },
        });
      }
      documentId = master.documentId;
      pageCount = master.pageCount;
      field = master.fields[from.field];
      page = field?.page;
    }

    if (page !== undefined && (page < 1 || page > pageCount)) {
      throw new EngineError({
        code: 'MISSING_REFERENCE',
        message: `Step ${spec.id} cites page ${page} of ${documentId}, which has ${pageCount} pages`,
        context: { attributeName, documentId, page },
      });
    }

    const value = fieldToNumber(field?.value);
    if (value === null) {
      throw new EngineError({
        code: 'MISSING_ATTRIBUTE',
        message: `Step ${spec.id}: ${from.field} has no numeric value in ${documentId}`,
        context: { attributeName, documentId, ...(page !== undefined ? { page } : {}) },
      });
    }

    return { value, documentId, ...(page !== undefined ? { page } : {}) };
  }

  private verify(
    derived: number,
    attribute: Attribute | undefined,
    tolerance: ToleranceConfig
  ): { expectedValue: number | null; verification: VerificationOutcome } {
    if (!attribute || attribute.status !== 'sourced' || attribute.value.kind !== 'number') {
      return { expectedValue: null, verification: { status: 'UNVERIFIABLE' } };
    }
    const expected = attribute.value.value;
    return { expectedValue: expected, verification: compareWithTolerance(derived, expected, tolerance) };
  }
}
