/**
 * Zod schemas for rule catalogs and derivation recipes
 */

import { z } from 'zod';
import { EngineError } from '../errors/index.js';
import type { ComplianceRule, DerivationRecipe, RuleLogic } from '../types/index.js';
import { formatZodIssues } from './format.js';

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected an ISO date (YYYY-MM-DD)');

const stateCodeSchema = z
  .string()
  .regex(/^[A-Za-z]{2}$/, 'Expected a two-letter state code')
  .transform((s) => s.toUpperCase());

export const comparisonOperatorSchema = z.enum(['<', '<=', '>', '>=', '==', '!=']);

export const operandSchema = z.union([
  z.object({ attribute: z.string().min(1) }).strict(),
  z.object({ calculation: z.string().min(1) }).strict(),
  z.object({ value: z.number().finite() }).strict(),
]);

const attributeRefSchema = z.object({ attribute: z.string().min(1) }).strict();

/** Rule logic descriptor (recursive through `all`) */
export const ruleLogicSchema: z.ZodType<RuleLogic, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('threshold'),
      operand: operandSchema,
      operator: comparisonOperatorSchema,
      value: z.number().finite(),
      warnMargin: z.number().min(0).optional(),
    }),
    z.object({
      kind: z.literal('ratio'),
      numerator: operandSchema,
      denominator: operandSchema,
      scale: z.number().positive().optional(),
      operator: comparisonOperatorSchema,
      value: z.number().finite(),
      warnMargin: z.number().min(0).optional(),
    }),
    z.object({
      kind: z.literal('tolerance'),
      left: operandSchema,
      right: operandSchema,
      tolerance: z.number().min(0),
      warnTolerance: z.number().min(0).optional(),
    }),
    z.object({
      kind: z.literal('date_window'),
      from: attributeRefSchema,
      to: attributeRefSchema,
      minDays: z.number().int().optional(),
      maxDays: z.number().int().optional(),
    }),
    z.object({ kind: z.literal('verification'), attribute: z.string().min(1) }),
    z.object({ kind: z.literal('all'), conditions: z.array(ruleLogicSchema).min(1) }),
    z.object({ kind: z.literal('manual'), instructions: z.string().optional() }),
  ]).superRefine((logic, ctx) => {
    if (logic.kind === 'date_window' && logic.minDays === undefined && logic.maxDays === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'date_window needs minDays or maxDays',
      });
    }
  })
);

export const complianceRuleSchema = z
  .object({
    code: z.string().min(1),
    name: z.string().min(1),
    category: z.enum(['TILA', 'RESPA', 'ATR_QM', 'HPML', 'STATE', 'DATA_INTEGRITY']),
    severity: z.enum(['Critical', 'High', 'Medium', 'Low', 'Info']),
    applicability: z
      .object({
        loanTypes: z.array(z.string().min(1)).optional(),
        states: z.array(stateCodeSchema).optional(),
        excludedStates: z.array(stateCodeSchema).optional(),
      })
      .default({}),
    effectiveFrom: isoDateSchema,
    effectiveTo: isoDateSchema.optional(),
    logic: ruleLogicSchema,
    requiresManualReview: z.boolean().default(false),
    requirePrimarySource: z.boolean().optional(),
    regulationReference: z.string().optional(),
    remediation: z.string().optional(),
  })
  .refine((r) => r.effectiveTo === undefined || r.effectiveTo >= r.effectiveFrom, {
    message: 'effectiveTo precedes effectiveFrom',
    path: ['effectiveTo'],
  });

export const ruleCatalogSchema = z.object({
  version: z.string().optional(),
  rules: z.array(complianceRuleSchema),
});

const periodSchema = z.enum(['annual', 'monthly', 'biweekly', 'weekly']);

const sourceLocatorSchema = z.union([
  z
    .object({
      documentId: z.string().min(1),
      field: z.string().min(1),
      page: z.number().int().min(1).optional(),
    })
    .strict(),
  z.object({ instrumentType: z.string().min(1), field: z.string().min(1) }).strict(),
]);

export const derivationStepSchema = z.discriminatedUnion('kind', [
  z.object({
    id: z.string().min(1),
    kind: z.literal('source'),
    description: z.string().min(1),
    from: sourceLocatorSchema,
    rationale: z.string().optional(),
  }),
  z.object({
    id: z.string().min(1),
    kind: z.literal('formula'),
    description: z.string().min(1),
    formula: z.enum(['sum', 'subtract', 'multiply', 'divide', 'percentage', 'normalize_period']),
    inputs: z.array(z.string().min(1)).min(1),
    percent: z.number().finite().optional(),
    fromPeriod: periodSchema.optional(),
    toPeriod: periodSchema.optional(),
    rationale: z.string().optional(),
  }),
  z.object({
    id: z.string().min(1),
    kind: z.literal('adjustment'),
    description: z.string().min(1),
    input: z.string().min(1),
    factor: z.number().finite(),
    rationale: z.string().trim().min(1, 'Adjustments require a rationale'),
  }),
]);

export const derivationRecipeSchema = z.object({
  attributeName: z.string().min(1),
  steps: z.array(derivationStepSchema).min(1),
});

export const derivationRecipesSchema = z.object({
  recipes: z.array(derivationRecipeSchema),
});

export type RuleCatalogInput = z.input<typeof ruleCatalogSchema>;
export type DerivationRecipesInput = z.input<typeof derivationRecipesSchema>;

/**
 * Validate a rule catalog document.
 *
 * @throws EngineError INVALID_RULE
 */
export function parseRuleCatalog(raw: unknown): ComplianceRule[] {
  const result = ruleCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new EngineError({
      code: 'INVALID_RULE',
      message: `Invalid rule catalog:\n${formatZodIssues(result.error).join('\n')}`,
      suggestion: 'Fix the rule catalog file and reload it.',
    });
  }

  const seen = new Set<string>();
  for (const rule of result.data.rules) {
    if (seen.has(rule.code)) {
      throw new EngineError({
        code: 'INVALID_RULE',
        message: `Duplicate rule code: ${rule.code}`,
        context: { ruleCode: rule.code },
      });
    }
    seen.add(rule.code);
  }

  return result.data.rules;
}

/**
 * Validate a derivation recipe document.
 *
 * Structural problems inside a recipe (cycles, dangling inputs) are left to the
 * provenance builder so they fail one attribute, not the whole file.
 *
 * @throws EngineError INVALID_DERIVATION
 */
export function parseDerivationRecipes(raw: unknown): DerivationRecipe[] {
  const result = derivationRecipesSchema.safeParse(raw);
  if (!result.success) {
    throw new EngineError({
      code: 'INVALID_DERIVATION',
      message: `Invalid derivation recipes:\n${formatZodIssues(result.error).join('\n')}`,
      suggestion: 'Fix the derivation recipe file and reload it.',
    });
  }
  return result.data.recipes;
}
