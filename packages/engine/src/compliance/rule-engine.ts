/**
 * Compliance Rule Engine
 *
 * Evaluates a read-only rule catalog against one loan's reconciled record.
 * Every (loan, rule) pair yields exactly one result; nothing a rule does can
 * stop the others from being evaluated.
 */

import { randomUUID } from 'node:crypto';
import { EngineError, Logger, wrapError } from '@loanledger/core';
import type {
  Attribute,
  CalculationTrace,
  ComplianceReport,
  ComplianceResult,
  ComplianceRule,
  ComplianceStatus,
  ComplianceSummary,
  LoanProfile,
} from '@loanledger/core';
import { Semaphore } from '../runtime/semaphore.js';
import { checkApplicability } from './applicability.js';
import { buildEvidence } from './evidence.js';
import { evaluateLogic } from './logic-evaluator.js';
import type { LogicOutcome } from './logic-evaluator.js';
import type { RuleInputs } from './operands.js';

export interface ComplianceRunInput {
  loanId: string;
  executionId: string;
  profile: LoanProfile;
  /** ISO date used when the loan has no application date */
  asOf: string;
  attributes: Attribute[];
  traces: CalculationTrace[];
}

export interface RuleEngineOptions {
  concurrency?: number;
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
}

export function summarize(results: ComplianceResult[]): ComplianceSummary {
  const count = (status: ComplianceStatus) => results.filter((r) => r.status === status).length;
  return {
    total: results.length,
    passed: count('PASS'),
    failed: count('FAIL'),
    warnings: count('WARNING'),
    notApplicable: count('NA'),
    errors: count('ERROR'),
    pendingReview: count('PENDING_REVIEW'),
    manualReview: results.filter((r) => r.manualReview).length,
  };
}

export function overallStatus(summary: ComplianceSummary): ComplianceReport['overallStatus'] {
  if (summary.failed > 0) return 'FAIL';
  if (summary.warnings > 0 || summary.errors > 0) return 'WARNING';
  if (summary.pendingReview > 0) return 'PENDING_REVIEW';
  return 'PASS';
}

export class ComplianceRuleEngine {
  private readonly concurrency: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(
    private readonly rules: readonly ComplianceRule[],
    options: RuleEngineOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 8;
    this.logger = options.logger ?? Logger.silent();
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get catalog(): readonly ComplianceRule[] {
    return this.rules;
  }

  async evaluate(input: ComplianceRunInput): Promise<ComplianceReport> {
    const logger = this.logger.child({ loanId: input.loanId, executionId: input.executionId });
    const inputs: RuleInputs = {
      attributes: new Map(input.attributes.map((a) => [a.name, a])),
      traces: new Map(input.traces.map((t) => [t.attributeName, t])),
    };

    const semaphore = new Semaphore(this.concurrency);
    const results = await Promise.all(
      this.rules.map((rule) => semaphore.run(() => this.evaluateRule(rule, input, inputs)))
    );

    const summary = summarize(results);
    const report: ComplianceReport = {
      loanId: input.loanId,
      executionId: input.executionId,
      executedAt: this.now(),
      overallStatus: overallStatus(summary),
      summary,
      results,
    };

    logger.info('compliance run finished', { overallStatus: report.overallStatus, ...summary });
    return report;
  }

  /**
   * Evaluate one rule. Total: every failure becomes an ERROR result.
   */
  evaluateRule(rule: ComplianceRule, input: ComplianceRunInput, inputs: RuleInputs): ComplianceResult {
    const base = {
      resultId: this.idFactory(),
      loanId: input.loanId,
      executionId: input.executionId,
      ruleCode: rule.code,
      ruleName: rule.name,
      category: rule.category,
      severity: rule.severity,
      ...(rule.regulationReference ? { regulationReference: rule.regulationReference } : {}),
      checkedAt: this.now(),
    };

    try {
      const decision = checkApplicability(rule, input.profile, input.asOf);
      if (decision.status === 'not_applicable') {
        return {
          ...base,
          status: 'NA',
          message: decision.reason,
          expectedValue: null,
          actualValue: null,
          variance: null,
          evidence: null,
          manualReview: rule.requiresManualReview,
        };
      }
      if (decision.status === 'undetermined') {
        throw new EngineError({
          code: 'MISSING_ATTRIBUTE',
          message: `Cannot determine applicability: ${decision.reason}`,
          context: { ruleCode: rule.code },
        });
      }

      const outcome = this.applySourcePolicy(rule, evaluateLogic(rule.logic, inputs));
      const rationale = rule.remediation && outcome.status !== 'PASS'
        ? `${outcome.message}. ${rule.remediation}`
        : outcome.message;

      return {
        ...base,
        status: outcome.status,
        message: outcome.message,
        expectedValue: outcome.expected,
        actualValue: outcome.actual,
        variance: outcome.variance,
        evidence: buildEvidence(outcome, rationale),
        manualReview:
          rule.requiresManualReview ||
          outcome.status === 'PENDING_REVIEW' ||
          outcome.status === 'ERROR',
      };
    } catch (err) {
      const error = wrapError(err, 'UNKNOWN', { ruleCode: rule.code });
      this.logger.warn('rule evaluation error', {
        loanId: input.loanId,
        ruleCode: rule.code,
        code: error.code,
        error: error.message,
      });
      return {
        ...base,
        status: 'ERROR',
        message: `${error.code}: ${error.message}`,
        expectedValue: null,
        actualValue: null,
        variance: null,
        evidence: null,
        manualReview: true,
      };
    }
  }

  /** Fallback-sourced inputs cannot settle a rule that demands primary sources */
  private applySourcePolicy(rule: ComplianceRule, outcome: LogicOutcome): LogicOutcome {
    if (!rule.requirePrimarySource) return outcome;
    if (outcome.status === 'ERROR' || outcome.status === 'PENDING_REVIEW') return outcome;

    const fallback = outcome.operands.filter((o) => o.tier === 'fallback').map((o) => o.label);
    if (fallback.length === 0) return outcome;

    return {
      ...outcome,
      status: 'PENDING_REVIEW',
      message: `${outcome.message} (fallback source for ${fallback.join(', ')}; primary source required)`,
    };
  }
}
