/**
 * Loan Pipeline
 *
 * identity -> classification -> grouping -> versioning -> attributes -> provenance.
 * Each stage turns its failures into FailureRecords on the run context; the
 * pipeline itself only rejects on programming errors.
 */

import { randomUUID } from 'node:crypto';
import { Logger, wrapError } from '@loanledger/core';
import type {
  Attribute,
  ClassificationOracle,
  DerivationRecipe,
  DocumentRecord,
  FailureRecord,
  LoanDocument,
  LoanProfile,
  ManualEntry,
  OracleJudgment,
} from '@loanledger/core';
import { IdentityStore } from '@loanledger/identity';
import { AttributeReconciler } from '../attributes/attribute-reconciler.js';
import { selectMasters, toVersionCandidate } from '../attributes/master-selection.js';
import { groupInstruments } from '../grouping/instrument-grouping.js';
import { ResilientOracle } from '../oracle/resilient-oracle.js';
import { ProvenanceGraphBuilder } from '../provenance/provenance-graph.js';
import { resolveEngineSettings } from '../settings.js';
import type { EngineSettings } from '../settings.js';
import type { ReconciliationSnapshot } from '../store/record-store.js';
import { VersionResolver } from '../versioning/version-resolver.js';
import type { VersionCandidate } from '../versioning/comparator.js';
import { createRunContext } from './run-context.js';
import type { RunContext } from './run-context.js';

/** Supplies a loan's raw documents */
export interface DocumentSource {
  listDocuments(loanId: string): Promise<LoanDocument[]>;
}

export interface LoanPipelineOptions {
  settings?: Partial<EngineSettings>;
  /** Without an oracle only documents with a stored judgment are classified */
  oracle?: ClassificationOracle;
  recipes?: DerivationRecipe[];
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
}

export interface ReconcileOptions {
  /** Judgments from an earlier run, reused instead of calling the oracle */
  judgments?: ReadonlyMap<string, OracleJudgment>;
  manualEntries?: ManualEntry[];
  /** Loan facts that override the reconciled attributes */
  profile?: Omit<LoanProfile, 'loanId'>;
  asOf?: string;
}

function textOf(attribute: Attribute | undefined): string | undefined {
  if (!attribute || attribute.status !== 'sourced') return undefined;
  const value = attribute.value;
  return value.kind === 'text' || value.kind === 'date' ? value.value : undefined;
}

/** Only ISO dates: effective windows compare them as strings */
function dateOf(attribute: Attribute | undefined, failures: FailureRecord[]): string | undefined {
  if (!attribute || attribute.status !== 'sourced') return undefined;
  const value = attribute.value;
  if (value.kind === 'date') return value.value;
  failures.push({
    stage: 'attributes',
    code: 'MISSING_ATTRIBUTE',
    message: `${attribute.name} is not a date (${JSON.stringify(value.value)}); effective windows use the run date`,
    attributeName: attribute.name,
  });
  return undefined;
}

/**
 * Loan facts for rule applicability, read from the reconciled attributes.
 * An application date that is not a date is left out and reported in `failures`.
 */
export function deriveProfile(
  loanId: string,
  attributes: Attribute[],
  overrides: Omit<LoanProfile, 'loanId'> = {},
  failures: FailureRecord[] = []
): LoanProfile {
  const byName = new Map(attributes.map((a) => [a.name, a]));
  const loanType = overrides.loanType ?? textOf(byName.get('loan_type'));
  const propertyState = overrides.propertyState ?? textOf(byName.get('property_state'));
  const applicationDate =
    overrides.applicationDate ?? dateOf(byName.get('application_date'), failures);
  return {
    loanId,
    ...(loanType !== undefined ? { loanType } : {}),
    ...(propertyState !== undefined ? { propertyState: propertyState.toUpperCase() } : {}),
    ...(applicationDate !== undefined ? { applicationDate } : {}),
  };
}

export class LoanPipeline {
  private readonly settings: EngineSettings;
  private readonly oracle: ResilientOracle | undefined;
  private readonly recipes: DerivationRecipe[];
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(options: LoanPipelineOptions = {}) {
    this.settings = resolveEngineSettings(options.settings);
    this.logger = options.logger ?? Logger.silent();
    this.oracle = options.oracle
      ? new ResilientOracle(options.oracle, this.settings.oracle, this.logger)
      : undefined;
    this.recipes = options.recipes ?? [];
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get engineSettings(): EngineSettings {
    return this.settings;
  }

  async reconcile(
    loanId: string,
    documents: LoanDocument[],
    options: ReconcileOptions = {}
  ): Promise<ReconciliationSnapshot> {
    const ctx = createRunContext({
      loanId,
      runId: this.idFactory(),
      now: this.now(),
      asOf: options.asOf,
      logger: this.logger,
    });
    ctx.logger.info('reconciliation started', { documents: documents.length });

    const identity = this.identify(ctx, documents);
    await this.classify(ctx, options.judgments);
    this.group(ctx, identity);
    this.resolveVersions(ctx);
    this.reconcileAttributes(ctx, options.manualEntries ?? []);
    this.buildProvenance(ctx);

    const profile = deriveProfile(loanId, ctx.attributes, options.profile, ctx.failures);
    ctx.logger.info('reconciliation finished', {
      groups: ctx.groups.length,
      sourced: ctx.attributes.filter((a) => a.status === 'sourced').length,
      failures: ctx.failures.length,
    });

    return {
      loanId,
      runId: ctx.runId,
      createdAt: ctx.startedAt,
      documents: [...ctx.documents.values()],
      groups: ctx.groups,
      conflicts: ctx.conflicts,
      attributes: ctx.attributes,
      traces: ctx.traces,
      failures: ctx.failures,
      profile,
    };
  }

  private identify(ctx: RunContext, documents: LoanDocument[]): IdentityStore {
    const own = documents.filter((document) => {
      if (document.loanId === ctx.loanId) return true;
      ctx.failures.push({
        stage: 'identity',
        code: 'MISSING_REFERENCE',
        message: `Document ${document.id} belongs to loan ${document.loanId}, not ${ctx.loanId}`,
        documentId: document.id,
      });
      return false;
    });

    const identity = new IdentityStore({ logger: ctx.logger });
    const { records, failures } = identity.register(own);
    for (const record of records) ctx.documents.set(record.document.id, record);
    ctx.failures.push(...failures);
    return identity;
  }

  private async classify(
    ctx: RunContext,
    stored: ReadonlyMap<string, OracleJudgment> | undefined
  ): Promise<void> {
    const pending = [...ctx.documents.values()].filter((r) => r.classificationStatus === 'pending');

    // Failures are collected after the barrier so their order does not depend on timing
    const outcomes = await Promise.all(
      pending.map(async (record): Promise<{ record: DocumentRecord; failure?: FailureRecord }> => {
        const reused = stored?.get(record.document.id);
        if (reused) {
          return { record: { ...record, classificationStatus: 'classified', judgment: reused } };
        }
        if (!this.oracle) {
          return {
            record: {
              ...record,
              classificationStatus: 'needs_review',
              reviewReason: 'No oracle configured and no stored judgment',
            },
          };
        }
        try {
          const judgment = await this.oracle.judge(record.document);
          return { record: { ...record, classificationStatus: 'classified', judgment } };
        } catch (err) {
          const error = wrapError(err, 'TRANSIENT_ORACLE_FAILURE', {
            loanId: ctx.loanId,
            documentId: record.document.id,
          });
          return {
            record: { ...record, classificationStatus: 'needs_review', reviewReason: error.message },
            failure: {
              stage: 'classification',
              code: error.code,
              message: error.message,
              documentId: record.document.id,
            },
          };
        }
      })
    );

    for (const { record, failure } of outcomes) {
      ctx.documents.set(record.document.id, record);
      if (failure) ctx.failures.push(failure);
    }
  }

  private group(ctx: RunContext, identity: IdentityStore): void {
    const candidates = [...ctx.documents.values()].flatMap((record) =>
      record.classificationStatus === 'classified' && record.judgment
        ? [{ documentId: record.document.id, judgment: record.judgment }]
        : []
    );

    const { groups, conflicts } = groupInstruments(
      ctx.loanId,
      candidates,
      (a, b) => identity.similarity(a, b),
      {
        similarityThreshold: this.settings.similarityThreshold,
        labelSimilarityThreshold: this.settings.labelSimilarityThreshold,
        logger: ctx.logger,
      }
    );
    ctx.groups = groups;
    ctx.conflicts = conflicts;
  }

  private resolveVersions(ctx: RunContext): void {
    const resolver = new VersionResolver(this.settings.versionPrecedence, ctx.logger);
    const candidates = new Map<string, VersionCandidate>(
      [...ctx.documents.values()].map((r) => [r.document.id, toVersionCandidate(r)])
    );

    ctx.groups = ctx.groups.map((group) => {
      try {
        return resolver.resolve(group, candidates);
      } catch (err) {
        const error = wrapError(err, 'UNKNOWN', { loanId: ctx.loanId });
        ctx.failures.push({
          stage: 'versioning',
          code: error.code,
          message: `Group ${group.groupKey}: ${error.message}`,
          ...(error.context.documentId !== undefined ? { documentId: error.context.documentId } : {}),
        });
        return group;
      }
    });
  }

  private reconcileAttributes(ctx: RunContext, manualEntries: ManualEntry[]): void {
    ctx.masters = selectMasters(ctx.groups, ctx.documents, this.settings.versionPrecedence);

    const reconciler = new AttributeReconciler({
      chain: this.settings.fallbackChain,
      logger: ctx.logger,
    });
    const { attributes, failures } = reconciler.reconcile({
      definitions: this.settings.attributes,
      masters: ctx.masters,
      manualEntries,
      pageCounts: new Map(
        [...ctx.documents.values()].map((r) => [r.document.id, r.document.pageCount])
      ),
    });
    ctx.attributes = attributes;
    ctx.failures.push(...failures);
  }

  private buildProvenance(ctx: RunContext): void {
    const builder = new ProvenanceGraphBuilder(ctx.logger);
    ctx.traces = builder.buildAll(this.recipes, {
      loanId: ctx.loanId,
      documents: ctx.documents,
      masters: ctx.masters,
      attributes: new Map(ctx.attributes.map((a) => [a.name, a])),
      tolerance: this.settings.tolerance,
    });
    for (const trace of ctx.traces) {
      if (trace.error) ctx.failures.push(trace.error);
    }
  }
}
