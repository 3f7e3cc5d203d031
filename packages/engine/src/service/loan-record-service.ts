/**
 * Loan Record Service
 *
 * Read-only queries over the persisted record plus the two re-run
 * operations. Runs for the same loan are serialized; different loans do not
 * wait for each other.
 */

import { randomUUID } from 'node:crypto';
import { EngineError, Logger } from '@loanledger/core';
import type {
  Attribute,
  CalculationTrace,
  ComplianceReport,
  GroupingConflict,
  InstrumentGroup,
  LoanDocument,
  LoanProfile,
  ManualEntry,
  OracleJudgment,
} from '@loanledger/core';
import type { AuditEntry, AuditTrail } from '../audit/audit-trail.js';
import type { ComplianceRuleEngine } from '../compliance/rule-engine.js';
import type { DocumentSource, LoanPipeline } from '../pipeline/loan-pipeline.js';
import { toIsoDate } from '../pipeline/run-context.js';
import type { RecordStore, ReconciliationSnapshot } from '../store/record-store.js';

export interface LoanRecordServiceOptions {
  store: RecordStore;
  pipeline: LoanPipeline;
  ruleEngine: ComplianceRuleEngine;
  documentSource?: DocumentSource;
  audit?: AuditTrail;
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
}

export interface InstrumentGroupsView {
  groups: InstrumentGroup[];
  conflicts: GroupingConflict[];
}

export interface ReconcileLoanOptions {
  /** Documents to reconcile; read from the document source when absent */
  documents?: LoanDocument[];
  profile?: Omit<LoanProfile, 'loanId'>;
  actor?: string;
}

function loanNotFound(loanId: string): EngineError {
  return new EngineError({
    code: 'LOAN_NOT_FOUND',
    message: `Loan ${loanId} has not been reconciled`,
    suggestion: 'Run reconciliation for the loan first.',
    context: { loanId },
  });
}

/** Judgments of classified documents, keyed by document id */
export function storedJudgments(snapshot: ReconciliationSnapshot): Map<string, OracleJudgment> {
  const out = new Map<string, OracleJudgment>();
  for (const record of snapshot.documents) {
    if (record.classificationStatus === 'classified' && record.judgment) {
      out.set(record.document.id, record.judgment);
    }
  }
  return out;
}

export class LoanRecordService {
  private readonly store: RecordStore;
  private readonly pipeline: LoanPipeline;
  private readonly ruleEngine: ComplianceRuleEngine;
  private readonly documentSource: DocumentSource | undefined;
  private readonly audit: AuditTrail | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private readonly runQueue = new Map<string, Promise<unknown>>();

  constructor(options: LoanRecordServiceOptions) {
    this.store = options.store;
    this.pipeline = options.pipeline;
    this.ruleEngine = options.ruleEngine;
    this.documentSource = options.documentSource;
    this.audit = options.audit;
    this.logger = options.logger ?? Logger.silent();
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  async getReconciledAttributes(loanId: string): Promise<Attribute[]> {
    return (await this.requireSnapshot(loanId)).attributes;
  }

  async getCalculationTrace(loanId: string, attributeName: string): Promise<CalculationTrace> {
    const snapshot = await this.requireSnapshot(loanId);
    const trace = snapshot.traces.find((t) => t.attributeName === attributeName);
    if (!trace) {
      throw new EngineError({
        code: 'MISSING_ATTRIBUTE',
        message: `Loan ${loanId} has no calculation trace for ${attributeName}`,
        suggestion: `Traced attributes: ${snapshot.traces.map((t) => t.attributeName).join(', ') || 'none'}`,
        context: { loanId, attributeName },
      });
    }
    return trace;
  }

  async getComplianceResults(loanId: string, executionId?: string): Promise<ComplianceReport> {
    const report = await this.store.getComplianceReport(loanId, executionId);
    if (report) return report;
    if (executionId !== undefined) {
      throw new EngineError({
        code: 'LOAN_NOT_FOUND',
        message: `Loan ${loanId} has no compliance execution ${executionId}`,
        context: { loanId, executionId },
      });
    }
    throw new EngineError({
      code: 'LOAN_NOT_FOUND',
      message: `Loan ${loanId} has no compliance results`,
      suggestion: 'Run compliance for the loan first.',
      context: { loanId },
    });
  }

  async getInstrumentGroups(loanId: string): Promise<InstrumentGroupsView> {
    const snapshot = await this.requireSnapshot(loanId);
    return { groups: snapshot.groups, conflicts: snapshot.conflicts };
  }

  /**
   * Reconcile a loan from scratch. Every document goes to the oracle.
   */
  reconcileLoan(loanId: string, options: ReconcileLoanOptions = {}): Promise<ReconciliationSnapshot> {
    return this.exclusive(loanId, async () => {
      const documents = options.documents ?? (await this.listDocuments(loanId));
      return this.runReconciliation(loanId, documents, new Map(), options);
    });
  }

  /**
   * Re-run reconciliation, reusing the oracle judgments already stored.
   * With unchanged inputs the resulting record is unchanged.
   */
  reRunReconciliation(loanId: string, actor?: string): Promise<ReconciliationSnapshot> {
    return this.exclusive(loanId, async () => {
      const previous = await this.requireSnapshot(loanId);
      const documents = this.documentSource
        ? await this.listDocuments(loanId)
        : previous.documents.map((r) => r.document);
      return this.runReconciliation(loanId, documents, storedJudgments(previous), { actor });
    });
  }

  /**
   * Evaluate the rule catalog against the stored record and append the results
   * under a new execution id.
   */
  reRunCompliance(loanId: string, actor?: string): Promise<ComplianceReport> {
    return this.exclusive(loanId, async () => {
      const snapshot = await this.requireSnapshot(loanId);
      const executionId = this.idFactory();
      const report = await this.ruleEngine.evaluate({
        loanId,
        executionId,
        profile: snapshot.profile,
        asOf: toIsoDate(this.now()),
        attributes: snapshot.attributes,
        traces: snapshot.traces,
      });
      await this.store.appendComplianceReport(report);
      await this.record({
        event: 'compliance',
        loanId,
        runId: executionId,
        timestamp: report.executedAt,
        ...(actor !== undefined ? { actor } : {}),
        details: { overallStatus: report.overallStatus, ...report.summary },
      });
      return report;
    });
  }

  /**
   * Record a reviewer-entered value. It takes effect on the next reconciliation.
   */
  addManualEntry(loanId: string, entry: ManualEntry): Promise<void> {
    return this.exclusive(loanId, async () => {
      await this.requireSnapshot(loanId);
      await this.store.addManualEntry(loanId, entry);
      await this.record({
        event: 'manual_entry',
        loanId,
        runId: this.idFactory(),
        timestamp: this.now(),
        actor: entry.enteredBy,
        details: {
          attributeName: entry.attributeName,
          documentId: entry.documentId,
          page: entry.page,
        },
      });
    });
  }

  private async runReconciliation(
    loanId: string,
    documents: LoanDocument[],
    judgments: ReadonlyMap<string, OracleJudgment>,
    options: Pick<ReconcileLoanOptions, 'profile' | 'actor'>
  ): Promise<ReconciliationSnapshot> {
    const manualEntries = await this.store.getManualEntries(loanId);
    const snapshot = await this.pipeline.reconcile(loanId, documents, {
      judgments,
      manualEntries,
      ...(options.profile ? { profile: options.profile } : {}),
    });
    await this.store.saveReconciliation(snapshot);
    await this.record({
      event: 'reconciliation',
      loanId,
      runId: snapshot.runId,
      timestamp: snapshot.createdAt,
      ...(options.actor !== undefined ? { actor: options.actor } : {}),
      details: {
        documents: snapshot.documents.length,
        groups: snapshot.groups.length,
        conflicts: snapshot.conflicts.length,
        failures: snapshot.failures.length,
      },
    });
    return snapshot;
  }

  private async requireSnapshot(loanId: string): Promise<ReconciliationSnapshot> {
    const snapshot = await this.store.getReconciliation(loanId);
    if (!snapshot) throw loanNotFound(loanId);
    return snapshot;
  }

  private async listDocuments(loanId: string): Promise<LoanDocument[]> {
    if (!this.documentSource) {
      throw new EngineError({
        code: 'INVALID_CONFIG',
        message: `No documents given for loan ${loanId} and no document source configured`,
        context: { loanId },
      });
    }
    const documents = await this.documentSource.listDocuments(loanId);
    if (documents.length === 0) throw loanNotFound(loanId);
    return documents;
  }

  /** Audit failures are logged, never surfaced: the run itself succeeded */
  private async record(entry: AuditEntry): Promise<void> {
    if (!this.audit) return;
    try {
      await this.audit.append(entry);
    } catch (err) {
      this.logger.error('audit write failed', {
        loanId: entry.loanId,
        runId: entry.runId,
        event: entry.event,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private exclusive<T>(loanId: string, op: () => Promise<T>): Promise<T> {
    const previous = this.runQueue.get(loanId) ?? Promise.resolve();
    const next = previous.then(op, op);
    const settled: Promise<unknown> = next.then(
      () => undefined,
      () => undefined
    );
    this.runQueue.set(loanId, settled);
    void settled.then(() => {
      if (this.runQueue.get(loanId) === settled) this.runQueue.delete(loanId);
    });
    return next;
  }
}
