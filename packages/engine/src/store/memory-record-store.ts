import { EngineError } from '@loanledger/core';
import type { ComplianceReport, ManualEntry } from '@loanledger/core';
import type {
  ComplianceExecutionSummary,
  RecordStore,
  ReconciliationSnapshot,
} from './record-store.js';

/**
 * Process-local store. Values are cloned on the way in and out so callers
 * never share state with the store.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly snapshots = new Map<string, ReconciliationSnapshot>();
  private readonly reports = new Map<string, ComplianceReport[]>();
  private readonly manual = new Map<string, ManualEntry[]>();

  async saveReconciliation(snapshot: ReconciliationSnapshot): Promise<void> {
    this.snapshots.set(snapshot.loanId, structuredClone(snapshot));
  }

  async getReconciliation(loanId: string): Promise<ReconciliationSnapshot | null> {
    const snapshot = this.snapshots.get(loanId);
    return snapshot ? structuredClone(snapshot) : null;
  }

  async appendComplianceReport(report: ComplianceReport): Promise<void> {
    const existing = this.reports.get(report.loanId) ?? [];
    if (existing.some((r) => r.executionId === report.executionId)) {
      throw new EngineError({
        code: 'STORE_ERROR',
        message: `Compliance execution ${report.executionId} already recorded for loan ${report.loanId}`,
        suggestion: 'Compliance results are append-only; start a new execution instead.',
        context: { loanId: report.loanId, executionId: report.executionId },
      });
    }
    this.reports.set(report.loanId, [...existing, structuredClone(report)]);
  }

  async getComplianceReport(loanId: string, executionId?: string): Promise<ComplianceReport | null> {
    const reports = this.reports.get(loanId) ?? [];
    const report =
      executionId === undefined
        ? reports[reports.length - 1]
        : reports.find((r) => r.executionId === executionId);
    return report ? structuredClone(report) : null;
  }

  async listComplianceExecutions(loanId: string): Promise<ComplianceExecutionSummary[]> {
    return (this.reports.get(loanId) ?? []).map((r) => ({
      executionId: r.executionId,
      executedAt: new Date(r.executedAt.getTime()),
      overallStatus: r.overallStatus,
      total: r.summary.total,
    }));
  }

  async getManualEntries(loanId: string): Promise<ManualEntry[]> {
    return structuredClone(this.manual.get(loanId) ?? []);
  }

  async addManualEntry(loanId: string, entry: ManualEntry): Promise<void> {
    this.manual.set(loanId, [...(this.manual.get(loanId) ?? []), structuredClone(entry)]);
  }
}
