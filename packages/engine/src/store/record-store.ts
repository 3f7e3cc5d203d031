/**
 * Persisted engine state
 *
 * One reconciliation snapshot per loan (replaced on every run) and an
 * append-only log of compliance reports keyed by execution id.
 */

import type {
  Attribute,
  CalculationTrace,
  ComplianceReport,
  DocumentRecord,
  FailureRecord,
  GroupingConflict,
  InstrumentGroup,
  LoanProfile,
  ManualEntry,
} from '@loanledger/core';

export interface ReconciliationSnapshot {
  loanId: string;
  runId: string;
  createdAt: Date;
  documents: DocumentRecord[];
  groups: InstrumentGroup[];
  conflicts: GroupingConflict[];
  attributes: Attribute[];
  traces: CalculationTrace[];
  failures: FailureRecord[];
  profile: LoanProfile;
}

export interface ComplianceExecutionSummary {
  executionId: string;
  executedAt: Date;
  overallStatus: ComplianceReport['overallStatus'];
  total: number;
}

export interface RecordStore {
  saveReconciliation(snapshot: ReconciliationSnapshot): Promise<void>;
  getReconciliation(loanId: string): Promise<ReconciliationSnapshot | null>;

  /** Appends; an execution id already stored is rejected */
  appendComplianceReport(report: ComplianceReport): Promise<void>;
  /** Latest report when no execution id is given */
  getComplianceReport(loanId: string, executionId?: string): Promise<ComplianceReport | null>;
  /** Oldest first */
  listComplianceExecutions(loanId: string): Promise<ComplianceExecutionSummary[]>;

  getManualEntries(loanId: string): Promise<ManualEntry[]>;
  addManualEntry(loanId: string, entry: ManualEntry): Promise<void>;

  close?(): Promise<void>;
}
