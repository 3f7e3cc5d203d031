import { describe, expect, it } from 'vitest';
import type { ComplianceReport } from '@loanledger/core';
import { MemoryRecordStore } from '../src/store/memory-record-store.js';
import type { ReconciliationSnapshot } from '../src/store/record-store.js';
import { sourced } from './fixtures.js';

function snapshot(runId: string): ReconciliationSnapshot {
  return {
    loanId: 'L1',
    runId,
    createdAt: new Date('2024-06-01T12:00:00Z'),
    documents: [],
    groups: [],
    conflicts: [],
    attributes: [sourced('loan_amount', { kind: 'number', value: 300000 })],
    traces: [],
    failures: [],
    profile: { loanId: 'L1' },
  };
}

function report(executionId: string): ComplianceReport {
  return {
    loanId: 'L1',
    executionId,
    executedAt: new Date('2024-06-01T12:00:00Z'),
    overallStatus: 'PASS',
    summary: {
      total: 0,
      passed: 0,
      failed: 0,
      warnings: 0,
      notApplicable: 0,
      errors: 0,
      pendingReview: 0,
      manualReview: 0,
    },
    results: [],
  };
}

describe('MemoryRecordStore', () => {
  it('keeps the latest reconciliation per loan', async () => {
    const store = new MemoryRecordStore();
    expect(await store.getReconciliation('L1')).toBeNull();

    await store.saveReconciliation(snapshot('run-1'));
    await store.saveReconciliation(snapshot('run-2'));
    expect((await store.getReconciliation('L1'))?.runId).toBe('run-2');
  });

  it('does not share state with callers', async () => {
    const store = new MemoryRecordStore();
    const saved = snapshot('run-1');
    await store.saveReconciliation(saved);
    saved.attributes.length = 0;

    const loaded = await store.getReconciliation('L1');
    expect(loaded?.attributes).toHaveLength(1);
    expect(loaded?.createdAt).toEqual(new Date('2024-06-01T12:00:00Z'));
  });

  it('appends compliance executions and rejects a repeated id', async () => {
    const store = new MemoryRecordStore();
    await store.appendComplianceReport(report('exec-1'));
    await store.appendComplianceReport(report('exec-2'));

    expect((await store.getComplianceReport('L1'))?.executionId).toBe('exec-2');
    expect((await store.getComplianceReport('L1', 'exec-1'))?.executionId).toBe('exec-1');
    expect(await store.getComplianceReport('L1', 'exec-3')).toBeNull();
    expect(await store.listComplianceExecutions('L1')).toEqual([
      { executionId: 'exec-1', executedAt: new Date('2024-06-01T12:00:00Z'), overallStatus: 'PASS', total: 0 },
      { executionId: 'exec-2', executedAt: new Date('2024-06-01T12:00:00Z'), overallStatus: 'PASS', total: 0 },
    ]);

    await expect(store.appendComplianceReport(report('exec-1'))).rejects.toMatchObject({
      code: 'STORE_ERROR',
      message: 'Compliance execution exec-1 already recorded for loan L1',
    });
  });

  it('accumulates manual entries in order', async () => {
    const store = new MemoryRecordStore();
    const entry = {
      attributeName: 'note_rate',
      value: { kind: 'number', value: 6.5 },
      documentId: 'le-2',
      page: 1,
      enteredBy: 'reviewer',
    } as const;
    await store.addManualEntry('L1', entry);
    await store.addManualEntry('L1', { ...entry, value: { kind: 'number', value: 6.25 } });

    expect((await store.getManualEntries('L1')).map((e) => e.value)).toEqual([
      { kind: 'number', value: 6.5 },
      { kind: 'number', value: 6.25 },
    ]);
    expect(await store.getManualEntries('L2')).toEqual([]);
  });
});
