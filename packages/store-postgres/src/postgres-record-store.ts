/**
 * PostgreSQL Record Store
 *
 * Snapshots are kept as JSONB, one row per loan. Compliance executions and
 * their results are append-only rows; an execution id can be written once.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { EngineError, Logger } from '@loanledger/core';
import type {
  ComplianceReport,
  ComplianceResult,
  ComplianceSummary,
  EvidenceBundle,
  ManualEntry,
  PresentFieldValue,
} from '@loanledger/core';
import type {
  ComplianceExecutionSummary,
  RecordStore,
  ReconciliationSnapshot,
} from '@loanledger/engine';
import { sqlStateOf } from './client.js';
import type { SqlDatabase, SqlExecutor } from './client.js';

export const SCHEMA_SQL_PATH = fileURLToPath(new URL('../sql/schema.sql', import.meta.url));

const UNIQUE_VIOLATION = '23505';

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export interface PostgresRecordStoreOptions {
  /** Database schema holding the tables (default: public) */
  schema?: string;
  logger?: Logger;
}

type SnapshotPayload = Omit<ReconciliationSnapshot, 'loanId' | 'runId' | 'createdAt'>;

type ReconciliationRow = {
  run_id: string;
  created_at: Date;
  payload: SnapshotPayload;
};

type ExecutionRow = {
  execution_id: string;
  loan_id: string;
  executed_at: Date;
  overall_status: ComplianceReport['overallStatus'];
  summary: ComplianceSummary;
};

type ResultRow = {
  result_id: string;
  execution_id: string;
  loan_id: string;
  rule_code: string;
  rule_name: string;
  category: ComplianceResult['category'];
  severity: ComplianceResult['severity'];
  status: ComplianceResult['status'];
  message: string;
  expected_value: string | null;
  actual_value: string | null;
  variance: string | null;
  evidence: EvidenceBundle | null;
  manual_review: boolean;
  regulation_reference: string | null;
  checked_at: Date;
};

type ManualEntryRow = {
  attribute_name: string;
  value: PresentFieldValue;
  document_id: string;
  page: number;
  entered_by: string;
};

function validateIdentifier(name: string): string {
  if (!VALID_IDENTIFIER.test(name)) {
    throw new EngineError({
      code: 'INVALID_CONFIG',
      message: `Invalid schema name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      suggestion: 'Use a plain SQL identifier for the store schema.',
    });
  }
  return name;
}

function toResult(row: ResultRow): ComplianceResult {
  return {
    resultId: row.result_id,
    loanId: row.loan_id,
    executionId: row.execution_id,
    ruleCode: row.rule_code,
    ruleName: row.rule_name,
    category: row.category,
    severity: row.severity,
    status: row.status,
    message: row.message,
    expectedValue: row.expected_value,
    actualValue: row.actual_value,
    variance: row.variance,
    evidence: row.evidence,
    manualReview: row.manual_review,
    ...(row.regulation_reference !== null ? { regulationReference: row.regulation_reference } : {}),
    checkedAt: row.checked_at,
  };
}

export class PostgresRecordStore implements RecordStore {
  private readonly schema: string;
  private readonly logger: Logger;

  constructor(
    private readonly db: SqlDatabase,
    options: PostgresRecordStoreOptions = {}
  ) {
    this.schema = validateIdentifier(options.schema ?? 'public');
    this.logger = options.logger ?? Logger.silent();
  }

  private table(name: string): string {
    return `"${this.schema}".${name}`;
  }

  /**
   * Create the tables when they do not exist yet
   */
  async ensureSchema(): Promise<void> {
    const sql = (await readFile(SCHEMA_SQL_PATH, 'utf-8')).replaceAll('{{schema}}', this.schema);
    await this.db.query(sql);
    this.logger.info('record store schema ready', { schema: this.schema });
  }

  async saveReconciliation(snapshot: ReconciliationSnapshot): Promise<void> {
    const { loanId, runId, createdAt, ...payload } = snapshot;
    await this.db.query(
      `INSERT INTO ${this.table('reconciliations')} (loan_id, run_id, created_at, payload)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (loan_id) DO UPDATE
         SET run_id = EXCLUDED.run_id, created_at = EXCLUDED.created_at, payload = EXCLUDED.payload`,
      [loanId, runId, createdAt, JSON.stringify(payload)]
    );
  }

  async getReconciliation(loanId: string): Promise<ReconciliationSnapshot | null> {
    const { rows } = await this.db.query<ReconciliationRow>(
      `SELECT run_id, created_at, payload FROM ${this.table('reconciliations')} WHERE loan_id = $1`,
      [loanId]
    );
    const row = rows[0];
    if (!row) return null;
    return { loanId, runId: row.run_id, createdAt: row.created_at, ...row.payload };
  }

  async appendComplianceReport(report: ComplianceReport): Promise<void> {
    try {
      await this.db.transaction(async (tx) => {
        await tx.query(
          `INSERT INTO ${this.table('compliance_executions')}
             (execution_id, loan_id, executed_at, overall_status, summary)
           VALUES ($1, $2, $3, $4, $5)`,
          [
            report.executionId,
            report.loanId,
            report.executedAt,
            report.overallStatus,
            JSON.stringify(report.summary),
          ]
        );
        for (const [position, result] of report.results.entries()) {
          await this.insertResult(tx, position, result);
        }
      });
    } catch (error) {
      if (sqlStateOf(error) === UNIQUE_VIOLATION) {
        throw new EngineError({
          code: 'STORE_ERROR',
          message: `Compliance execution ${report.executionId} already recorded for loan ${report.loanId}`,
          suggestion: 'Compliance results are append-only; start a new execution instead.',
          cause: error instanceof Error ? error : undefined,
          context: { loanId: report.loanId, executionId: report.executionId },
        });
      }
      throw error;
    }
  }

  async getComplianceReport(loanId: string, executionId?: string): Promise<ComplianceReport | null> {
    const { rows } =
      executionId === undefined
        ? await this.db.query<ExecutionRow>(
            `SELECT execution_id, loan_id, executed_at, overall_status, summary
             FROM ${this.table('compliance_executions')}
             WHERE loan_id = $1 ORDER BY seq DESC LIMIT 1`,
            [loanId]
          )
        : await this.db.query<ExecutionRow>(
            `SELECT execution_id, loan_id, executed_at, overall_status, summary
             FROM ${this.table('compliance_executions')}
             WHERE loan_id = $1 AND execution_id = $2`,
            [loanId, executionId]
          );
    const execution = rows[0];
    if (!execution) return null;

    const results = await this.db.query<ResultRow>(
      `SELECT result_id, execution_id, loan_id, rule_code, rule_name, category, severity, status,
              message, expected_value, actual_value, variance, evidence, manual_review,
              regulation_reference, checked_at
       FROM ${this.table('compliance_results')}
       WHERE execution_id = $1 ORDER BY position`,
      [execution.execution_id]
    );

    return {
      loanId: execution.loan_id,
      executionId: execution.execution_id,
      executedAt: execution.executed_at,
      overallStatus: execution.overall_status,
      summary: execution.summary,
      results: results.rows.map(toResult),
    };
  }

  async listComplianceExecutions(loanId: string): Promise<ComplianceExecutionSummary[]> {
    const { rows } = await this.db.query<ExecutionRow>(
      `SELECT execution_id, loan_id, executed_at, overall_status, summary
       FROM ${this.table('compliance_executions')}
       WHERE loan_id = $1 ORDER BY seq`,
      [loanId]
    );
    return rows.map((row) => ({
      executionId: row.execution_id,
      executedAt: row.executed_at,
      overallStatus: row.overall_status,
      total: row.summary.total,
    }));
  }

  async getManualEntries(loanId: string): Promise<ManualEntry[]> {
    const { rows } = await this.db.query<ManualEntryRow>(
      `SELECT attribute_name, value, document_id, page, entered_by
       FROM ${this.table('manual_entries')}
       WHERE loan_id = $1 ORDER BY id`,
      [loanId]
    );
    return rows.map((row) => ({
      attributeName: row.attribute_name,
      value: row.value,
      documentId: row.document_id,
      page: row.page,
      enteredBy: row.entered_by,
    }));
  }

  async addManualEntry(loanId: string, entry: ManualEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO ${this.table('manual_entries')}
         (loan_id, attribute_name, value, document_id, page, entered_by)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [loanId, entry.attributeName, JSON.stringify(entry.value), entry.documentId, entry.page, entry.enteredBy]
    );
  }

  async close(): Promise<void> {
    await this.db.disconnect();
  }

  private async insertResult(tx: SqlExecutor, position: number, result: ComplianceResult): Promise<void> {
    await tx.query(
      `INSERT INTO ${this.table('compliance_results')}
         (result_id, execution_id, loan_id, position, rule_code, rule_name, category, severity,
          status, message, expected_value, actual_value, variance, evidence, manual_review,
          regulation_reference, checked_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)`,
      [
        result.resultId,
        result.executionId,
        result.loanId,
        position,
        result.ruleCode,
        result.ruleName,
        result.category,
        result.severity,
        result.status,
        result.message,
        result.expectedValue,
        result.actualValue,
        result.variance,
        result.evidence === null ? null : JSON.stringify(result.evidence),
        result.manualReview,
        result.regulationReference ?? null,
        result.checkedAt,
      ]
    );
  }
}
