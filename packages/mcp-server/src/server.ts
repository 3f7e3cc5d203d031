/**
 * MCP Server Implementation
 *
 * Exposes the loan record queries and the re-run operations as MCP tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { EngineError, Logger, coerceFieldValue, isPresent } from '@loanledger/core';
import {
  Semaphore,
  formatAttributes,
  formatCalculationTrace,
  formatComplianceReport,
  formatInstrumentGroups,
  withTimeout,
} from '@loanledger/engine';
import type { LoanRecordService, ReconciliationSnapshot } from '@loanledger/engine';
import type { ManifestDocumentSource } from './manifest-source.js';
import { createTraceId, getTraceId, runWithTelemetry } from './telemetry.js';

export interface ServerRuntimeConfig {
  maxToolConcurrency?: number;
  toolTimeoutMs?: number;
}

export interface ServerConfig {
  name: string;
  version: string;
  service: LoanRecordService;
  /** Lets list_loans enumerate the manifest */
  documentSource?: ManifestDocumentSource;
  logger?: Logger;
  runtime?: ServerRuntimeConfig;
}

/** Helper to create a text content item */
function textContent(text: string) {
  return { type: 'text' as const, text };
}

function withTrace(text: string): string {
  const traceId = getTraceId();
  return traceId ? `trace_id: ${traceId}\n\n${text}` : text;
}

/** Helper to create a text result */
function text(body: string): CallToolResult {
  return { content: [textContent(withTrace(body))] };
}

/** Helper to create a JSON result */
function json(data: unknown): CallToolResult {
  const traceId = getTraceId();
  const payload = traceId ? { trace_id: traceId, data } : data;
  return { content: [textContent(JSON.stringify(payload, null, 2))] };
}

/** Format errors for MCP response */
function formatError(err: unknown): CallToolResult {
  const message =
    err instanceof EngineError
      ? err.toActionableMessage()
      : err instanceof Error
        ? err.message
        : String(err);
  return { content: [textContent(withTrace(message))], isError: true };
}

export function formatReconciliationSummary(snapshot: ReconciliationSnapshot): string {
  const count = (status: string) =>
    snapshot.documents.filter((d) => d.classificationStatus === status).length;
  const sourced = snapshot.attributes.filter((a) => a.status === 'sourced').length;
  const verified = snapshot.traces.filter((t) => t.verification.status === 'MATCH').length;

  const lines = [
    `## Reconciliation: ${snapshot.loanId}`,
    `Run: ${snapshot.runId}`,
    `Created: ${snapshot.createdAt.toISOString()}`,
    '',
    `- Documents: ${snapshot.documents.length} (classified ${count('classified')}, needs review ${count('needs_review')}, skipped ${count('skipped')})`,
    `- Instrument groups: ${snapshot.groups.length}`,
    `- Grouping conflicts: ${snapshot.conflicts.length}`,
    `- Attributes sourced: ${sourced} of ${snapshot.attributes.length}`,
    `- Calculations verified: ${verified} of ${snapshot.traces.length}`,
  ];

  if (snapshot.failures.length > 0) {
    lines.push('', `### Failures (${snapshot.failures.length})`);
    for (const failure of snapshot.failures) {
      const where = [
        failure.documentId,
        failure.attributeName,
        failure.ruleCode,
      ].filter((v): v is string => v !== undefined);
      const ref = where.length > 0 ? ` [${where.join(' ')}]` : '';
      lines.push(`- ${failure.stage} ${failure.code}${ref}: ${failure.message}`);
    }
  }
  return lines.join('\n');
}

const loanIdSchema = z.string().min(1).describe('Loan identifier');
const formatSchema = z
  .enum(['text', 'json'])
  .optional()
  .describe('Output format (default: text)');
const actorSchema = z.string().min(1).optional().describe('Who requested the run, recorded in the audit trail');

export function createServer(config: ServerConfig): McpServer {
  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  const { service } = config;
  const logger = config.logger ?? Logger.silent();
  const toolSemaphore = new Semaphore(config.runtime?.maxToolConcurrency ?? 25);
  const toolTimeoutMs = config.runtime?.toolTimeoutMs ?? 120_000;

  const invoke = async (
    toolName: string,
    loanId: string | undefined,
    handler: () => Promise<CallToolResult>
  ): Promise<CallToolResult> => {
    const traceId = createTraceId();
    return runWithTelemetry(
      { traceId, tool: toolName, ...(loanId !== undefined ? { loanId } : {}) },
      async () => {
        const queuedAt = Date.now();
        const release = await toolSemaphore.acquire();
        const waitMs = Date.now() - queuedAt;
        const start = Date.now();
        try {
          const result = await withTimeout(
            () => handler(),
            toolTimeoutMs,
            () => new Error(`Tool '${toolName}' timed out after ${toolTimeoutMs}ms`)
          );
          logger.info('Tool invocation completed', {
            traceId,
            tool: toolName,
            loanId,
            durationMs: Date.now() - start,
            waitMs: waitMs > 0 ? waitMs : undefined,
          });
          return result;
        } catch (err) {
          logger.error('Tool invocation failed', {
            traceId,
            tool: toolName,
            loanId,
            durationMs: Date.now() - start,
            error: err,
          });
          return formatError(err);
        } finally {
          release();
        }
      }
    );
  };

  // Tool: list_loans
  server.registerTool(
    'list_loans',
    {
      description: 'List the loans in the document manifest.',
      annotations: { readOnlyHint: true },
    },
    async () =>
      invoke('list_loans', undefined, async () => {
        if (!config.documentSource) {
          throw new EngineError({
            code: 'INVALID_CONFIG',
            message: 'No document manifest configured',
            suggestion: 'Set documents.manifest in the config file.',
          });
        }
        const loans = await config.documentSource.listLoans();
        return json({ loans, count: loans.length });
      })
  );

  // Tool: reconcile_loan
  server.registerTool(
    'reconcile_loan',
    {
      description:
        'Reconcile a loan from scratch: fingerprint and classify every document, group instruments, resolve versions, reconcile attributes and verify calculations. Calls the classification oracle for every document.',
      inputSchema: { loan_id: loanIdSchema, actor: actorSchema },
    },
    async (args) =>
      invoke('reconcile_loan', args.loan_id, async () => {
        const snapshot = await service.reconcileLoan(args.loan_id, {
          ...(args.actor !== undefined ? { actor: args.actor } : {}),
        });
        return text(formatReconciliationSummary(snapshot));
      })
  );

  // Tool: get_reconciled_attributes
  server.registerTool(
    'get_reconciled_attributes',
    {
      description:
        'Get the reconciled attributes of a loan. Each sourced value cites the document and page it was read from and the fallback tier it came from.',
      inputSchema: { loan_id: loanIdSchema, format: formatSchema },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      invoke('get_reconciled_attributes', args.loan_id, async () => {
        const attributes = await service.getReconciledAttributes(args.loan_id);
        return args.format === 'json' ? json(attributes) : text(formatAttributes(args.loan_id, attributes));
      })
  );

  // Tool: get_calculation_trace
  server.registerTool(
    'get_calculation_trace',
    {
      description:
        'Get how a calculated attribute (e.g. dti_ratio, ltv_ratio) was derived: each input with its source citation, each formula, and whether the recomputed value matches the reported one within tolerance.',
      inputSchema: {
        loan_id: loanIdSchema,
        attribute_name: z.string().min(1).describe('Calculated attribute, e.g. dti_ratio'),
        format: formatSchema,
      },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      invoke('get_calculation_trace', args.loan_id, async () => {
        const trace = await service.getCalculationTrace(args.loan_id, args.attribute_name);
        return args.format === 'json' ? json(trace) : text(formatCalculationTrace(trace));
      })
  );

  // Tool: get_compliance_results
  server.registerTool(
    'get_compliance_results',
    {
      description:
        'Get compliance rule results for a loan: the latest execution, or a specific one by execution_id. Results cite the evidence documents.',
      inputSchema: {
        loan_id: loanIdSchema,
        execution_id: z.string().min(1).optional().describe('Compliance execution id (default: latest)'),
        format: formatSchema,
      },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      invoke('get_compliance_results', args.loan_id, async () => {
        const report = await service.getComplianceResults(args.loan_id, args.execution_id);
        return args.format === 'json' ? json(report) : text(formatComplianceReport(report));
      })
  );

  // Tool: get_instrument_groups
  server.registerTool(
    'get_instrument_groups',
    {
      description:
        'Get the instrument groups of a loan with their version order, master document and any grouping conflicts.',
      inputSchema: { loan_id: loanIdSchema, format: formatSchema },
      annotations: { readOnlyHint: true },
    },
    async (args) =>
      invoke('get_instrument_groups', args.loan_id, async () => {
        const { groups, conflicts } = await service.getInstrumentGroups(args.loan_id);
        return args.format === 'json'
          ? json({ groups, conflicts })
          : text(formatInstrumentGroups(args.loan_id, groups, conflicts));
      })
  );

  // Tool: rerun_reconciliation
  server.registerTool(
    'rerun_reconciliation',
    {
      description:
        'Re-run reconciliation for a loan, reusing the stored oracle judgments. Only documents without a judgment go to the oracle. Manual entries take effect here.',
      inputSchema: { loan_id: loanIdSchema, actor: actorSchema },
    },
    async (args) =>
      invoke('rerun_reconciliation', args.loan_id, async () => {
        const snapshot = await service.reRunReconciliation(args.loan_id, args.actor);
        return text(formatReconciliationSummary(snapshot));
      })
  );

  // Tool: rerun_compliance
  server.registerTool(
    'rerun_compliance',
    {
      description:
        'Evaluate the compliance rule catalog against the stored record of a loan. Results are appended under a new execution id; earlier executions are kept.',
      inputSchema: { loan_id: loanIdSchema, actor: actorSchema },
    },
    async (args) =>
      invoke('rerun_compliance', args.loan_id, async () => {
        const report = await service.reRunCompliance(args.loan_id, args.actor);
        return text(formatComplianceReport(report));
      })
  );

  // Tool: add_manual_entry
  server.registerTool(
    'add_manual_entry',
    {
      description:
        'Record a value a reviewer read from a document. It outranks every document tier on the next rerun_reconciliation.',
      inputSchema: {
        loan_id: loanIdSchema,
        attribute_name: z.string().min(1).describe('Attribute the value belongs to'),
        value: z.union([z.number(), z.string(), z.boolean()]).describe('Value as read from the document'),
        document_id: z.string().min(1).describe('Document the value was read from'),
        page: z.number().int().min(1).describe('Page the value was read from'),
        entered_by: z.string().min(1).describe('Reviewer'),
      },
    },
    async (args) =>
      invoke('add_manual_entry', args.loan_id, async () => {
        const value = coerceFieldValue(args.value);
        if (!isPresent(value)) {
          throw new EngineError({
            code: 'MISSING_ATTRIBUTE',
            message: `Manual entry for ${args.attribute_name} has no value`,
            context: { loanId: args.loan_id, attributeName: args.attribute_name },
          });
        }
        await service.addManualEntry(args.loan_id, {
          attributeName: args.attribute_name,
          value,
          documentId: args.document_id,
          page: args.page,
          enteredBy: args.entered_by,
        });
        return text(
          `Recorded ${args.attribute_name} for loan ${args.loan_id}. Run rerun_reconciliation to apply it.`
        );
      })
  );

  return server;
}

export async function runServer(
  config: ServerConfig & { onShutdown?: () => Promise<void> }
): Promise<void> {
  const logger = config.logger ?? Logger.silent();
  const server = createServer({ ...config, logger });

  const shutdown = async (signal: string) => {
    try {
      await server.close();
      await config.onShutdown?.();
      logger.info('Shutdown complete', { signal });
    } catch (err) {
      logger.error('Shutdown failed', { signal, error: err });
    } finally {
      process.exit(0);
    }
  };

  const transport = new StdioServerTransport();

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.connect(transport);

  logger.info('MCP server started', {
    name: config.name,
    version: config.version,
    transport: 'stdio',
  });
}
