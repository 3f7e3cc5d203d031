import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { bootstrap } from '../src/bootstrap.js';
import type { EngineRuntime } from '../src/bootstrap.js';
import { parseConfig } from '../src/config.js';
import { createServer } from '../src/server.js';

const ORACLE_RESPONSES: Record<string, unknown> = {
  'app-1': {
    type_label: 'Uniform Residential Loan Application',
    structured_fields: {
      application_date: { value: '03/01/2024', page: 1 },
      base_monthly_income: { value: '$7,000.00', page: 2 },
      other_monthly_income: { value: 1000, page: 2 },
      loan_amount: { value: 299000, page: 1 },
    },
  },
  'ts-1': {
    type_label: 'Transmittal Summary (1008)',
    structured_fields: {
      loan_type: { value: 'Conventional', page: 1 },
      property_state: { value: 'tx', page: 1 },
      loan_amount: { value: 300000, page: 1 },
      appraised_value: { value: 400000, page: 1 },
      ltv_ratio: { value: 75, page: 1 },
      total_monthly_debt: { value: 3000, page: 2 },
      total_monthly_income: { value: 8000, page: 2 },
      dti_ratio: { value: '37.5%', page: 2 },
    },
  },
};

/** Stand-in for the classification service, answering by document id */
function oracleFetch(requested: string[]): typeof fetch {
  return async (_input, init) => {
    const body: unknown = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
    const id =
      typeof body === 'object' && body !== null && 'documentId' in body && typeof body.documentId === 'string'
        ? body.documentId
        : '';
    requested.push(id);
    const response = ORACLE_RESPONSES[id];
    return response === undefined
      ? new Response('unknown document', { status: 404 })
      : new Response(JSON.stringify(response), { status: 200 });
  };
}

function contentOf(result: unknown): { text: string; isError: boolean } {
  if (typeof result !== 'object' || result === null || !('content' in result) || !Array.isArray(result.content)) {
    throw new Error('tool result without content');
  }
  const first: unknown = result.content[0];
  if (typeof first !== 'object' || first === null || !('text' in first) || typeof first.text !== 'string') {
    throw new Error('tool result without text');
  }
  const isError = 'isError' in result && result.isError === true;
  return { text: first.text.replace(/^trace_id: [0-9a-f-]+\n\n/, ''), isError };
}

function dataOf(text: string): unknown {
  const parsed: unknown = JSON.parse(text);
  return typeof parsed === 'object' && parsed !== null && 'data' in parsed ? parsed.data : parsed;
}

describe('MCP server', () => {
  let dir: string;
  let runtime: EngineRuntime;
  let client: Client;
  let requested: string[];

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'loan-server-'));
    await writeFile(
      path.join(dir, 'manifest.json'),
      JSON.stringify({
        loans: {
          L1: [
            { id: 'app-1', pageCount: 4, exactHash: 'a'.repeat(64) },
            { id: 'ts-1', pageCount: 2, exactHash: 'd'.repeat(64) },
          ],
        },
      }),
      'utf-8'
    );

    const config = parseConfig(
      JSON.stringify({
        oracle: {
          url: 'http://oracle.test/classify',
          tokenEnv: 'ORACLE_TOKEN',
          retry: { attempts: 1 },
        },
        documents: { manifest: './manifest.json' },
        audit: { enabled: true, logDir: './audit' },
      }),
      dir
    );
    requested = [];
    runtime = await bootstrap(config, {
      env: { ORACLE_TOKEN: 'test-token' },
      fetch: oracleFetch(requested),
    });

    const server = createServer({
      name: 'loanledger-test',
      version: '0.0.0',
      service: runtime.service,
      ...(runtime.documentSource ? { documentSource: runtime.documentSource } : {}),
    });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await runtime.close();
    await rm(dir, { recursive: true, force: true });
  });

  async function call(name: string, args: Record<string, unknown> = {}) {
    return contentOf(await client.callTool({ name, arguments: args }));
  }

  it('lists the tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      'add_manual_entry',
      'get_calculation_trace',
      'get_compliance_results',
      'get_instrument_groups',
      'get_reconciled_attributes',
      'list_loans',
      'reconcile_loan',
      'rerun_compliance',
      'rerun_reconciliation',
    ]);
  });

  it('lists the loans in the manifest', async () => {
    const result = await call('list_loans');
    expect(dataOf(result.text)).toEqual({ loans: ['L1'], count: 1 });
  });

  it('returns an actionable error before the first reconciliation', async () => {
    const result = await call('get_reconciled_attributes', { loan_id: 'L1' });
    expect(result.isError).toBe(true);
    expect(result.text).toBe(
      'Error [LOAN_NOT_FOUND]: Loan L1 has not been reconciled\nReference: loan=L1\nSuggested action: Run reconciliation for the loan first.'
    );
  });

  it('reconciles a loan through the oracle and serves the record', async () => {
    const summary = await call('reconcile_loan', { loan_id: 'L1', actor: 'analyst' });
    expect(summary.isError).toBe(false);
    const lines = summary.text.split('\n');
    expect(lines[0]).toBe('## Reconciliation: L1');
    expect(lines).toContain('- Documents: 2 (classified 2, needs review 0, skipped 0)');
    expect(lines).toContain('- Instrument groups: 2');
    expect(lines).toContain('- Grouping conflicts: 0');
    expect(requested.sort()).toEqual(['app-1', 'ts-1']);

    const trace = await call('get_calculation_trace', { loan_id: 'L1', attribute_name: 'dti_ratio', format: 'json' });
    expect(dataOf(trace.text)).toMatchObject({
      attributeName: 'dti_ratio',
      derivedValue: 37.5,
      expectedValue: 37.5,
      verification: { status: 'MATCH' },
    });

    const groups = await call('get_instrument_groups', { loan_id: 'L1' });
    expect(groups.text.split('\n').slice(0, 2)).toEqual(['## Instrument Groups: L1', 'Groups: 2']);

    const audit = await runtime.audit?.readLoan('L1');
    expect(audit?.map((e) => [e.event, e.actor])).toEqual([['reconciliation', 'analyst']]);
  });

  it('reports a calculated attribute without a trace', async () => {
    await call('reconcile_loan', { loan_id: 'L1' });

    const result = await call('get_calculation_trace', { loan_id: 'L1', attribute_name: 'apr' });
    expect(result.isError).toBe(true);
    expect(result.text).toBe(
      'Error [MISSING_ATTRIBUTE]: Loan L1 has no calculation trace for apr\nReference: loan=L1 attribute=apr\nSuggested action: Traced attributes: dti_ratio, ltv_ratio, monthly_income'
    );
  });

  it('re-runs reconciliation without calling the oracle again', async () => {
    await call('reconcile_loan', { loan_id: 'L1' });
    requested.length = 0;

    const result = await call('rerun_reconciliation', { loan_id: 'L1' });
    expect(result.isError).toBe(false);
    expect(requested).toEqual([]);
  });

  it('applies a manual entry on the next re-run', async () => {
    await call('reconcile_loan', { loan_id: 'L1' });

    const recorded = await call('add_manual_entry', {
      loan_id: 'L1',
      attribute_name: 'note_rate',
      value: '6.5%',
      document_id: 'ts-1',
      page: 1,
      entered_by: 'analyst',
    });
    expect(recorded.text).toBe('Recorded note_rate for loan L1. Run rerun_reconciliation to apply it.');

    await call('rerun_reconciliation', { loan_id: 'L1' });
    const attributes = await call('get_reconciled_attributes', { loan_id: 'L1', format: 'json' });
    const data = dataOf(attributes.text);
    const noteRate = Array.isArray(data)
      ? data.find((a: unknown) => typeof a === 'object' && a !== null && 'name' in a && a.name === 'note_rate')
      : undefined;
    expect(noteRate).toMatchObject({
      status: 'sourced',
      value: { kind: 'number', value: 6.5 },
      sourceTier: 'manual',
      sourceDocumentId: 'ts-1',
      sourcePage: 1,
    });
  });

  it('appends compliance executions and serves each one', async () => {
    await call('reconcile_loan', { loan_id: 'L1' });

    const first = await call('rerun_compliance', { loan_id: 'L1' });
    expect(first.text.split('\n')[0]).toBe('## Compliance Report: L1');
    const firstId = first.text.split('\n')[1]?.replace('Execution: ', '');

    await call('rerun_compliance', { loan_id: 'L1' });
    const latest = await call('get_compliance_results', { loan_id: 'L1', format: 'json' });
    const earlier = await call('get_compliance_results', { loan_id: 'L1', execution_id: firstId, format: 'json' });

    expect(dataOf(earlier.text)).toMatchObject({ executionId: firstId });
    expect(dataOf(latest.text)).not.toMatchObject({ executionId: firstId });
  });
});
