import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AuditTrail } from '../src/audit/audit-trail.js';
import type { AuditEntry } from '../src/audit/audit-trail.js';

function entry(runId: string, timestamp = '2024-06-01T12:00:00Z'): AuditEntry {
  return {
    event: 'reconciliation',
    loanId: 'L1',
    runId,
    timestamp: new Date(timestamp),
    details: { documents: 5 },
  };
}

describe('AuditTrail', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'audit-trail-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('chains entries written concurrently', async () => {
    const audit = new AuditTrail({ baseDir: dir });
    await Promise.all(['run-1', 'run-2', 'run-3'].map((id) => audit.append(entry(id))));

    const entries = await audit.readLoan('L1');
    expect(entries).toHaveLength(3);
    expect(entries[0]?.prevHash).toBe('0');
    expect(entries[1]?.prevHash).toBe(entries[0]?.hash);
    expect(entries[2]?.prevHash).toBe(entries[1]?.hash);
    expect(await audit.verify('L1')).toEqual([]);
  });

  it('writes one file per day', async () => {
    const audit = new AuditTrail({ baseDir: dir });
    await audit.append(entry('run-1', '2024-06-01T12:00:00Z'));
    await audit.append(entry('run-2', '2024-06-02T08:00:00Z'));

    expect((await readdir(path.join(dir, 'L1'))).sort()).toEqual(['2024-06-01.ndjson', '2024-06-02.ndjson']);
    expect((await audit.readLoan('L1')).map((e) => e.runId)).toEqual(['run-1', 'run-2']);
  });

  it('detects an edited entry', async () => {
    const audit = new AuditTrail({ baseDir: dir });
    await audit.append(entry('run-1'));
    await audit.append(entry('run-2'));

    const file = path.join(dir, 'L1', '2024-06-01.ndjson');
    const content = await readFile(file, 'utf-8');
    await writeFile(file, content.replace('"documents":5', '"documents":6'), 'utf-8');

    expect(await audit.verify('L1')).toEqual(['2024-06-01.ndjson']);
  });

  it('returns nothing for a loan without entries', async () => {
    const audit = new AuditTrail({ baseDir: dir });
    expect(await audit.readLoan('L404')).toEqual([]);
    expect(await audit.verify('L404')).toEqual([]);
  });
});
