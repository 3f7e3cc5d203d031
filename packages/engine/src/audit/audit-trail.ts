/**
 * Audit Trail
 *
 * Append-only NDJSON log of reconciliation and compliance runs. Each line
 * carries the hash of the previous line in its file, so an edited or removed
 * entry breaks the chain.
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { EngineError, Logger } from '@loanledger/core';

export type AuditEvent = 'reconciliation' | 'compliance' | 'manual_entry';

export interface AuditEntry {
  event: AuditEvent;
  loanId: string;
  /** Run id for reconciliations, execution id for compliance runs */
  runId: string;
  timestamp: Date;
  actor?: string;
  details: Record<string, unknown>;
}

export interface StoredAuditEntry extends AuditEntry {
  prevHash: string;
  hash: string;
}

export interface AuditTrailOptions {
  baseDir?: string;
  maxFileBytes?: number;
  logger?: Logger;
}

interface AuditLine {
  event: AuditEvent;
  loanId: string;
  runId: string;
  timestamp: string;
  actor?: string;
  details: Record<string, unknown>;
  prevHash: string;
  hash: string;
}

const GENESIS_HASH = '0';

function isAuditLine(value: unknown): value is AuditLine {
  if (typeof value !== 'object' || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v['event'] === 'string' &&
    typeof v['loanId'] === 'string' &&
    typeof v['runId'] === 'string' &&
    typeof v['timestamp'] === 'string' &&
    typeof v['hash'] === 'string' &&
    typeof v['prevHash'] === 'string' &&
    typeof v['details'] === 'object' &&
    v['details'] !== null
  );
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class AuditTrail {
  private static writeQueue = new Map<string, Promise<void>>();
  private readonly baseDir: string;
  private readonly maxFileBytes: number;
  private readonly logger: Logger;
  private readonly lastHashByFile = new Map<string, string>();

  constructor(options: AuditTrailOptions = {}) {
    this.baseDir = options.baseDir ?? './.loan-audit';
    this.maxFileBytes = options.maxFileBytes ?? 10 * 1024 * 1024;
    this.logger = options.logger ?? Logger.silent();
  }

  private loanDir(loanId: string): string {
    return path.join(this.baseDir, loanId.replace(/[^a-zA-Z0-9_-]/g, '_'));
  }

  private async resolveWritableFilePath(loanId: string, date: Date): Promise<string> {
    const dir = this.loanDir(loanId);
    const day = date.toISOString().slice(0, 10);

    // YYYY-MM-DD.ndjson, then YYYY-MM-DD-1.ndjson, ...
    for (let i = 0; i < 10_000; i++) {
      const full = path.join(dir, i === 0 ? `${day}.ndjson` : `${day}-${i}.ndjson`);
      try {
        const stat = await fs.stat(full);
        if (stat.size < this.maxFileBytes) return full;
      } catch (err) {
        if (isMissingFile(err)) return full;
        throw err;
      }
    }
    return path.join(dir, `${day}-${date.getTime()}.ndjson`);
  }

  private async readLastHash(filePath: string): Promise<string> {
    const cached = this.lastHashByFile.get(filePath);
    if (cached) return cached;

    const lines = await this.readLines(filePath);
    const hash = lines[lines.length - 1]?.hash ?? GENESIS_HASH;
    this.lastHashByFile.set(filePath, hash);
    return hash;
  }

  private computeHash(prevHash: string, record: unknown): string {
    return createHash('sha256').update(`${prevHash}\n${JSON.stringify(record)}`).digest('hex');
  }

  private enqueueWrite(filePath: string, op: () => Promise<void>): Promise<void> {
    const previous = AuditTrail.writeQueue.get(filePath) ?? Promise.resolve();
    const next = previous.then(op, op);
    const wrapped: Promise<void> = next.finally(() => {
      if (AuditTrail.writeQueue.get(filePath) === wrapped) {
        AuditTrail.writeQueue.delete(filePath);
      }
    });
    AuditTrail.writeQueue.set(filePath, wrapped);
    return wrapped;
  }

  /**
   * @throws EngineError STORE_ERROR
   */
  async append(entry: AuditEntry): Promise<void> {
    try {
      await fs.mkdir(this.loanDir(entry.loanId), { recursive: true, mode: 0o700 });
      const filePath = await this.resolveWritableFilePath(entry.loanId, entry.timestamp);

      // Hash and write inside the queue so concurrent appends chain in order
      await this.enqueueWrite(filePath, async () => {
        const prevHash = await this.readLastHash(filePath);
        const record = { ...entry, timestamp: entry.timestamp.toISOString() };
        const hash = this.computeHash(prevHash, record);
        await fs.appendFile(filePath, `${JSON.stringify({ ...record, prevHash, hash })}\n`, {
          encoding: 'utf-8',
          mode: 0o600,
        });
        this.lastHashByFile.set(filePath, hash);
      });
    } catch (err) {
      throw new EngineError({
        code: 'STORE_ERROR',
        message: `Failed to write audit entry for loan ${entry.loanId}`,
        suggestion: `Check that ${this.baseDir} is writable.`,
        cause: err instanceof Error ? err : undefined,
        context: { loanId: entry.loanId },
      });
    }
  }

  /** Entries for one loan, oldest first */
  async readLoan(loanId: string): Promise<StoredAuditEntry[]> {
    const dir = this.loanDir(loanId);
    let files: string[];
    try {
      files = (await fs.readdir(dir)).filter((f) => f.endsWith('.ndjson')).sort();
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const entries: StoredAuditEntry[] = [];
    for (const file of files) {
      for (const line of await this.readLines(path.join(dir, file))) {
        entries.push({
          event: line.event,
          loanId: line.loanId,
          runId: line.runId,
          timestamp: new Date(line.timestamp),
          ...(line.actor !== undefined ? { actor: line.actor } : {}),
          details: line.details,
          prevHash: line.prevHash,
          hash: line.hash,
        });
      }
    }
    return entries.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  /**
   * Recompute every hash chain of a loan. Returns the files whose chain is broken.
   */
  async verify(loanId: string): Promise<string[]> {
    const dir = this.loanDir(loanId);
    let files: string[];
    try {
      files = (await fs.readdir(dir)).filter((f) => f.endsWith('.ndjson')).sort();
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const broken: string[] = [];
    for (const file of files) {
      let prev = GENESIS_HASH;
      for (const line of await this.readLines(path.join(dir, file))) {
        const { prevHash, hash, ...record } = line;
        if (prevHash !== prev || this.computeHash(prev, record) !== hash) {
          broken.push(file);
          break;
        }
        prev = hash;
      }
    }
    return broken;
  }

  private async readLines(filePath: string): Promise<AuditLine[]> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const out: AuditLine[] = [];
    for (const [index, raw] of content.split('\n').entries()) {
      if (!raw.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        this.logger.warn('unreadable audit line', {
          file: filePath,
          line: index + 1,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }
      if (isAuditLine(parsed)) out.push(parsed);
    }
    return out;
  }
}
