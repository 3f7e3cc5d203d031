import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, redactSecrets } from '../src/logging/logger.js';

function captureStderr() {
  const lines: string[] = [];
  const spy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    lines.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
    return true;
  });
  return { lines, spy };
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes json records with bound fields and redacts secrets', () => {
    const { lines } = captureStderr();
    const logger = new Logger({ level: 'info', format: 'json' }).child({ loanId: 'L1' });

    logger.warn('oracle retry exhausted', { token: 'test-secret', attempt: 3 });

    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0] ?? '');
    expect(record).toMatchObject({
      level: 'warn',
      msg: 'oracle retry exhausted',
      loanId: 'L1',
      token: '[REDACTED]',
      attempt: 3,
    });
  });

  it('filters below the configured level', () => {
    const { lines } = captureStderr();
    const logger = new Logger({ level: 'warn' });

    logger.info('hidden');
    logger.error('shown');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ ERROR shown\n$/);
  });

  it('prints loan and execution ids in text format', () => {
    const { lines } = captureStderr();
    new Logger().child({ loanId: 'L9', executionId: 'E1' }).info('compliance run finished');
    expect(lines[0]).toMatch(/\] INFO loanId=L9 executionId=E1 compliance run finished\n$/);
  });

  it('stays quiet when silent', () => {
    const { lines } = captureStderr();
    Logger.silent().error('nothing');
    expect(lines).toHaveLength(0);
  });
});

describe('redactSecrets', () => {
  it('masks bearer tokens and url credentials', () => {
    expect(redactSecrets('Authorization: Bearer abcdefgh12345')).toBe(
      'Authorization: Bearer [REDACTED]'
    );
    expect(redactSecrets('postgres://app:test-secret@db:5432/loans')).toBe(
      'postgres://app:[REDACTED]@db:5432/loans'
    );
  });
});
