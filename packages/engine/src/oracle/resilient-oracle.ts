/**
 * Oracle access with bounded concurrency, per-call timeout and retries.
 * Responses are validated before they leave this module.
 */

import { EngineError, Logger, parseOracleJudgment } from '@loanledger/core';
import type { ClassificationOracle, LoanDocument, OracleJudgment, OracleRequest } from '@loanledger/core';
import { RetryPolicy } from '../runtime/retry.js';
import { Semaphore } from '../runtime/semaphore.js';
import { withTimeout } from '../runtime/timeout.js';
import { DEFAULT_ORACLE_SETTINGS } from '../settings.js';
import type { OracleSettings } from '../settings.js';

/** Timeouts and transient failures are retried; invalid responses are not */
export function isRetryableOracleError(err: unknown): boolean {
  if (err instanceof EngineError) {
    return err.code === 'TRANSIENT_ORACLE_FAILURE' || err.code === 'ORACLE_TIMEOUT';
  }
  return true;
}

export function toOracleRequest(document: LoanDocument): OracleRequest {
  return {
    id: document.id,
    loanId: document.loanId,
    pageCount: document.pageCount,
    fileName: document.fileName,
    content: document.content,
  };
}

export class ResilientOracle {
  private readonly semaphore: Semaphore;
  private readonly policy: RetryPolicy;
  private readonly settings: OracleSettings;
  private readonly logger: Logger;

  constructor(
    private readonly oracle: ClassificationOracle,
    settings: Partial<OracleSettings> = {},
    logger?: Logger
  ) {
    this.settings = { ...DEFAULT_ORACLE_SETTINGS, ...settings };
    this.semaphore = new Semaphore(this.settings.maxConcurrency);
    this.policy = new RetryPolicy(this.settings.retry, isRetryableOracleError);
    this.logger = logger ?? Logger.silent();
  }

  /**
   * Classify one document.
   *
   * @throws EngineError TRANSIENT_ORACLE_FAILURE or ORACLE_TIMEOUT once retries
   * are exhausted; INVALID_ORACLE_RESPONSE immediately
   */
  async judge(document: LoanDocument): Promise<OracleJudgment> {
    const context = { loanId: document.loanId, documentId: document.id };
    const request = toOracleRequest(document);

    return this.semaphore.run(async () => {
      try {
        return await this.policy.execute(async ({ attempt, attempts }) => {
          if (attempt > 1) {
            this.logger.debug('retrying oracle call', { ...context, attempt, attempts });
          }
          const raw = await withTimeout(
            (signal) => this.oracle.classify(request, signal),
            this.settings.timeoutMs,
            () =>
              new EngineError({
                code: 'ORACLE_TIMEOUT',
                message: `Oracle call timed out after ${this.settings.timeoutMs}ms`,
                context,
              })
          );
          return parseOracleJudgment(raw, document.id);
        });
      } catch (err) {
        const error =
          err instanceof EngineError
            ? err
            : new EngineError({
                code: 'TRANSIENT_ORACLE_FAILURE',
                message: err instanceof Error ? err.message : String(err),
                suggestion: 'Check oracle availability and re-run reconciliation.',
                cause: err instanceof Error ? err : undefined,
                context,
              });
        if (isRetryableOracleError(error)) {
          this.logger.warn('oracle retries exhausted', {
            ...context,
            attempts: this.policy.maxAttempts,
            code: error.code,
          });
        }
        throw error;
      }
    });
  }
}
