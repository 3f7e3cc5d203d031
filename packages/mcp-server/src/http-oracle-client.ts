/**
 * HTTP Classification Oracle
 *
 * Posts one document per request to the classification service and returns
 * the raw JSON body. Validation happens in the engine.
 */

import { EngineError } from '@loanledger/core';
import type { ClassificationOracle, OracleRequest } from '@loanledger/core';

export interface HttpOracleClientConfig {
  /** Endpoint that classifies a single document */
  url: string;
  /** Bearer token sent as Authorization header */
  token?: string;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
}

/** Statuses worth another attempt, besides every 5xx */
const TRANSIENT_CLIENT_STATUSES = new Set([408, 425, 429]);

function isTransientStatus(status: number): boolean {
  return status >= 500 || TRANSIENT_CLIENT_STATUSES.has(status);
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export class HttpOracleClient implements ClassificationOracle {
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpOracleClientConfig) {
    this.url = config.url;
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...(config.token ? { Authorization: `Bearer ${config.token}` } : {}),
      ...(config.headers ?? {}),
    };
    this.fetchImpl = config.fetch ?? fetch;
  }

  async classify(request: OracleRequest, signal?: AbortSignal): Promise<unknown> {
    const context = { loanId: request.loanId, documentId: request.id };

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({
          documentId: request.id,
          loanId: request.loanId,
          pageCount: request.pageCount,
          ...(request.fileName !== undefined ? { fileName: request.fileName } : {}),
          ...(request.content !== undefined ? { content: request.content } : {}),
        }),
        signal,
      });
    } catch (err) {
      if (isAbortError(err)) {
        throw new EngineError({
          code: 'ORACLE_TIMEOUT',
          message: 'Oracle request was aborted',
          context,
        });
      }
      throw new EngineError({
        code: 'TRANSIENT_ORACLE_FAILURE',
        message: `Failed to reach oracle: ${err instanceof Error ? err.message : String(err)}`,
        suggestion: 'Check oracle.url and network connectivity.',
        cause: err instanceof Error ? err : undefined,
        context,
      });
    }

    if (!response.ok) {
      let detail = `HTTP ${response.status}`;
      const text = await response.text().catch(() => '');
      if (text.trim()) detail = `${detail}: ${text.trim().slice(0, 200)}`;

      if (response.status === 401 || response.status === 403) {
        throw new EngineError({
          code: 'INVALID_CONFIG',
          message: `Oracle rejected credentials (${detail})`,
          suggestion: 'Check the token variable named by oracle.tokenEnv.',
          context,
        });
      }

      if (isTransientStatus(response.status)) {
        throw new EngineError({
          code: 'TRANSIENT_ORACLE_FAILURE',
          message: `Oracle unavailable (${detail})`,
          context: { ...context, status: response.status },
        });
      }

      throw new EngineError({
        code: 'INVALID_ORACLE_RESPONSE',
        message: `Oracle refused document (${detail})`,
        context: { ...context, status: response.status },
      });
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (err) {
      throw new EngineError({
        code: 'INVALID_ORACLE_RESPONSE',
        message: `Oracle returned invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
        context,
      });
    }
  }
}
