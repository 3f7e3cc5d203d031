/**
 * PostgreSQL Client
 *
 * Wrapper around pg for the record store. Driver errors become EngineErrors
 * carrying the SQLSTATE so callers can tell constraint violations apart.
 */

import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import { EngineError } from '@loanledger/core';

const { Pool } = pg;

export interface PostgresClientConfig {
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
  connectionTimeoutMillis?: number;
}

export interface SqlResult<T> {
  rows: T[];
  rowCount: number;
}

export interface SqlExecutor {
  query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<SqlResult<T>>;
}

/** What the record store needs from a database */
export interface SqlDatabase extends SqlExecutor {
  /** Run `fn` inside BEGIN/COMMIT; any rejection rolls back */
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  disconnect(): Promise<void>;
}

/** SQLSTATE of a failed query, when the driver reported one */
export function sqlStateOf(error: unknown): string | undefined {
  if (error instanceof EngineError) {
    const state = error.context['sqlState'];
    return typeof state === 'string' ? state : undefined;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function execute<T extends QueryResultRow>(
  run: () => Promise<QueryResult<T>>
): Promise<SqlResult<T>> {
  try {
    const result = await run();
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  } catch (error) {
    const sqlState = sqlStateOf(error);
    throw new EngineError({
      code: 'STORE_ERROR',
      message: `Query failed: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
      context: sqlState !== undefined ? { sqlState } : {},
    });
  }
}

export class PostgresClient implements SqlDatabase {
  private pool: pg.Pool;
  private connected = false;

  constructor(config: PostgresClientConfig) {
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 10,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 10_000,
    });
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
      this.connected = true;
    } catch (error) {
      throw new EngineError({
        code: 'STORE_ERROR',
        message: `PostgreSQL connection failed: ${error instanceof Error ? error.message : String(error)}`,
        suggestion: 'Check host, port, database, user, and password.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Close all connections
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
    this.connected = false;
  }

  query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<SqlResult<T>> {
    return execute(() => this.pool.query<T>(sql, params));
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const tx: SqlExecutor = {
      query: <R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) =>
        execute(() => client.query<R>(sql, params)),
    };

    try {
      await tx.query('BEGIN');
      const result = await fn(tx);
      await tx.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
