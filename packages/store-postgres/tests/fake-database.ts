import type { QueryResultRow } from 'pg';
import type { SqlDatabase, SqlExecutor, SqlResult } from '../src/client.js';

export interface RecordedQuery {
  sql: string;
  params: unknown[];
  inTransaction: boolean;
}

type Responder = (sql: string, params: unknown[]) => QueryResultRow[] | Error | undefined;

/**
 * In-process stand-in for PostgreSQL. Records every statement and answers
 * from the first responder that returns rows or an error.
 */
export class FakeDatabase implements SqlDatabase {
  readonly queries: RecordedQuery[] = [];
  readonly transactions: Array<'committed' | 'rolled back'> = [];
  disconnected = false;
  private readonly responders: Responder[] = [];

  respond(responder: Responder): this {
    this.responders.push(responder);
    return this;
  }

  /** Rows for every statement starting with `prefix` after whitespace */
  on(prefix: string, rows: QueryResultRow[] | Error): this {
    return this.respond((sql) => (normalize(sql).startsWith(prefix) ? rows : undefined));
  }

  query<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<SqlResult<T>> {
    return this.run<T>(sql, params, false);
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const tx: SqlExecutor = {
      query: <R extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []) =>
        this.run<R>(sql, params, true),
    };
    try {
      const result = await fn(tx);
      this.transactions.push('committed');
      return result;
    } catch (error) {
      this.transactions.push('rolled back');
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    this.disconnected = true;
  }

  statements(prefix: string): RecordedQuery[] {
    return this.queries.filter((q) => normalize(q.sql).startsWith(prefix));
  }

  private async run<T extends QueryResultRow>(
    sql: string,
    params: unknown[],
    inTransaction: boolean
  ): Promise<SqlResult<T>> {
    this.queries.push({ sql, params, inTransaction });
    for (const responder of this.responders) {
      const answer = responder(sql, params);
      if (answer instanceof Error) throw answer;
      if (answer) return { rows: answer.filter(isRow<T>), rowCount: answer.length };
    }
    return { rows: [], rowCount: 0 };
  }
}

// Scripted rows are trusted to match the statement's shape, as driver rows are
function isRow<T extends QueryResultRow>(_row: QueryResultRow): _row is T {
  return true;
}

export function normalize(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim();
}
