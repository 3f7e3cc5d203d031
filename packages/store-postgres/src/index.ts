/**
 * @loanledger/store-postgres
 *
 * PostgreSQL persistence for the loan record.
 */

export { PostgresClient, sqlStateOf } from './client.js';
export type { PostgresClientConfig, SqlDatabase, SqlExecutor, SqlResult } from './client.js';
export { PostgresRecordStore, SCHEMA_SQL_PATH } from './postgres-record-store.js';
export type { PostgresRecordStoreOptions } from './postgres-record-store.js';
