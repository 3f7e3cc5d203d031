/**
 * @loanledger/mcp-server
 *
 * MCP server over the loan reconciliation engine
 */

export { createServer, runServer, formatReconciliationSummary } from './server.js';
export type { ServerConfig, ServerRuntimeConfig } from './server.js';
export { bootstrap, toEngineSettings } from './bootstrap.js';
export type { BootstrapOptions, EngineRuntime } from './bootstrap.js';
export { ConfigError, configFileSchema, expandEnvVars, formatZodError, loadConfig, parseConfig } from './config.js';
export type { ConfigFile, EngineConfig, OracleConfig, StoreConfig } from './config.js';
export { HttpOracleClient } from './http-oracle-client.js';
export type { HttpOracleClientConfig } from './http-oracle-client.js';
export { ManifestDocumentSource, documentManifestSchema } from './manifest-source.js';
export type { DocumentManifest } from './manifest-source.js';
