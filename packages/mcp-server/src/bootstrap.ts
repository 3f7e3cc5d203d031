/**
 * Wires config into a running engine: store, oracle, pipeline, rule engine,
 * audit trail and the record service on top.
 */

import { EngineError, Logger } from '@loanledger/core';
import {
  AuditTrail,
  ComplianceRuleEngine,
  DEFAULT_CATALOG_PATH,
  DEFAULT_DERIVATIONS_PATH,
  DEFAULT_ORACLE_SETTINGS,
  DEFAULT_TOLERANCE,
  LoanPipeline,
  LoanRecordService,
  MemoryRecordStore,
  loadDerivationRecipes,
  loadRuleCatalog,
} from '@loanledger/engine';
import type { EngineSettings, RecordStore } from '@loanledger/engine';
import { PostgresClient, PostgresRecordStore } from '@loanledger/store-postgres';
import type { ConfigFile, EngineConfig, OracleConfig, StoreConfig } from './config.js';
import { HttpOracleClient } from './http-oracle-client.js';
import { ManifestDocumentSource } from './manifest-source.js';

export interface EngineRuntime {
  service: LoanRecordService;
  store: RecordStore;
  documentSource?: ManifestDocumentSource;
  audit?: AuditTrail;
  close(): Promise<void>;
}

export interface BootstrapOptions {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  /** Replaces the global fetch for oracle calls */
  fetch?: typeof fetch;
  /** Replaces the configured store */
  store?: RecordStore;
}

export function toEngineSettings(
  engine: EngineConfig | undefined,
  oracle: OracleConfig | undefined
): Partial<EngineSettings> {
  const settings: Partial<EngineSettings> = {};
  if (engine?.similarityThreshold !== undefined) settings.similarityThreshold = engine.similarityThreshold;
  if (engine?.labelSimilarityThreshold !== undefined) {
    settings.labelSimilarityThreshold = engine.labelSimilarityThreshold;
  }
  if (engine?.fallbackChain) settings.fallbackChain = engine.fallbackChain;
  if (engine?.attributes) settings.attributes = engine.attributes;
  if (engine?.tolerance) settings.tolerance = { ...DEFAULT_TOLERANCE, ...engine.tolerance };
  if (engine?.ruleConcurrency !== undefined) settings.ruleConcurrency = engine.ruleConcurrency;

  if (engine?.versionPrecedence) settings.versionPrecedence = engine.versionPrecedence;

  if (oracle) {
    settings.oracle = {
      timeoutMs: oracle.timeoutMs ?? DEFAULT_ORACLE_SETTINGS.timeoutMs,
      maxConcurrency: oracle.maxConcurrency ?? DEFAULT_ORACLE_SETTINGS.maxConcurrency,
      retry: { ...DEFAULT_ORACLE_SETTINGS.retry, ...(oracle.retry ?? {}) },
    };
  }
  return settings;
}

function createOracle(config: OracleConfig, options: BootstrapOptions): HttpOracleClient {
  const env = options.env ?? process.env;
  let token: string | undefined;
  if (config.tokenEnv) {
    token = env[config.tokenEnv];
    if (!token) {
      throw new EngineError({
        code: 'INVALID_CONFIG',
        message: `Missing required environment variable: ${config.tokenEnv}`,
        suggestion: 'Set the oracle token or remove oracle.tokenEnv.',
      });
    }
  }
  return new HttpOracleClient({
    url: config.url,
    ...(token !== undefined ? { token } : {}),
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
}

async function createStore(config: StoreConfig, logger: Logger): Promise<RecordStore> {
  if (config.type === 'memory') return new MemoryRecordStore();

  const client = new PostgresClient({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.max,
  });
  await client.connect();
  const store = new PostgresRecordStore(client, { schema: config.schema, logger });
  if (config.migrate) await store.ensureSchema();
  return store;
}

export async function bootstrap(config: ConfigFile, options: BootstrapOptions = {}): Promise<EngineRuntime> {
  const logger = options.logger ?? Logger.silent();
  const settings = toEngineSettings(config.engine, config.oracle);

  const [rules, recipes] = await Promise.all([
    loadRuleCatalog(config.rules?.catalog ?? DEFAULT_CATALOG_PATH),
    loadDerivationRecipes(config.derivations?.recipes ?? DEFAULT_DERIVATIONS_PATH),
  ]);

  const oracle = config.oracle ? createOracle(config.oracle, options) : undefined;
  if (!oracle) logger.warn('no oracle configured; only stored judgments will be used');

  const store = options.store ?? (await createStore(config.store, logger));
  const documentSource = config.documents ? new ManifestDocumentSource(config.documents.manifest) : undefined;
  const audit =
    config.audit?.enabled === true
      ? new AuditTrail({
          baseDir: config.audit.logDir,
          maxFileBytes: config.audit.maxFileBytes,
          logger,
        })
      : undefined;

  const pipeline = new LoanPipeline({ settings, oracle, recipes, logger });
  const ruleEngine = new ComplianceRuleEngine(rules, {
    concurrency: pipeline.engineSettings.ruleConcurrency,
    logger,
  });
  const service = new LoanRecordService({ store, pipeline, ruleEngine, documentSource, audit, logger });

  logger.info('engine ready', {
    rules: rules.length,
    recipes: recipes.length,
    store: options.store ? 'custom' : config.store.type,
    oracle: oracle !== undefined,
    audit: audit !== undefined,
  });

  return {
    service,
    store,
    ...(documentSource ? { documentSource } : {}),
    ...(audit ? { audit } : {}),
    close: async () => {
      await store.close?.();
    },
  };
}
