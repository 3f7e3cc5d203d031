#!/usr/bin/env node
/**
 * CLI entry point for the MCP server
 *
 * Usage:
 *   npm start -- --config ./config.json
 */

import { EngineError, Logger } from '@loanledger/core';
import { bootstrap } from './bootstrap.js';
import { loadConfig } from './config.js';
import { runServer } from './server.js';

const EXAMPLE_CONFIG = {
  server: { name: 'loanledger', version: '0.1.0', logging: { level: 'info', format: 'json' } },
  oracle: { url: 'https://oracle.internal/classify', tokenEnv: 'ORACLE_TOKEN', timeoutMs: 60000 },
  store: { type: 'postgresql', connectionString: '${DATABASE_URL}', migrate: true },
  documents: { manifest: './manifest.json' },
  audit: { enabled: true, logDir: './.loan-audit' },
};

async function main(): Promise<void> {
  let logger = new Logger();
  const args = process.argv.slice(2);
  const configIndex = args.indexOf('--config');
  const configPath = configIndex !== -1 ? args[configIndex + 1] : undefined;

  if (!configPath) {
    console.error('Usage: npm start -- --config <config.json>');
    console.error('');
    console.error('Example config.json:');
    console.error(JSON.stringify(EXAMPLE_CONFIG, null, 2));
    process.exit(1);
  }

  try {
    const config = await loadConfig(configPath);
    logger = new Logger({
      level: config.server?.logging?.level,
      format: config.server?.logging?.format,
    });

    const runtime = await bootstrap(config, { logger });

    await runServer({
      name: config.server?.name ?? 'loanledger',
      version: config.server?.version ?? '0.1.0',
      service: runtime.service,
      ...(runtime.documentSource ? { documentSource: runtime.documentSource } : {}),
      runtime: config.server?.runtime,
      logger,
      onShutdown: runtime.close,
    });
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof EngineError ? error.toActionableMessage() : error,
    });
    process.exit(1);
  }
}

void main();
