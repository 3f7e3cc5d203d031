import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { EngineError, formatZodIssues } from '@loanledger/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const retrySchema = z
  .object({
    attempts: z.number().int().min(1).max(10).optional(),
    baseDelayMs: z.number().int().min(0).optional(),
    maxDelayMs: z.number().int().min(0).optional(),
    jitter: z.number().min(0).max(1).optional(),
  })
  .strict();

const oracleSchema = z
  .object({
    url: z.string().url(),
    /** Environment variable holding the bearer token */
    tokenEnv: z.string().min(1).optional(),
    timeoutMs: z.number().int().min(1).max(600_000).optional(),
    maxConcurrency: z.number().int().min(1).max(256).optional(),
    retry: retrySchema.optional(),
  })
  .strict();

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

const storeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('memory') }).strict(),
  z
    .object({
      type: z.literal('postgresql'),
      connectionString: z.string().min(1).optional(),
      host: z.string().min(1).optional(),
      port: z.number().int().min(1).max(65535).optional(),
      database: z.string().min(1).optional(),
      user: z.string().min(1).optional(),
      password: z.string().min(1).optional(),
      ssl: sslSchema.optional(),
      schema: z.string().min(1).optional(),
      max: z.number().int().min(1).max(100).optional(),
      /** Create the tables on startup */
      migrate: z.boolean().optional(),
    })
    .strict(),
]);

const versionCriterionSchema = z.enum(['finality', 'signature', 'documentDate', 'pageCount']);

const precedenceSchema = z
  .array(versionCriterionSchema)
  .min(1)
  .refine((list) => new Set(list).size === list.length, { message: 'Criteria must not repeat' });

const attributeDefinitionSchema = z
  .object({
    name: z.string().min(1),
    unit: z.string().min(1).optional(),
    fields: z.array(z.string().min(1)).min(1).optional(),
    chain: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

const engineSchema = z
  .object({
    similarityThreshold: z.number().min(0).max(1).optional(),
    labelSimilarityThreshold: z.number().min(0).max(1).optional(),
    fallbackChain: z.array(z.string().min(1)).min(1).optional(),
    attributes: z.array(attributeDefinitionSchema).min(1).optional(),
    tolerance: z
      .object({
        epsAbs: z.number().min(0).optional(),
        epsPct: z.number().min(0).optional(),
      })
      .strict()
      .optional(),
    versionPrecedence: z
      .object({
        default: precedenceSchema.optional(),
        byInstrumentType: z.record(precedenceSchema).optional(),
      })
      .strict()
      .optional(),
    ruleConcurrency: z.number().int().min(1).max(256).optional(),
  })
  .strict();

export const serverSchema = z
  .object({
    name: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
    runtime: z
      .object({
        maxToolConcurrency: z.number().int().min(1).max(1000).optional(),
        toolTimeoutMs: z.number().int().min(1).max(3_600_000).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    server: serverSchema.optional(),
    oracle: oracleSchema.optional(),
    store: storeSchema.default({ type: 'memory' }),
    documents: z.object({ manifest: z.string().min(1) }).strict().optional(),
    engine: engineSchema.optional(),
    rules: z.object({ catalog: z.string().min(1) }).strict().optional(),
    derivations: z.object({ recipes: z.string().min(1) }).strict().optional(),
    audit: z
      .object({
        enabled: z.boolean().optional(),
        logDir: z.string().min(1).optional(),
        maxFileBytes: z.number().int().min(1024).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.store.type === 'postgresql' && !value.store.connectionString && !value.store.host) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'PostgreSQL store requires connectionString or host',
        path: ['store', 'connectionString'],
      });
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;
export type OracleConfig = z.infer<typeof oracleSchema>;
export type StoreConfig = z.infer<typeof storeSchema>;
export type EngineConfig = z.infer<typeof engineSchema>;

export function formatZodError(err: z.ZodError): string {
  return `Invalid config.json:\n${formatZodIssues(err)
    .map((line) => `- ${line}`)
    .join('\n')}`;
}

/**
 * Resolve relative paths in the config against the config file's directory
 */
function resolvePaths(config: ConfigFile, baseDir: string): ConfigFile {
  const at = (p: string) => resolve(baseDir, p);
  return {
    ...config,
    ...(config.documents ? { documents: { manifest: at(config.documents.manifest) } } : {}),
    ...(config.rules ? { rules: { catalog: at(config.rules.catalog) } } : {}),
    ...(config.derivations ? { derivations: { recipes: at(config.derivations.recipes) } } : {}),
    ...(config.audit?.logDir ? { audit: { ...config.audit, logDir: at(config.audit.logDir) } } : {}),
  };
}

/**
 * Parse an already-read config file
 *
 * @throws EngineError INVALID_CONFIG
 */
export function parseConfig(content: string, baseDir: string, env?: NodeJS.ProcessEnv): ConfigFile {
  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new EngineError({
      code: 'INVALID_CONFIG',
      message: `Config is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    });
  }

  let expanded: unknown;
  try {
    expanded = expandEnvVars(parsed, { env });
  } catch (err) {
    throw new EngineError({
      code: 'INVALID_CONFIG',
      message: err instanceof Error ? err.message : String(err),
      suggestion: 'Set the variable or give the placeholder a default with ${NAME:-value}.',
    });
  }

  const result = configFileSchema.safeParse(expanded);
  if (!result.success) {
    throw new EngineError({ code: 'INVALID_CONFIG', message: formatZodError(result.error) });
  }
  return resolvePaths(result.data, baseDir);
}

export async function loadConfig(configPath: string): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new EngineError({
      code: 'INVALID_CONFIG',
      message: `Cannot read config ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`,
    });
  }
  return parseConfig(content, dirname(absolutePath));
}
