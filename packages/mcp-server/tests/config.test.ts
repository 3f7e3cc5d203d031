import { describe, expect, it } from 'vitest';
import { EngineError } from '@loanledger/core';
import { ConfigError, expandEnvVars, parseConfig } from '../src/config.js';

function configError(fn: () => unknown): EngineError {
  try {
    fn();
  } catch (err) {
    if (err instanceof EngineError) return err;
    throw err;
  }
  throw new Error('expected parseConfig to throw');
}

describe('expandEnvVars', () => {
  const env = { ORACLE_HOST: 'oracle.test', EMPTY: '' };

  it('expands nested strings and leaves other values alone', () => {
    expect(
      expandEnvVars(
        { url: 'http://${ORACLE_HOST}/classify', retry: { attempts: 3 }, tags: ['${ORACLE_HOST}', true] },
        { env }
      )
    ).toEqual({ url: 'http://oracle.test/classify', retry: { attempts: 3 }, tags: ['oracle.test', true] });
  });

  it('falls back to the default for unset or empty variables', () => {
    expect(expandEnvVars('${MISSING:-memory}/${EMPTY:-x}', { env })).toBe('memory/x');
  });

  it('fails on a missing variable unless allowed', () => {
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow(ConfigError);
    expect(expandEnvVars('${MISSING}', { env, allowMissing: true })).toBe('${MISSING}');
  });
});

describe('parseConfig', () => {
  it('defaults to the memory store', () => {
    const config = parseConfig('{}', '/etc/loanledger');
    expect(config.store).toEqual({ type: 'memory' });
  });

  it('resolves file paths against the config directory', () => {
    const config = parseConfig(
      JSON.stringify({
        documents: { manifest: './manifest.json' },
        rules: { catalog: 'rules/catalog.json' },
        derivations: { recipes: '/opt/recipes.json' },
        audit: { enabled: true, logDir: './audit' },
      }),
      '/etc/loanledger'
    );
    expect(config.documents).toEqual({ manifest: '/etc/loanledger/manifest.json' });
    expect(config.rules).toEqual({ catalog: '/etc/loanledger/rules/catalog.json' });
    expect(config.derivations).toEqual({ recipes: '/opt/recipes.json' });
    expect(config.audit).toEqual({ enabled: true, logDir: '/etc/loanledger/audit' });
  });

  it('strips a byte order mark and expands placeholders', () => {
    const config = parseConfig(
      '\uFEFF{"oracle":{"url":"${ORACLE_URL}","tokenEnv":"ORACLE_TOKEN"}}',
      '/etc/loanledger',
      { ORACLE_URL: 'http://oracle.test/classify' }
    );
    expect(config.oracle).toEqual({ url: 'http://oracle.test/classify', tokenEnv: 'ORACLE_TOKEN' });
  });

  it('reports a missing environment variable as INVALID_CONFIG', () => {
    const error = configError(() => parseConfig('{"oracle":{"url":"${ORACLE_URL}"}}', '/etc', {}));
    expect(error.code).toBe('INVALID_CONFIG');
    expect(error.message).toBe('Missing required environment variable: ORACLE_URL');
  });

  it('rejects malformed JSON', () => {
    const error = configError(() => parseConfig('{"store":', '/etc'));
    expect(error.code).toBe('INVALID_CONFIG');
    expect(error.message).toMatch(/^Config is not valid JSON: /);
  });

  it('lists validation issues by path', () => {
    const error = configError(() => parseConfig('{"store":{"type":"postgresql"}}', '/etc'));
    expect(error.message).toBe(
      'Invalid config.json:\n- store.connectionString: PostgreSQL store requires connectionString or host'
    );
  });

  it('rejects repeated version criteria', () => {
    const error = configError(() =>
      parseConfig('{"engine":{"versionPrecedence":{"default":["finality","finality"]}}}', '/etc')
    );
    expect(error.message).toBe('Invalid config.json:\n- engine.versionPrecedence.default: Criteria must not repeat');
  });

  it('rejects unknown keys', () => {
    const error = configError(() => parseConfig('{"server":{"nmae":"x"}}', '/etc'));
    expect(error.message).toBe("Invalid config.json:\n- server: Unrecognized key(s) in object: 'nmae'");
  });
});
