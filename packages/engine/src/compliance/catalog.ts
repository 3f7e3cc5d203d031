import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { EngineError, parseRuleCatalog } from '@loanledger/core';
import type { ComplianceRule } from '@loanledger/core';

/** Rule catalog shipped with the engine */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../rules/default-catalog.json', import.meta.url)
);

/**
 * @throws EngineError INVALID_CONFIG when unreadable, INVALID_RULE when invalid
 */
export async function loadRuleCatalog(filePath: string = DEFAULT_CATALOG_PATH): Promise<ComplianceRule[]> {
  let raw: unknown;
  try {
    const text = await readFile(filePath, 'utf-8');
    raw = JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new EngineError({
      code: 'INVALID_CONFIG',
      message: `Failed to read rule catalog from ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  }
  return parseRuleCatalog(raw);
}

/**
 * Catalogs are read-only, so one load serves every loan.
 */
export class RuleCatalogCache {
  private readonly loaded = new Map<string, Promise<ComplianceRule[]>>();

  get(filePath: string = DEFAULT_CATALOG_PATH): Promise<ComplianceRule[]> {
    const cached = this.loaded.get(filePath);
    if (cached) return cached;

    const pending = loadRuleCatalog(filePath);
    this.loaded.set(filePath, pending);
    // A failed load is not cached
    void pending.catch(() => {
      if (this.loaded.get(filePath) === pending) this.loaded.delete(filePath);
    });
    return pending;
  }

  clear(): void {
    this.loaded.clear();
  }
}
