import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { EngineError, parseDerivationRecipes } from '@loanledger/core';
import type { DerivationRecipe } from '@loanledger/core';

/** Recipes shipped with the engine */
export const DEFAULT_DERIVATIONS_PATH = fileURLToPath(
  new URL('../../rules/default-derivations.json', import.meta.url)
);

/**
 * Load and validate a derivation recipe file (`{ "recipes": [...] }`).
 *
 * @throws EngineError INVALID_CONFIG when the file cannot be read or parsed
 */
export async function loadDerivationRecipes(
  filePath: string = DEFAULT_DERIVATIONS_PATH
): Promise<DerivationRecipe[]> {
  let raw: unknown;
  try {
    const text = await readFile(filePath, 'utf-8');
    raw = JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new EngineError({
      code: 'INVALID_CONFIG',
      message: `Failed to read derivation recipes from ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  }
  return parseDerivationRecipes(raw);
}
