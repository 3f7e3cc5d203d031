/**
 * 64-bit SimHash over word shingles
 *
 * Near-identical texts produce hashes a few bits apart, so the Hamming
 * distance of two SimHashes approximates their textual similarity.
 */

const FNV_OFFSET = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = (1n << 64n) - 1n;
const BITS = 64;

export const SHINGLE_SIZE = 3;

/** 64-bit FNV-1a over the UTF-16 code units of the input */
export function fnv1a64(input: string): bigint {
  let hash = FNV_OFFSET;
  for (let i = 0; i < input.length; i++) {
    hash ^= BigInt(input.charCodeAt(i));
    hash = (hash * FNV_PRIME) & MASK_64;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

export function shingles(tokens: string[], size = SHINGLE_SIZE): string[] {
  if (tokens.length === 0) return [];
  if (tokens.length < size) return [tokens.join(' ')];

  const out: string[] = [];
  for (let i = 0; i + size <= tokens.length; i++) {
    out.push(tokens.slice(i, i + size).join(' '));
  }
  return out;
}

/**
 * SimHash of a text as 16 lowercase hex digits, or null when the text has no tokens.
 */
export function simhash(text: string): string | null {
  const features = shingles(tokenize(text));
  if (features.length === 0) return null;

  const weights = new Array<number>(BITS).fill(0);
  for (const feature of features) {
    const hash = fnv1a64(feature);
    for (let bit = 0; bit < BITS; bit++) {
      const set = (hash >> BigInt(bit)) & 1n;
      weights[bit] = (weights[bit] ?? 0) + (set === 1n ? 1 : -1);
    }
  }

  let result = 0n;
  for (let bit = 0; bit < BITS; bit++) {
    if ((weights[bit] ?? 0) > 0) {
      result |= 1n << BigInt(bit);
    }
  }

  return result.toString(16).padStart(BITS / 4, '0');
}
