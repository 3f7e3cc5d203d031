const HEX_PATTERN = /^[0-9a-f]+$/i;

const NIBBLE_BITS = [0, 1, 1, 2, 1, 2, 2, 3, 1, 2, 2, 3, 2, 3, 3, 4];

export function isHex(value: string): boolean {
  return HEX_PATTERN.test(value);
}

/**
 * Bit-level Hamming distance between two hex strings of equal length.
 * Returns null when the strings are not comparable.
 */
export function hammingDistance(a: string, b: string): number | null {
  if (a.length !== b.length || !isHex(a) || !isHex(b)) return null;

  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    const xor = parseInt(a.charAt(i), 16) ^ parseInt(b.charAt(i), 16);
    distance += NIBBLE_BITS[xor] ?? 0;
  }
  return distance;
}
