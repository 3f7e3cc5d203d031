import { distance as levenshteinDistance } from 'fastest-levenshtein';

function normalizeLabel(label: string): string {
  return label.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim();
}

/**
 * Normalized Levenshtein similarity of two type labels (0-1, 1 = identical)
 */
export function labelSimilarity(a: string, b: string): number {
  const left = normalizeLabel(a);
  const right = normalizeLabel(b);

  if (left === right) return 1;
  if (left.length === 0 || right.length === 0) return 0;

  const dist = levenshteinDistance(left, right);
  return 1 - dist / Math.max(left.length, right.length);
}
