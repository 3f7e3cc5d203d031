/**
 * @loanledger/identity
 *
 * Content identity: fingerprints, duplicate detection and label similarity.
 */

export {
  fingerprint,
  isExactDuplicate,
  similarity,
  normalizeContent,
  MIN_TEXT_LENGTH,
  PERCEPTUAL_HASH_KINDS,
} from './fingerprint.js';
export { IdentityStore } from './identity-store.js';
export type { IdentityStoreOptions, RegistrationResult } from './identity-store.js';
export { hammingDistance, isHex } from './hashing/hamming.js';
export { simhash, fnv1a64, tokenize, shingles } from './hashing/simhash.js';
export { labelSimilarity } from './similarity/label-similarity.js';
export { normalizeInstrumentType } from './similarity/instrument-types.js';
