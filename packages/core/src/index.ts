/**
 * @loanledger/core
 *
 * Domain types, errors, validation and logging shared by the reconciliation engine
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Logging
export * from './logging/index.js';
