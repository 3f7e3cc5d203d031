export { EngineError, wrapError } from './engine-error.js';
export type { EngineErrorCode, EngineErrorContext, EngineErrorDetails } from './engine-error.js';
