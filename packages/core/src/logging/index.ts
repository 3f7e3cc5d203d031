export { Logger, redactSecrets } from './logger.js';
export type { LogFormat, LogLevel, LoggerOptions } from './logger.js';
