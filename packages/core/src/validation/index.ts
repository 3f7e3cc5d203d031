export * from './schemas.js';
export { oracleResponseSchema, parseOracleJudgment, normalizeFinality } from './oracle-schema.js';
export type { OracleResponseInput } from './oracle-schema.js';
export { formatZodIssues } from './format.js';
