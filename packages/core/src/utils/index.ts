export * from './field-values.js';
