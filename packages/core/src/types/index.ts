export * from './field-value.js';
export * from './document.js';
export * from './oracle.js';
export * from './reconciliation.js';
export * from './provenance.js';
export * from './compliance.js';
export * from './failure.js';
