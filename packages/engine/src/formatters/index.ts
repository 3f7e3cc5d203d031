export { formatAttributes } from './attribute-formatter.js';
export { formatCalculationTrace } from './trace-formatter.js';
export { formatComplianceReport } from './compliance-formatter.js';
export { formatInstrumentGroups } from './group-formatter.js';
export { formatCitation } from './utils.js';
