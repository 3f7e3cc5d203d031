/**
 * @loanledger/engine
 *
 * Instrument grouping, version resolution, attribute reconciliation,
 * calculation provenance and compliance rules for one loan's documents.
 */

// Settings
export {
  DEFAULT_ATTRIBUTES,
  DEFAULT_ENGINE_SETTINGS,
  DEFAULT_FALLBACK_CHAIN,
  DEFAULT_ORACLE_SETTINGS,
  DEFAULT_TOLERANCE,
  resolveEngineSettings,
} from './settings.js';
export type { EngineSettings, OracleSettings, VersionPrecedenceConfig } from './settings.js';

// Runtime
export { RetryPolicy } from './runtime/retry.js';
export type { RetryConfig, RetryContext, RetryPolicyOptions } from './runtime/retry.js';
export { Semaphore } from './runtime/semaphore.js';
export { TimeoutError, withTimeout } from './runtime/timeout.js';

// Oracle
export { ResilientOracle, isRetryableOracleError, toOracleRequest } from './oracle/resilient-oracle.js';

// Grouping and versioning
export { groupInstruments } from './grouping/instrument-grouping.js';
export type {
  GroupingCandidate,
  GroupingOptions,
  GroupingResult,
  SimilarityFn,
} from './grouping/instrument-grouping.js';
export { UnionFind } from './grouping/union-find.js';
export {
  DEFAULT_VERSION_PRECEDENCE,
  VERSION_CRITERIA,
  compareVersions,
  precedenceFor,
  validatePrecedence,
} from './versioning/comparator.js';
export type { VersionCandidate, VersionComparison } from './versioning/comparator.js';
export { VersionResolver } from './versioning/version-resolver.js';

// Attributes
export { AttributeReconciler, unsourcedAttribute } from './attributes/attribute-reconciler.js';
export type {
  AttributeReconcilerOptions,
  ReconcileInput,
  ReconcileResult,
} from './attributes/attribute-reconciler.js';
export { selectMasters, toVersionCandidate } from './attributes/master-selection.js';
export type { MasterSource } from './attributes/master-selection.js';

// Provenance
export { ProvenanceGraphBuilder, orderSteps } from './provenance/provenance-graph.js';
export type { ProvenanceContext } from './provenance/provenance-graph.js';
export { PERIODS_PER_YEAR, applyFormula, describeFormula } from './provenance/formulas.js';
export { compareWithTolerance, isVerified } from './provenance/tolerance.js';
export { DEFAULT_DERIVATIONS_PATH, loadDerivationRecipes } from './provenance/recipes.js';

// Compliance
export { ComplianceRuleEngine, overallStatus, summarize } from './compliance/rule-engine.js';
export type { ComplianceRunInput, RuleEngineOptions } from './compliance/rule-engine.js';
export { checkApplicability } from './compliance/applicability.js';
export type { ApplicabilityDecision } from './compliance/applicability.js';
export { evaluateLogic } from './compliance/logic-evaluator.js';
export type { LogicOutcome, LogicStatus } from './compliance/logic-evaluator.js';
export { buildEvidence } from './compliance/evidence.js';
export { DEFAULT_CATALOG_PATH, RuleCatalogCache, loadRuleCatalog } from './compliance/catalog.js';

// Pipeline, persistence and queries
export { LoanPipeline, deriveProfile } from './pipeline/loan-pipeline.js';
export type {
  DocumentSource,
  LoanPipelineOptions,
  ReconcileOptions,
} from './pipeline/loan-pipeline.js';
export { createRunContext, toIsoDate } from './pipeline/run-context.js';
export type { RunContext, RunContextInit } from './pipeline/run-context.js';
export type {
  ComplianceExecutionSummary,
  RecordStore,
  ReconciliationSnapshot,
} from './store/record-store.js';
export { MemoryRecordStore } from './store/memory-record-store.js';
export { LoanRecordService, storedJudgments } from './service/loan-record-service.js';
export type {
  InstrumentGroupsView,
  LoanRecordServiceOptions,
  ReconcileLoanOptions,
} from './service/loan-record-service.js';
export { AuditTrail } from './audit/audit-trail.js';
export type { AuditEntry, AuditEvent, AuditTrailOptions, StoredAuditEntry } from './audit/audit-trail.js';

// Formatters
export {
  formatAttributes,
  formatCalculationTrace,
  formatCitation,
  formatComplianceReport,
  formatInstrumentGroups,
} from './formatters/index.js';
