/**
 * Failure records surfaced to reviewers instead of stack traces.
 */

import type { EngineErrorCode } from '../errors/engine-error.js';

export type PipelineStage =
  | 'identity'
  | 'classification'
  | 'grouping'
  | 'versioning'
  | 'attributes'
  | 'provenance'
  | 'compliance';

export interface FailureRecord {
  stage: PipelineStage;
  code: EngineErrorCode;
  message: string;
  documentId?: string;
  page?: number;
  attributeName?: string;
  ruleCode?: string;
}
