import { randomUUID } from 'node:crypto';
import { Logger } from '@loanledger/core';
import type {
  Attribute,
  CalculationTrace,
  DocumentRecord,
  FailureRecord,
  GroupingConflict,
  InstrumentGroup,
} from '@loanledger/core';
import type { MasterSource } from '../attributes/master-selection.js';

/**
 * State of one reconciliation run. Stages read what earlier stages wrote and
 * append their own outputs; nothing is shared between loans.
 */
export interface RunContext {
  loanId: string;
  runId: string;
  startedAt: Date;
  /** ISO date used for rule effective windows when the loan has no application date */
  asOf: string;
  logger: Logger;

  /** Document records keyed by document id */
  documents: Map<string, DocumentRecord>;
  groups: InstrumentGroup[];
  conflicts: GroupingConflict[];
  /** Master per instrument type */
  masters: Map<string, MasterSource>;
  attributes: Attribute[];
  traces: CalculationTrace[];
  failures: FailureRecord[];
}

export interface RunContextInit {
  loanId: string;
  runId?: string;
  now?: Date;
  asOf?: string;
  logger?: Logger;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function createRunContext(init: RunContextInit): RunContext {
  const startedAt = init.now ?? new Date();
  const runId = init.runId ?? randomUUID();
  return {
    loanId: init.loanId,
    runId,
    startedAt,
    asOf: init.asOf ?? toIsoDate(startedAt),
    logger: (init.logger ?? Logger.silent()).child({ loanId: init.loanId, runId }),
    documents: new Map(),
    groups: [],
    conflicts: [],
    masters: new Map(),
    attributes: [],
    traces: [],
    failures: [],
  };
}
