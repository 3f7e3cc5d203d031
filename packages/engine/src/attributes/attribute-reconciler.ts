/**
 * Attribute Reconciliation
 *
 * Walks each attribute's fallback chain over instrument masters. The first
 * tier carrying a value wins; reviewer entries come last. An attribute nobody
 * supplies stays unsourced with a null value.
 */

import { Logger, isPresent } from '@loanledger/core';
import type {
  Attribute,
  AttributeDefinition,
  FailureRecord,
  ManualEntry,
} from '@loanledger/core';
import { DEFAULT_FALLBACK_CHAIN } from '../settings.js';
import type { MasterSource } from './master-selection.js';

export interface AttributeReconcilerOptions {
  chain?: string[];
  logger?: Logger;
}

export interface ReconcileInput {
  definitions: AttributeDefinition[];
  masters: ReadonlyMap<string, MasterSource>;
  manualEntries?: ManualEntry[];
  /** Page counts of the loan's documents, used to check manual citations */
  pageCounts?: ReadonlyMap<string, number>;
}

export interface ReconcileResult {
  attributes: Attribute[];
  failures: FailureRecord[];
}

export function unsourcedAttribute(name: string, unit?: string): Attribute {
  return {
    name,
    status: 'unsourced',
    value: null,
    unit,
    sourceDocumentId: null,
    sourcePage: null,
    sourceTier: null,
    sourceInstrumentType: null,
    tierIndex: null,
    sourceField: null,
  };
}

export class AttributeReconciler {
  private readonly chain: string[];
  private readonly logger: Logger;

  constructor(options: AttributeReconcilerOptions = {}) {
    this.chain = options.chain ?? DEFAULT_FALLBACK_CHAIN;
    this.logger = options.logger ?? Logger.silent();
  }

  reconcile(input: ReconcileInput): ReconcileResult {
    const failures: FailureRecord[] = [];
    const manual = this.validManualEntries(input, failures);

    const attributes = input.definitions.map((definition) =>
      this.reconcileOne(definition, input.masters, manual.get(definition.name))
    );

    const unsourced = attributes.filter((a) => a.status === 'unsourced').map((a) => a.name);
    if (unsourced.length > 0) {
      this.logger.debug('unsourced attributes', { attributes: unsourced });
    }

    return { attributes, failures };
  }

  private reconcileOne(
    definition: AttributeDefinition,
    masters: ReadonlyMap<string, MasterSource>,
    manualEntry: ManualEntry | undefined
  ): Attribute {
    const chain = definition.chain ?? this.chain;
    const aliases = definition.fields ?? [definition.name];

    for (const [tierIndex, instrumentType] of chain.entries()) {
      const master = masters.get(instrumentType);
      if (!master) continue;

      for (const alias of aliases) {
        const field = master.fields[alias];
        if (!field || !isPresent(field.value)) continue;

        return {
          name: definition.name,
          status: 'sourced',
          value: field.value,
          unit: definition.unit,
          sourceDocumentId: master.documentId,
          sourcePage: field.page ?? null,
          sourceTier: tierIndex === 0 ? 'primary' : 'fallback',
          sourceInstrumentType: instrumentType,
          tierIndex,
          sourceField: alias,
        };
      }
    }

    if (manualEntry) {
      return {
        name: definition.name,
        status: 'sourced',
        value: manualEntry.value,
        unit: definition.unit,
        sourceDocumentId: manualEntry.documentId,
        sourcePage: manualEntry.page,
        sourceTier: 'manual',
        sourceInstrumentType: null,
        tierIndex: chain.length,
        sourceField: `manual:${manualEntry.enteredBy}`,
      };
    }

    return unsourcedAttribute(definition.name, definition.unit);
  }

  /** Latest entry per attribute whose citation resolves */
  private validManualEntries(
    input: ReconcileInput,
    failures: FailureRecord[]
  ): Map<string, ManualEntry> {
    const out = new Map<string, ManualEntry>();
    for (const entry of input.manualEntries ?? []) {
      const pages = input.pageCounts?.get(entry.documentId);
      if (input.pageCounts && (pages === undefined || entry.page < 1 || entry.page > pages)) {
        failures.push({
          stage: 'attributes',
          code: 'MISSING_REFERENCE',
          message: `Manual entry cites ${entry.documentId} page ${entry.page}, which does not exist`,
          documentId: entry.documentId,
          page: entry.page,
          attributeName: entry.attributeName,
        });
        continue;
      }
      out.set(entry.attributeName, entry);
    }
    return out;
  }
}
