import { describe, expect, it } from 'vitest';
import type { DocumentRecord, InstrumentGroup } from '@loanledger/core';
import { AttributeReconciler } from '../src/attributes/attribute-reconciler.js';
import { selectMasters } from '../src/attributes/master-selection.js';
import type { MasterSource } from '../src/attributes/master-selection.js';
import { classifiedRecord, document, judgment, num } from './fixtures.js';

function master(instrumentType: string, documentId: string, fields: MasterSource['fields']): MasterSource {
  return { instrumentType, groupKey: `fp:${documentId}`, documentId, pageCount: 4, fields };
}

const definitions = [
  { name: 'loan_amount', unit: 'USD', fields: ['loan_amount', 'base_loan_amount'] },
  { name: 'note_rate', unit: '%' },
];

describe('AttributeReconciler', () => {
  it('takes the first tier of the chain that carries a value', () => {
    const reconciler = new AttributeReconciler({ chain: ['transmittal_summary', 'application_form'] });
    const { attributes, failures } = reconciler.reconcile({
      definitions,
      masters: new Map([
        ['transmittal_summary', master('transmittal_summary', 'ts-1', { loan_amount: num(300000, 1) })],
        ['application_form', master('application_form', 'app-1', { loan_amount: num(299000, 2) })],
      ]),
    });

    expect(failures).toEqual([]);
    expect(attributes[0]).toEqual({
      name: 'loan_amount',
      status: 'sourced',
      value: { kind: 'number', value: 300000 },
      unit: 'USD',
      sourceDocumentId: 'ts-1',
      sourcePage: 1,
      sourceTier: 'primary',
      sourceInstrumentType: 'transmittal_summary',
      tierIndex: 0,
      sourceField: 'loan_amount',
    });
    expect(attributes[1]).toMatchObject({ name: 'note_rate', status: 'unsourced', value: null, unit: '%' });
  });

  it('falls back to the application when the transmittal summary is absent', () => {
    const reconciler = new AttributeReconciler({
      chain: ['transmittal_summary', 'application_form', 'non_standard_application'],
    });
    const { attributes } = reconciler.reconcile({
      definitions,
      masters: new Map([
        ['application_form', master('application_form', 'app-1', { base_loan_amount: num(299000, 2) })],
      ]),
    });

    expect(attributes[0]).toMatchObject({
      status: 'sourced',
      value: { kind: 'number', value: 299000 },
      sourceDocumentId: 'app-1',
      sourcePage: 2,
      sourceTier: 'fallback',
      sourceInstrumentType: 'application_form',
      tierIndex: 1,
      sourceField: 'base_loan_amount',
    });
  });

  it('skips missing values and uses the latest valid manual entry last', () => {
    const reconciler = new AttributeReconciler({ chain: ['transmittal_summary'] });
    const { attributes, failures } = reconciler.reconcile({
      definitions,
      masters: new Map([
        ['transmittal_summary', master('transmittal_summary', 'ts-1', { note_rate: { value: { kind: 'missing' } } })],
      ]),
      manualEntries: [
        { attributeName: 'note_rate', value: { kind: 'number', value: 6.5 }, documentId: 'note-1', page: 1, enteredBy: 'reviewer' },
        { attributeName: 'note_rate', value: { kind: 'number', value: 6.75 }, documentId: 'note-1', page: 2, enteredBy: 'auditor' },
        { attributeName: 'loan_amount', value: { kind: 'number', value: 1 }, documentId: 'note-1', page: 7, enteredBy: 'reviewer' },
      ],
      pageCounts: new Map([['note-1', 3]]),
    });

    expect(attributes[1]).toMatchObject({
      status: 'sourced',
      value: { kind: 'number', value: 6.75 },
      sourceDocumentId: 'note-1',
      sourcePage: 2,
      sourceTier: 'manual',
      sourceInstrumentType: null,
      tierIndex: 1,
      sourceField: 'manual:auditor',
    });
    expect(attributes[0]?.status).toBe('unsourced');
    expect(failures).toEqual([
      {
        stage: 'attributes',
        code: 'MISSING_REFERENCE',
        message: 'Manual entry cites note-1 page 7, which does not exist',
        documentId: 'note-1',
        page: 7,
        attributeName: 'loan_amount',
      },
    ]);
  });
});

describe('selectMasters', () => {
  function resolved(groupKey: string, documentIds: string[], masterDocumentId: string): InstrumentGroup {
    return {
      groupKey,
      loanId: 'L1',
      documentIds,
      instrumentType: 'loan_estimate',
      keySource: 'fingerprint',
      status: 'resolved',
      versions: [],
      masterDocumentId,
    };
  }

  it('picks the winning master when several groups share a type', () => {
    const records = new Map<string, DocumentRecord>([
      ['le-1', classifiedRecord(document('le-1'), judgment('Loan Estimate', { apr: num(6.9) }, { finalityIndicator: 'preliminary' }))],
      ['le-2', classifiedRecord(document('le-2'), judgment('Loan Estimate', { apr: num(6.95) }, { finalityIndicator: 'final' }))],
    ]);

    const masters = selectMasters(
      [resolved('fp:le-1', ['le-1'], 'le-1'), resolved('fp:le-2', ['le-2'], 'le-2')],
      records
    );

    expect([...masters.keys()]).toEqual(['loan_estimate']);
    expect(masters.get('loan_estimate')).toEqual({
      instrumentType: 'loan_estimate',
      groupKey: 'fp:le-2',
      documentId: 'le-2',
      pageCount: 3,
      fields: { apr: num(6.95) },
    });
  });

  it('ignores unresolved groups', () => {
    const records = new Map([['le-1', classifiedRecord(document('le-1'), judgment('Loan Estimate'))]]);
    const masters = selectMasters([{ ...resolved('fp:le-1', ['le-1'], 'le-1'), status: 'unresolved' }], records);
    expect(masters.size).toBe(0);
  });
});
