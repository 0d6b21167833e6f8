import { describe, expect, it } from 'vitest';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { makeTransaction } from '../../testing/makeTransaction.js';
import type { TransactionSourcePort } from '../ports/TransactionSourcePort.js';
import { HistoryService } from './HistoryService.js';

class StubSource implements TransactionSourcePort {
  readonly requested: string[] = [];

  constructor(private readonly transactions: Transaction[]) {}

  readTransactions(path: string): Transaction[] {
    this.requested.push(path);
    return this.transactions;
  }
}

const rows = [
  makeTransaction({ date: '01/01/2023', description: 'Coffee', amount: '3.50', type: 'debit' }),
  makeTransaction({ date: '01/02/2023', description: 'Paycheck', amount: '1000.00', type: 'credit', category: 'Income' }),
  makeTransaction({ date: '01/03/2023', description: 'To savings', amount: '250', type: 'debit', category: 'Transfer' }),
];

describe('HistoryService', () => {
  it('loads through the source and drops transfers by default', () => {
    const source = new StubSource(rows);
    const history = new HistoryService(source).fromCsv('exports/mint.csv');

    expect(source.requested).toEqual(['exports/mint.csv']);
    expect(history.length).toBe(2);
  });

  it('keeps transfers only when the call asks for them', () => {
    const service = new HistoryService(new StubSource(rows));

    expect(service.fromCsv('a.csv', { includeTransfers: true }).length).toBe(3);
    expect(service.fromCsv('a.csv', { includeTransfers: false }).length).toBe(2);
    expect(service.fromRows(rows).length).toBe(2);
  });

  it('summarizes counts, totals and period', () => {
    const service = new HistoryService(new StubSource(rows));

    expect(service.summarize(service.fromCsv('a.csv', { includeTransfers: true }))).toEqual({
      count: 3,
      debitCount: 2,
      depositCount: 1,
      total: '746.50',
      debitTotal: '-253.50',
      depositTotal: '1000.00',
      period: { start: '2023-01-01', end: '2023-01-03' },
    });
  });

  it('summarizes an empty history', () => {
    const service = new HistoryService(new StubSource([]));

    expect(service.summarize(service.fromRows([]))).toEqual({
      count: 0,
      debitCount: 0,
      depositCount: 0,
      total: '0.00',
      debitTotal: '0.00',
      depositTotal: '0.00',
      period: null,
    });
  });
});
