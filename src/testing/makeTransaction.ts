import { Decimal } from 'decimal.js';
import type { Transaction } from '../domain/entities/Transaction.js';
import { parseTransactionDate } from '../domain/services/TransactionDate.js';

export interface TransactionFixture {
  date?: string;
  description?: string;
  amount?: string;
  type?: string;
  category?: string;
  account?: string;
}

export const makeTransaction = (fixture: TransactionFixture = {}): Transaction =>
  Object.freeze({
    date: parseTransactionDate(fixture.date ?? '01/01/2023'),
    description: fixture.description ?? 'Test transaction',
    originalDescription: '',
    absoluteAmount: new Decimal(fixture.amount ?? '1.00'),
    type: fixture.type ?? 'debit',
    category: fixture.category ?? 'Food',
    account: fixture.account ?? 'Checking',
    labels: '',
    notes: '',
  });
