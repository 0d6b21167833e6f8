import { Decimal } from 'decimal.js';
import type { Transaction } from '../entities/Transaction.js';
import { signedAmount } from './TransactionClassifier.js';

export const total = (transactions: Iterable<Transaction>): Decimal => {
  let sum = new Decimal(0);

  for (const txn of transactions) {
    sum = sum.plus(signedAmount(txn));
  }

  return sum;
};

// Ties are neither less nor greater; no secondary key is applied.
export const compareByAmount = (a: Transaction, b: Transaction): number => {
  return signedAmount(a).comparedTo(signedAmount(b));
};

export const isLessThan = (a: Transaction, b: Transaction): boolean => compareByAmount(a, b) < 0;

export const isGreaterThan = (a: Transaction, b: Transaction): boolean => compareByAmount(a, b) > 0;

export const formatAmount = (amount: Decimal): string => amount.toFixed(Math.max(2, amount.decimalPlaces()));
