import type { Transaction } from '../entities/Transaction.js';
import { signedAmount } from './TransactionClassifier.js';
import { formatTransactionDate } from './TransactionDate.js';
import { formatAmount } from './TransactionTotals.js';

export const formatTransaction = (transaction: Transaction): string => {
  return `${transaction.description}\n${formatTransactionDate(transaction.date)} | ${formatAmount(signedAmount(transaction))}`;
};
