import type { Decimal } from 'decimal.js';
import { DEBIT_TYPE, type Transaction, TRANSFER_CATEGORY } from '../entities/Transaction.js';

export const isDebit = (transaction: Transaction): boolean => transaction.type === DEBIT_TYPE;

/**
 * Transfers move money between the user's own accounts, so counting them
 * would add the same money twice.
 */
export const isTransfer = (transaction: Transaction): boolean => transaction.category === TRANSFER_CATEGORY;

/**
 * Money gained (positive) or lost (negative) by the transaction.
 */
export const signedAmount = (transaction: Transaction): Decimal => {
  return isDebit(transaction) ? transaction.absoluteAmount.negated() : transaction.absoluteAmount;
};
