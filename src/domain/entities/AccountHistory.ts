import type { Decimal } from 'decimal.js';
import type { Dayjs } from 'dayjs';
import { isDebit, isTransfer } from '../services/TransactionClassifier.js';
import { type DateInput, resolveDateInput } from '../services/TransactionDate.js';
import { formatTransaction } from '../services/TransactionFormatter.js';
import { total } from '../services/TransactionTotals.js';
import type { Transaction } from './Transaction.js';

export interface AccountHistoryOptions {
  includeTransfers?: boolean;
}

/**
 * Ordered, immutable set of transactions. Every query returns a new
 * history and keeps the source order; nothing is ever re-sorted.
 */
export class AccountHistory implements Iterable<Transaction> {
  private readonly transactions: readonly Transaction[];

  private constructor(transactions: readonly Transaction[]) {
    this.transactions = Object.freeze([...transactions]);
  }

  /**
   * Transfers between the user's own accounts are dropped unless
   * `includeTransfers` is set.
   */
  static fromRows(rows: Iterable<Transaction>, options: AccountHistoryOptions = {}): AccountHistory {
    const all = Array.from(rows);
    return new AccountHistory(options.includeTransfers ? all : all.filter((txn) => !isTransfer(txn)));
  }

  static empty(): AccountHistory {
    return new AccountHistory([]);
  }

  get length(): number {
    return this.transactions.length;
  }

  [Symbol.iterator](): Iterator<Transaction> {
    return this.transactions[Symbol.iterator]();
  }

  toArray(): Transaction[] {
    return [...this.transactions];
  }

  after(date: DateInput): AccountHistory {
    const bound = resolveDateInput(date);
    return this.where((txn) => txn.date.isAfter(bound, 'day'));
  }

  onOrAfter(date: DateInput): AccountHistory {
    const bound = resolveDateInput(date);
    return this.where((txn) => !txn.date.isBefore(bound, 'day'));
  }

  before(date: DateInput): AccountHistory {
    const bound = resolveDateInput(date);
    return this.where((txn) => txn.date.isBefore(bound, 'day'));
  }

  onOrBefore(date: DateInput): AccountHistory {
    const bound = resolveDateInput(date);
    return this.where((txn) => !txn.date.isAfter(bound, 'day'));
  }

  between(start: DateInput, end: DateInput): AccountHistory {
    return this.onOrAfter(start).onOrBefore(end);
  }

  /**
   * Note that `debits().total() + deposits().total()` equals `total()`.
   */
  debits(): AccountHistory {
    return this.where(isDebit);
  }

  deposits(): AccountHistory {
    return this.where((txn) => !isDebit(txn));
  }

  inAccount(account: string): AccountHistory {
    return this.where((txn) => txn.account === account);
  }

  inCategory(category: string): AccountHistory {
    return this.where((txn) => txn.category === category);
  }

  total(): Decimal {
    return total(this.transactions);
  }

  firstDate(): Dayjs | undefined {
    return this.transactions.reduce<Dayjs | undefined>(
      (earliest, txn) => (!earliest || txn.date.isBefore(earliest, 'day') ? txn.date : earliest),
      undefined,
    );
  }

  lastDate(): Dayjs | undefined {
    return this.transactions.reduce<Dayjs | undefined>(
      (latest, txn) => (!latest || txn.date.isAfter(latest, 'day') ? txn.date : latest),
      undefined,
    );
  }

  toString(): string {
    return this.transactions.map(formatTransaction).join('\n\n');
  }

  private where(predicate: (txn: Transaction) => boolean): AccountHistory {
    return new AccountHistory(this.transactions.filter(predicate));
  }
}
