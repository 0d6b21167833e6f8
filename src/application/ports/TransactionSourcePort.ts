import type { Transaction } from '../../domain/entities/Transaction.js';

export interface TransactionSourcePort {
  /**
   * Reads every transaction at `path`, in file order. Throws `FileError`
   * when the file cannot be read and `ParseError` on the first bad row.
   */
  readTransactions(path: string): Transaction[];
}
