import { AccountHistory, type AccountHistoryOptions } from '../../domain/entities/AccountHistory.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { formatTransactionDate } from '../../domain/services/TransactionDate.js';
import { formatAmount } from '../../domain/services/TransactionTotals.js';
import { type HistorySummaryDTO, HistorySummarySchema } from '../dto/HistorySummaryDTO.js';
import type { TransactionSourcePort } from '../ports/TransactionSourcePort.js';

export class HistoryService {
  constructor(private readonly source: TransactionSourcePort) {}

  fromCsv(path: string, options: AccountHistoryOptions = {}): AccountHistory {
    const transactions = this.source.readTransactions(path);
    return this.fromRows(transactions, options);
  }

  fromRows(rows: Iterable<Transaction>, options: AccountHistoryOptions = {}): AccountHistory {
    return AccountHistory.fromRows(rows, { includeTransfers: options.includeTransfers ?? false });
  }

  summarize(history: AccountHistory): HistorySummaryDTO {
    const debits = history.debits();
    const deposits = history.deposits();
    const start = history.firstDate();
    const end = history.lastDate();

    return HistorySummarySchema.parse({
      count: history.length,
      debitCount: debits.length,
      depositCount: deposits.length,
      total: formatAmount(history.total()),
      debitTotal: formatAmount(debits.total()),
      depositTotal: formatAmount(deposits.total()),
      period: start && end ? { start: formatTransactionDate(start), end: formatTransactionDate(end) } : null,
    });
  }
}
