import type { AccountHistory, AccountHistoryOptions } from './domain/entities/AccountHistory.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

export { AccountHistory, type AccountHistoryOptions } from './domain/entities/AccountHistory.js';
export { DEBIT_TYPE, TRANSFER_CATEGORY, type Transaction } from './domain/entities/Transaction.js';
export { FileError, ParseError, type ParseErrorLocation } from './domain/errors/HistoryErrors.js';
export { isDebit, isTransfer, signedAmount } from './domain/services/TransactionClassifier.js';
export {
  type DateInput,
  formatTransactionDate,
  parseTransactionDate,
} from './domain/services/TransactionDate.js';
export { formatTransaction } from './domain/services/TransactionFormatter.js';
export {
  compareByAmount,
  formatAmount,
  isGreaterThan,
  isLessThan,
  total,
} from './domain/services/TransactionTotals.js';
export type { HistorySummaryDTO } from './application/dto/HistorySummaryDTO.js';
export type { TransactionSourcePort } from './application/ports/TransactionSourcePort.js';
export { HistoryService } from './application/services/HistoryService.js';
export { MintCsvParser, type MintCsvParserOptions } from './infrastructure/adapters/parser/MintCsvParser.js';
export { type AppConfig, loadConfig } from './infrastructure/config/Config.js';
export { AppContainer, type AppContainerOverrides } from './infrastructure/bootstrap/AppContainer.js';

let defaultContainer: AppContainer | undefined;

const container = (): AppContainer => {
  defaultContainer ??= new AppContainer();
  return defaultContainer;
};

/**
 * Loads a Mint CSV export. Transfers are dropped unless `includeTransfers` is set.
 */
export const fromCsv = (path: string, options: AccountHistoryOptions = {}): AccountHistory => {
  return container().historyService.fromCsv(path, options);
};
