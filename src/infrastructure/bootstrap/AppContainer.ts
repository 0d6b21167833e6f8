import { HistoryService } from '../../application/services/HistoryService.js';
import type { TransactionSourcePort } from '../../application/ports/TransactionSourcePort.js';
import { MintCsvParser } from '../adapters/parser/MintCsvParser.js';
import { type AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  source?: TransactionSourcePort;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly source: TransactionSourcePort;
  readonly historyService: HistoryService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.source = overrides.source ?? new MintCsvParser({ logSummary: this.config.parser.logSummary });
    this.historyService = new HistoryService(this.source);
  }
}
