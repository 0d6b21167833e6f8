import { readFileSync } from 'node:fs';
import Papa from 'papaparse';
import type { Transaction } from '../../../domain/entities/Transaction.js';
import { FileError, ParseError } from '../../../domain/errors/HistoryErrors.js';
import { CSV_COLUMNS, CSV_COLUMN_LABELS, CsvRowSchema, isCsvColumn } from '../../../application/dto/CsvRowDTO.js';
import type { TransactionSourcePort } from '../../../application/ports/TransactionSourcePort.js';

const isBlank = (row: string[]): boolean => row.length === 1 && row[0] === '';

// 1-based physical line each record starts on; quoted fields may span lines.
const startLines = (rows: string[][]): number[] => {
  const starts: number[] = [];
  let line = 1;

  for (const row of rows) {
    starts.push(line);
    line += 1 + row.reduce((count, field) => count + (field.match(/\n/g)?.length ?? 0), 0);
  }

  return starts;
};

export interface MintCsvParserOptions {
  logSummary?: boolean;
}

export class MintCsvParser implements TransactionSourcePort {
  constructor(private readonly options: MintCsvParserOptions = {}) {}

  readTransactions(path: string): Transaction[] {
    let text: string;

    try {
      text = readFileSync(path, 'utf8');
    } catch (error) {
      throw new FileError(path, error);
    }

    const transactions = this.parseText(text);

    if (this.options.logSummary) {
      console.log('📄 CSV parsed:', {
        path,
        transactionsFound: transactions.length,
      });
    }

    return transactions;
  }

  /**
   * Parses the full export. The first line is always treated as the header
   * and dropped, whatever it contains.
   */
  parseText(text: string): Transaction[] {
    const result = Papa.parse<string[]>(text, {
      delimiter: ',',
      header: false,
      skipEmptyLines: false,
    });
    const lines = startLines(result.data);

    const quoteError = result.errors.find((error) => error.type === 'Quotes');
    if (quoteError) {
      throw new ParseError(`Malformed CSV: ${quoteError.message}`, {
        line: quoteError.row !== undefined ? lines[quoteError.row] : undefined,
      });
    }

    const transactions: Transaction[] = [];

    result.data.forEach((row, index) => {
      if (index === 0 || isBlank(row)) {
        return;
      }
      transactions.push(this.parseRow(row, lines[index] ?? index + 1));
    });

    return transactions;
  }

  private parseRow(row: string[], line: number): Transaction {
    if (row.length !== CSV_COLUMNS.length) {
      throw new ParseError(`Expected ${CSV_COLUMNS.length} columns but found ${row.length}`, { line });
    }

    const fields = Object.fromEntries(CSV_COLUMNS.map((column, position) => [column, row[position]]));
    const parsed = CsvRowSchema.safeParse(fields);

    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const key = issue?.path[0];
      throw new ParseError(issue?.message ?? 'Invalid row', {
        line,
        column: isCsvColumn(key) ? CSV_COLUMN_LABELS[key] : undefined,
      });
    }

    const { amount, ...rest } = parsed.data;

    return Object.freeze({ ...rest, absoluteAmount: amount });
  }
}
