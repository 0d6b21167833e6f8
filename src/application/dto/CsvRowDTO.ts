import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { ParseError } from '../../domain/errors/HistoryErrors.js';
import { parseTransactionDate } from '../../domain/services/TransactionDate.js';

// Mint export order; the header line is skipped, never read.
export const CSV_COLUMNS = [
  'date',
  'description',
  'originalDescription',
  'amount',
  'type',
  'category',
  'account',
  'labels',
  'notes',
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export const CSV_COLUMN_LABELS: Record<CsvColumn, string> = {
  date: 'Date',
  description: 'Description',
  originalDescription: 'Original Description',
  amount: 'Amount',
  type: 'Transaction Type',
  category: 'Category',
  account: 'Account Name',
  labels: 'Labels',
  notes: 'Notes',
};

const amountPattern = /^(\d+(\.\d*)?|\.\d+)$/;

export const CsvRowSchema = z.object({
  date: z.string().transform((value, ctx) => {
    try {
      return parseTransactionDate(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof ParseError ? error.message : `Invalid date "${value}"`,
      });
      return z.NEVER;
    }
  }),
  description: z.string(),
  originalDescription: z.string(),
  amount: z
    .string()
    .trim()
    .regex(amountPattern, { message: 'Amount must be a non-negative decimal number' })
    .transform((value) => new Decimal(value)),
  type: z.string(),
  category: z.string(),
  account: z.string(),
  labels: z.string(),
  notes: z.string(),
});

export type CsvRowDTO = z.infer<typeof CsvRowSchema>;

export const isCsvColumn = (key: unknown): key is CsvColumn => {
  return typeof key === 'string' && (CSV_COLUMNS as readonly string[]).includes(key);
};
