import type { Dayjs } from 'dayjs';
import type { Decimal } from 'decimal.js';

export const DEBIT_TYPE = 'debit';
export const TRANSFER_CATEGORY = 'Transfer';

export interface Transaction {
  readonly date: Dayjs; // local midnight, no time component
  readonly description: string;
  readonly originalDescription: string;
  readonly absoluteAmount: Decimal; // never negative
  readonly type: string; // 'debit' or anything else
  readonly category: string;
  readonly account: string;
  readonly labels: string;
  readonly notes: string;
}
