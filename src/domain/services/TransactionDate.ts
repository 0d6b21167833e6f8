import dayjs, { type Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { ParseError } from '../errors/HistoryErrors.js';

dayjs.extend(customParseFormat);

// Mint writes zero-padded dates, but hand-edited exports often drop the padding.
const acceptedFormats = ['MM/DD/YYYY', 'M/D/YYYY', 'MM/D/YYYY', 'M/DD/YYYY'];
const shape = /^\d{1,2}\/\d{1,2}\/\d{4}$/;

export type DateInput = Dayjs | string;

export const parseTransactionDate = (text: string): Dayjs => {
  const parsed = shape.test(text) ? dayjs(text, acceptedFormats, true) : undefined;

  if (!parsed || !parsed.isValid()) {
    throw new ParseError(`Invalid date "${text}", expected MM/DD/YYYY`);
  }

  return parsed.startOf('day');
};

export const resolveDateInput = (input: DateInput): Dayjs => {
  return typeof input === 'string' ? parseTransactionDate(input) : input.startOf('day');
};

export const formatTransactionDate = (date: Dayjs): string => date.format('YYYY-MM-DD');
