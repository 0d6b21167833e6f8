import { z } from 'zod';

const decimalString = z.string().regex(/^-?\d+\.\d{2,}$/);
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const HistorySummarySchema = z.object({
  count: z.number().int().nonnegative(),
  debitCount: z.number().int().nonnegative(),
  depositCount: z.number().int().nonnegative(),
  total: decimalString,
  debitTotal: decimalString,
  depositTotal: decimalString,
  period: z
    .object({
      start: isoDate,
      end: isoDate,
    })
    .nullable(),
});

export type HistorySummaryDTO = z.infer<typeof HistorySummarySchema>;
