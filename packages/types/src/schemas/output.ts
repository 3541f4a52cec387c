import { z } from 'zod';
import { CurrencyCodeSchema } from './config.js';

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');
const AmountStringSchema = z.string().regex(/^-?\d+\.\d{2}$/, 'Amount must have two decimal places');

export const BalanceOutputSchema = z.object({
  amount: AmountStringSchema,
  currency: CurrencyCodeSchema,
});
export type BalanceOutput = z.infer<typeof BalanceOutputSchema>;

export const TransactionOutputSchema = z.object({
  date: IsoDateSchema,
  amount: AmountStringSchema,
  currency: CurrencyCodeSchema,
  payee: z.string(),
  narration: z.string(),
  account: z.string().min(1),
  source: z.object({
    file: z.string(),
    line: z.number().int().positive(),
  }),
});
export type TransactionOutput = z.infer<typeof TransactionOutputSchema>;

export const StatementOutputSchema = z.object({
  account: z.string().min(1),
  period: z.object({
    start: IsoDateSchema,
    end: IsoDateSchema,
  }),
  openingBalance: BalanceOutputSchema,
  closingBalance: BalanceOutputSchema,
  transactions: z.array(TransactionOutputSchema),
  metadata: z.object({
    parserVersion: z.string(),
    parsedAt: z.string().datetime(),
    sourceFile: z.string(),
  }),
});
export type StatementOutput = z.infer<typeof StatementOutputSchema>;
