import { z } from 'zod';
import { DEFAULT_CURRENCY, DEFAULT_TEXT_ENCODING } from '../utils/constants.js';

export const CurrencyCodeSchema = z.string().regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter ISO code');

export const TextEncodingSchema = z
  .string()
  .refine((value): value is BufferEncoding => Buffer.isEncoding(value), {
    message: 'Unsupported text encoding',
  });

export const ImporterConfigSchema = z.object({
  branch: z.string().min(1),
  number: z.string().min(1),
  account: z.string().min(1),
  currency: CurrencyCodeSchema.default(DEFAULT_CURRENCY),
  textEncoding: TextEncodingSchema.default(DEFAULT_TEXT_ENCODING),
});

/** Accepted input, with currency and encoding optional */
export type ImporterConfigInput = z.input<typeof ImporterConfigSchema>;
export type ImporterConfig = z.output<typeof ImporterConfigSchema>;
