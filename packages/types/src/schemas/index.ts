export {
  CurrencyCodeSchema,
  TextEncodingSchema,
  ImporterConfigSchema,
  type ImporterConfig,
  type ImporterConfigInput,
} from './config.js';

export {
  BalanceOutputSchema,
  TransactionOutputSchema,
  StatementOutputSchema,
  type BalanceOutput,
  type TransactionOutput,
  type StatementOutput,
} from './output.js';
