// Importer
export { CurrentAccountImporter } from './current-account/importer.js';

// Pipeline stages
export { LineSource } from './current-account/line-source.js';
export {
  parsePreamble,
  buildHeaderPattern,
  parseHeaderLine,
  parsePeriodLine,
  parseOpeningBalanceLine,
  parseNoticeLine,
  type PreambleConfig,
} from './current-account/preamble.js';
export { readTable, parseCells, hasExpectedHeaders } from './current-account/table-reader.js';
export {
  classifyRow,
  readClosingBalance,
  buildTransaction,
  type TransactionContext,
} from './current-account/row-classifier.js';

// Layout constants and row types
export {
  DATA_HEADERS,
  DELIMITER,
  QUOTE,
  ACCOUNT_BALANCE_SENTINEL,
  PENDING_TRANSACTIONS_NOTICE,
  field,
  type DataHeader,
  type RawRow,
  type TableRow,
  type TerminalRow,
  type TransactionRow,
  type ClassifiedRow,
  type Preamble,
} from './current-account/types.js';
