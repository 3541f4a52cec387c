/**
 * Output module - handles conversion of extraction results to output formats.
 */

export {
  toStatementOutput,
  type StatementOutputOptions,
} from './statement-output.js';

export {
  exportLedger,
  type LedgerExportOptions,
} from './ledger-exporter.js';
