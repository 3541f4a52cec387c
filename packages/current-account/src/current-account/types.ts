import type { Balance, StatementPeriod } from '@bankcsv/types';

/** Column names of the transaction table. Order in the file may differ. */
export const DATA_HEADERS = [
  'Booking date',
  'Value date',
  'Transaction Type',
  'Beneficiary / Originator',
  'Payment Details',
  'IBAN',
  'BIC',
  'Customer Reference',
  'Mandate Reference',
  'Creditor ID',
  'Compensation amount',
  'Original Amount',
  'Ultimate creditor',
  'Number of transactions',
  'Number of cheques',
  'Debit',
  'Credit',
  'Currency',
] as const;

export type DataHeader = (typeof DATA_HEADERS)[number];

export const DELIMITER = ';';

export const QUOTE = '"';

/** Booking date value that marks the closing balance row */
export const ACCOUNT_BALANCE_SENTINEL = 'Account balance';

export const PENDING_TRANSACTIONS_NOTICE = 'Transactions pending are not included in this report.';

export type RawRow = ReadonlyMap<DataHeader, string>;

export interface TableRow {
  /** 1-based physical line of the row */
  line: number;
  values: RawRow;
}

export interface TerminalRow extends TableRow {
  kind: 'terminal';
}

export interface TransactionRow extends TableRow {
  kind: 'transaction';
}

export type ClassifiedRow = TerminalRow | TransactionRow;

export interface Preamble {
  period: StatementPeriod;
  openingBalance: Balance;
}

/**
 * Reads a cell; cells missing from a short row read as empty.
 */
export function field(row: RawRow, name: DataHeader): string {
  return row.get(name) ?? '';
}
