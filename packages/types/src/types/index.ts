import type { Decimal } from 'decimal.js';

export interface StatementPeriod {
  /** First day covered, `YYYY-MM-DD` */
  start: string;
  /** Last day covered, `YYYY-MM-DD` */
  end: string;
}

export interface Balance {
  amount: Decimal;
  currency: string;
}

export interface SourceLocation {
  file: string;
  line: number;
}

/**
 * One ordinary table row of a statement.
 *
 * `amount` is taken as written from whichever of Debit/Credit is filled in;
 * the debit/credit meaning is left to the consuming ledger.
 */
export interface TransactionRecord {
  readonly date: string;
  readonly amount: Decimal;
  readonly currency: string;
  readonly payee: string;
  readonly narration: string;
  readonly account: string;
  readonly source: Readonly<SourceLocation>;
}

export interface ExtractionResult {
  /** In statement order */
  transactions: TransactionRecord[];
  period: StatementPeriod;
  openingBalance: Balance;
  closingBalance: Balance;
}
