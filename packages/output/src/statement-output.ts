/**
 * JSON output adapter.
 *
 * Converts an extraction result into a JSON-safe document: decimals become
 * two-decimal strings so no precision is lost on the way out.
 */

import {
  PARSER_VERSION,
  StatementOutputSchema,
  formatAmount,
  type Balance,
  type BalanceOutput,
  type ExtractionResult,
  type StatementOutput,
} from '@bankcsv/types';

export interface StatementOutputOptions {
  /** Ledger account the statement was filed against */
  account: string;
  /** Path or name of the statement file */
  sourceFile: string;
  /** Timestamp recorded as `metadata.parsedAt` (default: now) */
  parsedAt?: Date;
}

function toBalanceOutput(balance: Balance): BalanceOutput {
  return {
    amount: formatAmount(balance.amount),
    currency: balance.currency,
  };
}

export function toStatementOutput(
  result: ExtractionResult,
  options: StatementOutputOptions
): StatementOutput {
  const output: StatementOutput = {
    account: options.account,
    period: { ...result.period },
    openingBalance: toBalanceOutput(result.openingBalance),
    closingBalance: toBalanceOutput(result.closingBalance),
    transactions: result.transactions.map((txn) => ({
      date: txn.date,
      amount: formatAmount(txn.amount),
      currency: txn.currency,
      payee: txn.payee,
      narration: txn.narration,
      account: txn.account,
      source: { ...txn.source },
    })),
    metadata: {
      parserVersion: PARSER_VERSION,
      parsedAt: (options.parsedAt ?? new Date()).toISOString(),
      sourceFile: options.sourceFile,
    },
  };

  return StatementOutputSchema.parse(output);
}
