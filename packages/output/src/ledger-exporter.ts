/**
 * Ledger Exporter Module
 *
 * Renders an extraction result as plain-text double-entry ledger directives:
 * one entry per transaction with a single posting to its account,
 * bracketed by balance assertions for the opening and closing balances.
 */

import { addDays, formatAmount, type Balance, type ExtractionResult } from '@bankcsv/types';

/**
 * Options for ledger export
 */
export interface LedgerExportOptions {
  /** Account the balance assertions are written against; postings use each transaction's account */
  account: string;
  /** Transaction flag (default: '*') */
  flag?: string;
  /** Emit opening/closing balance assertions (default: true) */
  includeBalances?: boolean;
  /** Posting indentation (default: two spaces) */
  indent?: string;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function balanceDirective(date: string, account: string, balance: Balance): string {
  return `${date} balance ${account}  ${formatAmount(balance.amount)} ${balance.currency}`;
}

export function exportLedger(result: ExtractionResult, options: LedgerExportOptions): string {
  const opts: Required<LedgerExportOptions> = {
    account: options.account,
    flag: options.flag ?? '*',
    includeBalances: options.includeBalances ?? true,
    indent: options.indent ?? '  ',
  };

  const blocks: string[] = [];

  // Balance assertions apply at the start of their day
  if (opts.includeBalances) {
    blocks.push(balanceDirective(result.period.start, opts.account, result.openingBalance));
  }

  for (const txn of result.transactions) {
    blocks.push(
      [
        `${txn.date} ${opts.flag} ${quote(txn.payee)} ${quote(txn.narration)}`,
        `${opts.indent}${txn.account}  ${formatAmount(txn.amount)} ${txn.currency}`,
      ].join('\n')
    );
  }

  if (opts.includeBalances) {
    blocks.push(balanceDirective(addDays(result.period.end, 1), opts.account, result.closingBalance));
  }

  return blocks.length === 0 ? '' : `${blocks.join('\n\n')}\n`;
}
