import type { Decimal } from 'decimal.js';
import { FormatError, parseDecimal, parseStrictUSDate } from '@bankcsv/types';
import type { Balance, TransactionRecord } from '@bankcsv/types';
import {
  ACCOUNT_BALANCE_SENTINEL,
  field,
  type ClassifiedRow,
  type DataHeader,
  type TableRow,
  type TerminalRow,
  type TransactionRow,
} from './types.js';

export interface TransactionContext {
  currency: string;
  account: string;
  /** Source file name recorded on each transaction */
  file: string;
}

export function classifyRow(row: TableRow): ClassifiedRow {
  if (field(row.values, 'Booking date') === ACCOUNT_BALANCE_SENTINEL) {
    return { ...row, kind: 'terminal' };
  }
  return { ...row, kind: 'transaction' };
}

function parseAmountField(row: TableRow, name: DataHeader): Decimal {
  const value = field(row.values, name);
  try {
    return parseDecimal(value);
  } catch (error) {
    throw new FormatError(`Invalid ${name} value '${value}'`, row.line, { cause: error });
  }
}

/**
 * The closing balance row carries its amount under "Payment Details" and its
 * currency under "IBAN".
 */
export function readClosingBalance(row: TerminalRow, currency: string): Balance {
  if (field(row.values, 'IBAN') !== currency) {
    // The message quotes the Currency cell while the check reads IBAN.
    throw new FormatError(`Unexpected currency ${field(row.values, 'Currency')}`, row.line);
  }

  return { amount: parseAmountField(row, 'Payment Details'), currency };
}

/**
 * Whichever of Debit/Credit is filled in supplies the amount as written.
 */
function readAmount(row: TransactionRow): Decimal {
  const debit = field(row.values, 'Debit');
  const credit = field(row.values, 'Credit');

  if (debit !== '' && credit !== '') {
    throw new FormatError('Cannot have both debit and credit values', row.line);
  }
  if (debit !== '') {
    return parseAmountField(row, 'Debit');
  }
  if (credit !== '') {
    return parseAmountField(row, 'Credit');
  }
  throw new FormatError('Neither debit nor credit value found', row.line);
}

export function buildTransaction(row: TransactionRow, context: TransactionContext): TransactionRecord {
  const currency = field(row.values, 'Currency');
  if (currency !== context.currency) {
    throw new FormatError(`Unexpected currency ${currency}`, row.line);
  }

  const amount = readAmount(row);

  const valueDate = field(row.values, 'Value date');
  let date: string;
  try {
    date = parseStrictUSDate(valueDate);
  } catch (error) {
    throw new FormatError(`Invalid Value date '${valueDate}'`, row.line, { cause: error });
  }

  return Object.freeze({
    date,
    amount,
    currency,
    payee: field(row.values, 'Beneficiary / Originator').trim(),
    narration: '',
    account: context.account,
    source: Object.freeze({ file: context.file, line: row.line }),
  });
}
