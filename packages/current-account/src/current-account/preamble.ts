import { FormatError, parseDecimal, parseStrictUSDate } from '@bankcsv/types';
import type { Balance, StatementPeriod } from '@bankcsv/types';
import type { LineSource } from './line-source.js';
import { PENDING_TRANSACTIONS_NOTICE, type Preamble } from './types.js';

export interface PreambleConfig {
  branch: string;
  number: string;
  currency: string;
}

const PREAMBLE_PATTERNS = {
  period: /^(\d{2}\/\d{2}\/\d{4}) - (\d{2}\/\d{2}\/\d{4})$/,
  oldBalancePrefix: 'Old balance:;;;;',
  amount: /^\d[\d.,]*[.,]\d{2}$/,
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pattern for the first statement line, e.g.
 * `Transactions Current Account;;;Customer number: 100 1234567`, tested
 * against a trimmed line.
 */
export function buildHeaderPattern(branch: string, number: string): RegExp {
  return new RegExp(
    '^Transactions\\s.*;;;Customer\\snumber:\\s' + escapeRegExp(branch) + '\\s' + escapeRegExp(number) + '$'
  );
}

export function parseHeaderLine(line: string, lineNumber: number, headerPattern: RegExp): void {
  if (!headerPattern.test(line)) {
    throw new FormatError(`Unexpected header '${line}'`, lineNumber);
  }
}

export function parsePeriodLine(line: string, lineNumber: number): StatementPeriod {
  const match = PREAMBLE_PATTERNS.period.exec(line);
  if (match?.[1] === undefined || match[2] === undefined) {
    throw new FormatError(`Unexpected from and to dates '${line}'`, lineNumber);
  }

  try {
    return {
      start: parseStrictUSDate(match[1]),
      end: parseStrictUSDate(match[2]),
    };
  } catch (error) {
    throw new FormatError(`Unexpected from and to dates '${line}'`, lineNumber, { cause: error });
  }
}

/**
 * `Old balance:;;;;1,234.56;EUR`: four empty cells, the amount, then the
 * statement currency.
 */
export function parseOpeningBalanceLine(line: string, lineNumber: number, currency: string): Balance {
  const suffix = `;${currency}`;
  const amount = line.startsWith(PREAMBLE_PATTERNS.oldBalancePrefix) && line.endsWith(suffix)
    ? line.slice(PREAMBLE_PATTERNS.oldBalancePrefix.length, line.length - suffix.length)
    : undefined;

  if (amount === undefined || !PREAMBLE_PATTERNS.amount.test(amount)) {
    throw new FormatError(`Unexpected old balance '${line}'`, lineNumber);
  }

  try {
    return { amount: parseDecimal(amount), currency };
  } catch (error) {
    throw new FormatError(`Unexpected old balance '${line}'`, lineNumber, { cause: error });
  }
}

export function parseNoticeLine(line: string, lineNumber: number): void {
  if (line !== PENDING_TRANSACTIONS_NOTICE) {
    throw new FormatError(
      `Unexpected line '${line}' (expected ${PENDING_TRANSACTIONS_NOTICE})`,
      lineNumber
    );
  }
}

async function nextTrimmedLine(source: LineSource): Promise<string> {
  const line = await source.next();
  return line?.trim() ?? '';
}

/**
 * Consume and validate the four lines ahead of the transaction table.
 */
export async function parsePreamble(
  source: LineSource,
  config: PreambleConfig,
  headerPattern: RegExp = buildHeaderPattern(config.branch, config.number)
): Promise<Preamble> {
  parseHeaderLine(await nextTrimmedLine(source), source.line, headerPattern);

  const period = parsePeriodLine(await nextTrimmedLine(source), source.line);

  const openingBalance = parseOpeningBalanceLine(await nextTrimmedLine(source), source.line, config.currency);

  parseNoticeLine(await nextTrimmedLine(source), source.line);

  return { period, openingBalance };
}
