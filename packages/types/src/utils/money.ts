import { Decimal } from 'decimal.js';

const AMOUNT_PATTERN = /^-?\d[\d.,]*$/;
const FRACTION_PATTERN = /[.,](\d{2})$/;
const GROUPED_INTEGER_PATTERNS = {
  ',': /^-?\d+(?:,\d{3})*$/,
  '.': /^-?\d+(?:\.\d{3})*$/,
} as const;

/**
 * Parse a statement amount into an exact decimal.
 *
 * Exports write amounts with two fractional digits, grouped in thousands by
 * whichever separator the locale does not use for the fraction
 * ("1,234.56" or "1.234,56"). A separator followed by exactly two trailing
 * digits is the decimal separator and only the other character may group the
 * integer part. Without a fraction, grouping must use a single character.
 */
export function parseDecimal(amountStr: string): Decimal {
  const trimmed = amountStr.trim();

  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const fraction = FRACTION_PATTERN.exec(trimmed);
  const integerPart = fraction === null ? trimmed : trimmed.slice(0, fraction.index);
  const groupings =
    fraction === null
      ? [GROUPED_INTEGER_PATTERNS[','], GROUPED_INTEGER_PATTERNS['.']]
      : [fraction[0].startsWith(',') ? GROUPED_INTEGER_PATTERNS['.'] : GROUPED_INTEGER_PATTERNS[',']];
  if (!groupings.some((pattern) => pattern.test(integerPart))) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const digits = integerPart.replace(/[.,]/g, '');

  return new Decimal(fraction === null ? digits : `${digits}.${fraction[1] ?? '00'}`);
}

export function formatAmount(amount: Decimal): string {
  return amount.toFixed(2);
}
