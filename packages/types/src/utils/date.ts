const US_LONG_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/**
 * Parse an `MM/DD/YYYY` date into `YYYY-MM-DD`.
 *
 * Strict: two-digit month and day, four-digit year, and the date must exist
 * in the calendar (`02/30/2023` is rejected).
 */
export function parseStrictUSDate(dateStr: string): string {
  const match = US_LONG_DATE.exec(dateStr);
  if (match === null) {
    throw new Error(`Unable to parse date: ${dateStr}`);
  }

  const [, month, day, year] = match;
  if (month === undefined || day === undefined || year === undefined) {
    throw new Error(`Invalid date format: ${dateStr}`);
  }

  const monthNum = parseInt(month, 10);
  const dayNum = parseInt(day, 10);
  const yearNum = parseInt(year, 10);

  if (monthNum < 1 || monthNum > 12 || dayNum < 1 || dayNum > daysInMonth(yearNum, monthNum)) {
    throw new Error(`Invalid calendar date: ${dateStr}`);
  }

  return `${year}-${month}-${day}`;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Shift an ISO date by a number of days.
 */
export function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}
