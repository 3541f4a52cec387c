import { describe, it, expect } from 'vitest';
import {
  DATA_HEADERS,
  LineSource,
  field,
  hasExpectedHeaders,
  parseCells,
  readTable,
  type TableRow,
} from '@bankcsv/current-account';
import { HEADER_LINE, rowLine, transactionLine } from '../helpers/statement.js';

async function collect(rows: AsyncIterable<TableRow>): Promise<TableRow[]> {
  const collected: TableRow[] = [];
  for await (const row of rows) {
    collected.push(row);
  }
  return collected;
}

const EXPECTED_HEADERS_MESSAGE = `Unexpected data headers (expected ${DATA_HEADERS.join(';')})`;

describe('hasExpectedHeaders', () => {
  it('should accept the columns in file order', () => {
    expect(hasExpectedHeaders([...DATA_HEADERS])).toBe(true);
  });

  it('should accept any permutation', () => {
    expect(hasExpectedHeaders([...DATA_HEADERS].reverse())).toBe(true);
  });

  it('should reject a missing column', () => {
    expect(hasExpectedHeaders(DATA_HEADERS.filter((name) => name !== 'Credit'))).toBe(false);
  });

  it('should reject an extra column', () => {
    expect(hasExpectedHeaders([...DATA_HEADERS, 'Memo'])).toBe(false);
  });

  it('should reject a duplicated column in place of another', () => {
    const names = DATA_HEADERS.map((name) => (name === 'Credit' ? 'Debit' : name));
    expect(hasExpectedHeaders(names)).toBe(false);
  });
});

describe('parseCells', () => {
  it('should split on semicolons and keep empty cells', () => {
    expect(parseCells('a;;b;', 1)).toEqual(['a', '', 'b', '']);
  });

  it('should honour quoted delimiters', () => {
    expect(parseCells('a;"Employer; Inc.";b', 1)).toEqual(['a', 'Employer; Inc.', 'b']);
  });

  it('should keep quotes inside unquoted cells', () => {
    expect(parseCells('Acme "Shop";b', 1)).toEqual(['Acme "Shop"', 'b']);
  });

  it('should report an unterminated quote at its line', () => {
    expect(() => parseCells('a;"b', 9)).toThrow(/^Malformed row: .* \(line 9\)$/);
  });
});

describe('readTable', () => {
  it('should map cells to column names and count lines', async () => {
    const source = new LineSource([HEADER_LINE, transactionLine(), transactionLine({ Debit: '', Credit: '10.00' })]);
    const rows = await collect(readTable(source));
    const [first, second] = rows;

    expect(rows.map((row) => row.line)).toEqual([2, 3]);
    expect(first === undefined ? undefined : field(first.values, 'Debit')).toBe('-50.00');
    expect(second === undefined ? undefined : field(second.values, 'Credit')).toBe('10.00');
    expect(second?.values.get('Beneficiary / Originator')).toBe('Acme');
  });

  it('should map cells by name when columns are permuted', async () => {
    const columns = [...DATA_HEADERS].reverse();
    const source = new LineSource([columns.join(';'), rowLine({ Currency: 'EUR', Debit: '1.00' }, columns)]);
    const [row] = await collect(readTable(source));

    expect(row?.values.get('Currency')).toBe('EUR');
    expect(row?.values.get('Debit')).toBe('1.00');
    expect(row?.values.get('Booking date')).toBe('');
  });

  it('should read cells missing from a short row as empty', async () => {
    const source = new LineSource([HEADER_LINE, 'Account balance;;;;3,450.00;EUR']);
    const [row] = await collect(readTable(source));

    expect(row?.values.get('IBAN')).toBe('EUR');
    expect(row?.values.get('Currency')).toBe('');
  });

  it('should skip blank lines but keep counting them', async () => {
    const source = new LineSource([HEADER_LINE, '', '   ', transactionLine()]);
    const rows = await collect(readTable(source));

    expect(rows).toHaveLength(1);
    expect(rows[0]?.line).toBe(4);
  });

  it('should reject a header with a missing column', async () => {
    const header = DATA_HEADERS.filter((name) => name !== 'BIC').join(';');
    await expect(collect(readTable(new LineSource([header, transactionLine()])))).rejects.toThrow(
      `${EXPECTED_HEADERS_MESSAGE} (line 1)`
    );
  });

  it('should reject a header with an extra column', async () => {
    await expect(collect(readTable(new LineSource([`${HEADER_LINE};Memo`])))).rejects.toThrow(
      EXPECTED_HEADERS_MESSAGE
    );
  });

  it('should reject a missing header', async () => {
    const source = new LineSource(['header-less']);
    await source.next();
    await expect(collect(readTable(source))).rejects.toThrow(`${EXPECTED_HEADERS_MESSAGE} (line 2)`);
  });

  it('should pull one line per row', async () => {
    const source = new LineSource([HEADER_LINE, transactionLine(), transactionLine()]);
    const rows = readTable(source);

    const first = await rows.next();
    expect(first.done).toBe(false);
    expect(source.line).toBe(2);

    await rows.next();
    expect(source.line).toBe(3);

    const end = await rows.next();
    expect(end.done).toBe(true);
  });
});

describe('LineSource', () => {
  it('should keep linesRead on the last line once input is exhausted', async () => {
    const source = new LineSource(['a\r', 'b']);
    expect(await source.next()).toBe('a');
    expect(await source.next()).toBe('b');
    expect(await source.next()).toBeUndefined();
    expect(source.line).toBe(3);
    expect(source.linesRead).toBe(2);
  });
});
