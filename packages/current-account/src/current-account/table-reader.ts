import { parse } from 'csv-parse/sync';
import { FormatError } from '@bankcsv/types';
import type { LineSource } from './line-source.js';
import { DATA_HEADERS, DELIMITER, QUOTE, type DataHeader, type TableRow } from './types.js';

const EXPECTED_HEADER_LINE = DATA_HEADERS.join(DELIMITER);

const KNOWN_HEADERS: ReadonlySet<string> = new Set(DATA_HEADERS);

function isDataHeader(name: string): name is DataHeader {
  return KNOWN_HEADERS.has(name);
}

/**
 * Split one physical line into cells using the statement's CSV dialect.
 */
export function parseCells(text: string, lineNumber: number): string[] {
  let records: unknown;
  try {
    records = parse(text, {
      delimiter: DELIMITER,
      quote: QUOTE,
      relax_column_count: true,
      relax_quotes: true,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FormatError(`Malformed row: ${reason}`, lineNumber, { cause: error });
  }

  const [first] = Array.isArray(records) ? records : [];
  if (!Array.isArray(first)) {
    return [];
  }
  return first.map((cell: unknown) => (typeof cell === 'string' ? cell : String(cell)));
}

/**
 * True when `names` holds every expected column exactly once, in any order.
 */
export function hasExpectedHeaders(names: readonly string[]): boolean {
  const unique = new Set(names);
  return (
    names.length === DATA_HEADERS.length &&
    unique.size === names.length &&
    names.every(isDataHeader)
  );
}

/**
 * Read the table header and stream the rows below it.
 *
 * The header is checked before the first row is produced. Blank lines are
 * skipped but still counted, so `line` always matches the file.
 */
export async function* readTable(source: LineSource): AsyncGenerator<TableRow, void, undefined> {
  const headerText = await source.next();
  const headerLine = source.line;
  const header = headerText === undefined ? [] : parseCells(headerText, headerLine);

  if (!hasExpectedHeaders(header)) {
    throw new FormatError(`Unexpected data headers (expected ${EXPECTED_HEADER_LINE})`, headerLine);
  }

  const columns = header.filter(isDataHeader);

  for (;;) {
    const text = await source.next();
    if (text === undefined) {
      return;
    }
    if (text.trim() === '') {
      continue;
    }

    const line = source.line;
    const cells = parseCells(text, line);
    const values = new Map<DataHeader, string>();
    columns.forEach((name, index) => {
      values.set(name, cells[index] ?? '');
    });

    yield { line, values };
  }
}
