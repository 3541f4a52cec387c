import { open } from 'fs/promises';
import { FormatError, ImporterConfigSchema } from '@bankcsv/types';
import type { Balance, ExtractionResult, ImporterConfig, ImporterConfigInput, TransactionRecord } from '@bankcsv/types';
import { LineSource } from './line-source.js';
import { buildHeaderPattern, parsePreamble } from './preamble.js';
import { readTable } from './table-reader.js';
import { buildTransaction, classifyRow, readClosingBalance } from './row-classifier.js';

/**
 * Importer for current-account CSV exports.
 *
 * A statement file looks like:
 *
 * ```
 * Transactions Current Account;;;Customer number: 100 1234567
 * 01/01/2023 - 01/31/2023
 * Old balance:;;;;1,000.00;EUR
 * Transactions pending are not included in this report.
 * Booking date;Value date;...;Debit;Credit;Currency
 * 01/04/2023;01/05/2023;...;-50.00;;EUR
 * Account balance;;;;1,234.56;EUR;...
 * ```
 *
 * Each call re-reads its input and owns all parse state; only the
 * configuration is kept between calls.
 */
export class CurrentAccountImporter {
  readonly config: ImporterConfig;
  private readonly headerPattern: RegExp;

  constructor(config: ImporterConfigInput) {
    this.config = ImporterConfigSchema.parse(config);
    this.headerPattern = buildHeaderPattern(this.config.branch, this.config.number);
  }

  name(): string {
    return `current-account (${this.config.account})`;
  }

  /**
   * Whether `content` carries this account's statement header on any line.
   * Lines are trimmed as the preamble reader trims them. Does not parse the
   * statement.
   */
  identify(content: string): boolean {
    return content.split('\n').some((line) => this.headerPattern.test(line.trim()));
  }

  fileAccount(): string {
    return this.config.account;
  }

  /**
   * Last day of the statement period, for naming archived files.
   */
  async fileDate(filePath: string): Promise<string> {
    const result = await this.extract(filePath);
    return result.period.end;
  }

  async extract(filePath: string): Promise<ExtractionResult> {
    const handle = await open(filePath, 'r');
    try {
      return await this.extractLines(handle.readLines({ encoding: this.config.textEncoding }), filePath);
    } finally {
      await handle.close();
    }
  }

  /**
   * Extract from lines already split off their terminators.
   */
  async extractLines(lines: AsyncIterable<string> | Iterable<string>, fileName: string): Promise<ExtractionResult> {
    const source = new LineSource(lines);
    try {
      return await this.run(source, fileName);
    } finally {
      await source.close();
    }
  }

  private async run(source: LineSource, fileName: string): Promise<ExtractionResult> {
    const { currency, account } = this.config;
    const { period, openingBalance } = await parsePreamble(source, this.config, this.headerPattern);

    const transactions: TransactionRecord[] = [];
    let closingBalance: Balance | undefined;

    for await (const tableRow of readTable(source)) {
      if (closingBalance !== undefined) {
        throw new FormatError('Unexpected row after account balance', tableRow.line);
      }

      const row = classifyRow(tableRow);
      switch (row.kind) {
        case 'terminal':
          closingBalance = readClosingBalance(row, currency);
          break;
        case 'transaction':
          transactions.push(buildTransaction(row, { currency, account, file: fileName }));
          break;
      }
    }

    if (closingBalance === undefined) {
      throw new FormatError('Missing account balance row', source.linesRead);
    }

    return { transactions, period, openingBalance, closingBalance };
  }
}
