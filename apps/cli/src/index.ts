#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import { CurrentAccountImporter } from '@bankcsv/current-account';
import { exportLedger, toStatementOutput } from '@bankcsv/output';
import { PARSER_VERSION } from '@bankcsv/types';
import {
  AVAILABLE_FORMATS,
  envBool,
  parseOutputFormat,
  resolveImporterConfig,
  type ImporterCliOptions,
} from './config.js';

interface CommonOptions extends ImporterCliOptions {
  verbose: boolean;
}

interface ExtractOptions extends CommonOptions {
  out?: string;
  format: string;
  pretty: boolean;
  balances: boolean;
}

const program = new Command();

function withImporterOptions(command: Command): Command {
  return command
    .option('--branch <branch>', 'Branch code in the statement header', process.env['BANKCSV_BRANCH'])
    .option('--number <number>', 'Customer number in the statement header', process.env['BANKCSV_NUMBER'])
    .option('--account <account>', 'Ledger account the transactions are filed against', process.env['BANKCSV_ACCOUNT'])
    .option('--currency <code>', 'Statement currency (default: EUR)', process.env['BANKCSV_CURRENCY'])
    .option('--encoding <encoding>', 'Text encoding of the file (default: utf8)', process.env['BANKCSV_ENCODING'])
    .option('-v, --verbose', 'Enable verbose output', envBool(process.env['BANKCSV_VERBOSE'], false));
}

function reportError(error: unknown, verbose: boolean): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  if (verbose && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}

program
  .name('bank-csv')
  .description('Import current-account CSV statement exports')
  .version(PARSER_VERSION);

withImporterOptions(
  program
    .command('extract')
    .description('Extract transactions and balances from a statement file')
    .argument('<csv-file>', 'Path to the statement CSV export')
    .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['BANKCSV_OUTPUT_FILE'])
    .option(
      '-f, --format <format>',
      `Output format (${AVAILABLE_FORMATS.join(', ')})`,
      process.env['BANKCSV_FORMAT'] ?? 'json'
    )
    .option('--pretty', 'Pretty-print JSON output', envBool(process.env['BANKCSV_PRETTY'], true))
    .option('--no-pretty', 'Disable pretty-printing')
    .option('--no-balances', 'Omit balance assertions from ledger output')
).action(async (csvFile: string, options: ExtractOptions) => {
  try {
    const filePath = resolve(csvFile);
    const format = parseOutputFormat(options.format);
    const importer = new CurrentAccountImporter(resolveImporterConfig(options));

    if (options.verbose) {
      console.error(`[INFO] Parsing: ${filePath}`);
      console.error(`[INFO] Parser version: ${PARSER_VERSION}`);
      console.error(`[INFO] Account: ${importer.fileAccount()}`);
      console.error(`[INFO] Currency: ${importer.config.currency}`);
    }

    const result = await importer.extract(filePath);

    if (options.verbose) {
      console.error(`[INFO] Period: ${result.period.start} to ${result.period.end}`);
      console.error(`[INFO] Found ${result.transactions.length} transactions`);
    }

    let outputContent: string;
    if (format === 'ledger') {
      outputContent = exportLedger(result, {
        account: importer.fileAccount(),
        includeBalances: options.balances,
      });
    } else {
      const output = toStatementOutput(result, { account: importer.fileAccount(), sourceFile: filePath });
      outputContent = options.pretty ? `${JSON.stringify(output, null, 2)}\n` : `${JSON.stringify(output)}\n`;
    }

    if (options.out !== undefined) {
      const outPath = resolve(options.out);
      await writeFile(outPath, outputContent, 'utf-8');
      if (options.verbose) {
        console.error(`[INFO] Output written to: ${outPath}`);
      }
    } else {
      process.stdout.write(outputContent);
    }
  } catch (error) {
    reportError(error, options.verbose);
  }
});

withImporterOptions(
  program
    .command('identify')
    .description('Check whether a file is a statement export for the configured customer')
    .argument('<csv-file>', 'Path to the candidate file')
).action(async (csvFile: string, options: CommonOptions) => {
  try {
    const importer = new CurrentAccountImporter(resolveImporterConfig(options));
    const content = await readFile(resolve(csvFile), { encoding: importer.config.textEncoding });
    const identified = importer.identify(content);

    console.log(identified ? 'yes' : 'no');
    process.exit(identified ? 0 : 1);
  } catch (error) {
    reportError(error, options.verbose);
  }
});

withImporterOptions(
  program
    .command('file-date')
    .description('Print the last day of the statement period (YYYY-MM-DD)')
    .argument('<csv-file>', 'Path to the statement CSV export')
).action(async (csvFile: string, options: CommonOptions) => {
  try {
    const importer = new CurrentAccountImporter(resolveImporterConfig(options));
    console.log(await importer.fileDate(resolve(csvFile)));
  } catch (error) {
    reportError(error, options.verbose);
  }
});

await program.parseAsync(process.argv);
