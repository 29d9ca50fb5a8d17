#!/usr/bin/env tsx
/**
 * Shorten every reorder_url of a parts spreadsheet into a short_url column.
 *
 *   shorten-urls <input_file> [output_file] [-q] [-v]
 *
 * Without output_file the input file is updated in place.
 */

import cac from 'cac';
import { loadLabelConfig } from '@/lib/config/label';
import { assertColumns, readSpreadsheet, writeSpreadsheet } from '@/lib/services/spreadsheetService';
import { VgdLinkShortener, addShortUrlColumn } from '@/lib/services/linkShortenerService';
import { createCliLogger, handleError, type VerbosityOptions } from './cliSupport';

async function runShorten(inputFile: string, outputFile: string | undefined, options: VerbosityOptions): Promise<void> {
  const logger = createCliLogger(options);
  const config = loadLabelConfig();
  const target = outputFile ?? inputFile;

  const table = await readSpreadsheet(inputFile);
  assertColumns(table, ['reorder_url']);
  logger.debug(`Parsed ${table.rows.length} rows from ${inputFile}`);

  const shortener = new VgdLinkShortener({ baseUrl: config.shortenerUrl, timeoutMs: config.shortenerTimeoutMs });
  const result = await addShortUrlColumn(table, shortener, logger);

  await writeSpreadsheet(target, result.table);
  logger.info(`Shortened ${result.shortened} URLs, skipped ${result.skipped} empty or invalid URLs`);
  logger.log(`Updated spreadsheet written to: ${target}`);
}

async function main(): Promise<void> {
  const cli = cac('shorten-urls');

  cli
    .command('<input_file> [output_file]', 'Add a short_url column to a CSV, TSV or XLSX parts file')
    .option('-q, --quiet', 'Only show errors')
    .option('-v, --verbose', 'More output; repeat for debug output')
    .action(async (inputFile: string, outputFile: string | undefined, options: VerbosityOptions) => {
      await runShorten(inputFile, outputFile, options);
    });

  cli.help();
  cli.parse(process.argv, { run: false });
  await cli.runMatchedCommand();
}

main().catch(handleError);
