#!/usr/bin/env tsx
/**
 * Generate bin labels from a parts spreadsheet.
 *
 *   generate-labels [parts_file] [template_file] [output_dir] [--format png|pdf|svg]
 *                   [--qr-type micro|standard] [--no-shorten] [--export] [-q] [-v]
 *
 * Each row becomes `<name>+<description>.<format>` in the output directory.
 * With --export the icons, codes and labels are written back into the parts file.
 * Exits with status 1 when any record failed.
 */

import { fileURLToPath } from 'url';
import cac from 'cac';
import { z } from 'zod';
import { AppError, ErrorCodes } from '@/lib/utils/errors';
import { loadLabelConfig } from '@/lib/config/label';
import { readPartsFile, writeSpreadsheet } from '@/lib/services/spreadsheetService';
import { loadTemplate } from '@/lib/services/templateService';
import { VgdLinkShortener } from '@/lib/services/linkShortenerService';
import { generateLabels, summarizeOutcomes, withLabelColumns } from '@/lib/services/labelService';
import { createCliLogger, handleError, type VerbosityOptions } from './cliSupport';

const DEFAULT_TEMPLATE = fileURLToPath(new URL('../templates/label.svg', import.meta.url));

const optionsSchema = z.object({
  format: z.enum(['png', 'pdf', 'svg']).default('png'),
  qrType: z.enum(['micro', 'standard']).default('micro'),
  shorten: z.boolean().default(true),
  export: z.boolean().default(false),
});

interface GenerateCommandOptions extends VerbosityOptions {
  format?: unknown;
  qrType?: unknown;
  shorten?: unknown;
  export?: unknown;
}

async function runGenerate(
  partsFile: string,
  templateFile: string,
  outputDir: string,
  rawOptions: GenerateCommandOptions
): Promise<void> {
  const logger = createCliLogger(rawOptions);

  const parsed = optionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new AppError(ErrorCodes.INVALID_INPUT, issues.join('; '));
  }
  const options = parsed.data;
  const config = loadLabelConfig();

  const { table, records } = await readPartsFile(partsFile, logger);
  logger.debug(`Parsed ${records.length} rows from ${partsFile}`);
  const template = await loadTemplate(templateFile);

  const shortener = options.shorten
    ? new VgdLinkShortener({ baseUrl: config.shortenerUrl, timeoutMs: config.shortenerTimeoutMs })
    : null;

  const outcomes = await generateLabels(records, {
    template,
    outputDir,
    target: { format: options.format, density: config.densityDpi },
    codeMode: options.qrType === 'micro' ? 'compact' : 'standard',
    dimensions: { widthMm: config.labelWidthMm, heightMm: config.labelHeightMm },
    codeModuleMm: config.codeModuleMm,
    iconSplit: config.iconSplit,
    shortener,
    logger,
  });

  if (options.export) {
    await writeSpreadsheet(partsFile, withLabelColumns(table, outcomes));
    logger.log(`Updated parts file written to: ${partsFile}`);
  }

  const summary = summarizeOutcomes(outcomes);
  logger.log(`${summary.generated} label(s) generated, ${summary.failed} failed`);
  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const cli = cac('generate-labels');

  cli
    .command('[parts_file] [template_file] [output_dir]', 'Generate one label per row of a CSV, TSV or XLSX parts file')
    .option('--format <format>', 'Output format: png, pdf or svg', { default: 'png' })
    .option('--qr-type <type>', 'Code type: micro or standard', { default: 'micro' })
    .option('--no-shorten', 'Never shorten URLs that are too long for a Micro QR code')
    .option('--export', 'Write the generated icons, codes and labels back into the parts file')
    .option('-q, --quiet', 'Only show errors')
    .option('-v, --verbose', 'More output; repeat for debug output')
    .action(
      async (
        partsFile: string | undefined,
        templateFile: string | undefined,
        outputDir: string | undefined,
        options: GenerateCommandOptions
      ) => {
        await runGenerate(partsFile ?? 'parts.csv', templateFile ?? DEFAULT_TEMPLATE, outputDir ?? 'output', options);
      }
    );

  cli.help();
  cli.parse(process.argv, { run: false });
  await cli.runMatchedCommand();
}

main().catch(handleError);
