// LABEL SERVICE - One label file per parts record
//
// Per record: icons -> code -> template values -> rendered SVG -> exported file.
// Records are processed one after another. A failing record is logged and
// reported in the outcomes; the rest of the batch carries on.
// Icons and codes already present in the record are reused instead of generated.

import path from 'path';
import { AppError, ErrorCodes, toErrorMessage } from '@/lib/utils/errors';
import { sanitizeSvg } from '@/lib/utils/svg';
import { silentLogger, type Logger } from '@/lib/utils/logger';
import { getDefaultIconRegistry, type IconRegistry } from '@/lib/icons/registry';
import type {
  CodeMode,
  ExportTarget,
  IconSplit,
  LabelDimensions,
  LabelOutcome,
  LabelRecord,
} from '@/lib/types/label';
import { composeIcons, resolveIcon } from './iconService';
import { generateCode, reuseCode, type CodeGeneratorDeps } from './codeService';
import { buildTemplateValues, renderTemplate } from './templateService';
import { exportLabel, labelFileName, type LabelRasterizer } from './exportService';
import type { LinkShortener } from './linkShortenerService';
import type { CodeEncoder } from './codeEncoderService';
import { LABEL_COLUMNS, type SpreadsheetTable } from './spreadsheetService';

export interface GenerateLabelsOptions {
  template: string;
  outputDir: string;
  target: ExportTarget;
  codeMode: CodeMode;
  dimensions: LabelDimensions;
  /** Millimetres per code module */
  codeModuleMm: number;
  iconSplit?: IconSplit;
  registry?: IconRegistry;
  shortener?: LinkShortener | null;
  encoder?: CodeEncoder;
  rasterizer?: LabelRasterizer;
  logger?: Logger;
}

export interface LabelRunSummary {
  generated: number;
  failed: number;
}

/**
 * Render and export one record. Throws on any failure.
 */
export async function generateLabel(
  record: LabelRecord,
  options: GenerateLabelsOptions
): Promise<Extract<LabelOutcome, { status: 'generated' }>> {
  const registry = options.registry ?? getDefaultIconRegistry();
  const logger = options.logger ?? silentLogger;

  const topIcon = record.topIcon ? sanitizeSvg(record.topIcon) : resolveIcon(registry, 'top', record.topSymbol);
  const sideIcon = record.sideIcon ? sanitizeSvg(record.sideIcon) : resolveIcon(registry, 'side', record.sideSymbol);
  const iconSvg = composeIcons(topIcon, sideIcon, options.iconSplit);

  const code = record.qrSvg
    ? reuseCode(record.qrSvg, record.reorderUrl, options.codeMode, options.dimensions.heightMm)
    : await generateCode(record.reorderUrl, options.codeMode, codeDeps(options, logger), {
        moduleSizeMm: options.codeModuleMm,
        maxSizeMm: options.dimensions.heightMm,
      });

  const document = renderTemplate(
    options.template,
    buildTemplateValues(record, iconSvg, code, options.dimensions)
  );

  const outputPath = path.join(options.outputDir, labelFileName(record, options.target.format));
  await exportLabel(document, options.target, outputPath, {
    dimensions: options.dimensions,
    rasterizer: options.rasterizer,
  });

  return {
    status: 'generated',
    record,
    outputPath,
    code,
    artifacts: { topIcon: topIcon ?? '', sideIcon: sideIcon ?? '', qrSvg: code.svg, label: document },
  };
}

function codeDeps(options: GenerateLabelsOptions, logger: Logger): CodeGeneratorDeps {
  return { encoder: options.encoder, shortener: options.shortener, logger };
}

/**
 * Generate a label for every record, in order. Never throws for a single record.
 */
export async function generateLabels(
  records: readonly LabelRecord[],
  options: GenerateLabelsOptions
): Promise<LabelOutcome[]> {
  const logger = options.logger ?? silentLogger;
  const outcomes: LabelOutcome[] = [];
  const written = new Set<string>();

  for (const record of records) {
    try {
      const outcome = await generateLabel(record, options);
      if (written.has(outcome.outputPath)) {
        logger.warn(`Overwrote ${outcome.outputPath}: another record has the same name and description`);
      }
      written.add(outcome.outputPath);
      logger.log(`Generated ${outcome.outputPath}`);
      outcomes.push(outcome);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      logger.error(`Failed to generate label for '${record.name}': ${toErrorMessage(failure)}`);
      outcomes.push({ status: 'failed', record, error: failure });
    }
  }

  return outcomes;
}

export function summarizeOutcomes(outcomes: readonly LabelOutcome[]): LabelRunSummary {
  let generated = 0;
  for (const outcome of outcomes) {
    if (outcome.status === 'generated') generated++;
  }
  return { generated, failed: outcomes.length - generated };
}

/**
 * The parts table with each generated row's icons, code and label filled in.
 * Rows that failed keep their cells; outcomes must line up with the table rows.
 */
export function withLabelColumns(table: SpreadsheetTable, outcomes: readonly LabelOutcome[]): SpreadsheetTable {
  if (outcomes.length !== table.rows.length) {
    throw new AppError(
      ErrorCodes.INVALID_INPUT,
      `Expected one outcome per row: ${table.rows.length} rows, ${outcomes.length} outcomes`
    );
  }

  const columns = [...table.columns, ...LABEL_COLUMNS.filter((column) => !table.columns.includes(column))];
  const rows = table.rows.map((row, index): Record<string, string> => {
    const outcome = outcomes[index];
    if (outcome.status !== 'generated') return { ...row };
    const { topIcon, sideIcon, qrSvg, label } = outcome.artifacts;
    return { ...row, top_icon: topIcon, side_icon: sideIcon, qr_svg: qrSvg, label };
  });

  return { ...table, columns, rows };
}
