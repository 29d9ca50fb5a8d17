// SPREADSHEET SERVICE - Parts list in and out
// CSV, TSV and XLSX, chosen by file extension. The first row holds the column names.

import path from 'path';
import { promises as fs } from 'fs';
import ExcelJS from 'exceljs';
import Papa from 'papaparse';
import { z } from 'zod';
import { AppError, ErrorCodes } from '@/lib/utils/errors';
import { silentLogger, type Logger } from '@/lib/utils/logger';
import type { LabelRecord } from '@/lib/types/label';

export const REQUIRED_COLUMNS = ['name', 'description', 'top_symbol', 'side_symbol', 'reorder_url'] as const;

/** Optional columns holding ready-made SVG, written back by an export run */
export const LABEL_COLUMNS = ['top_icon', 'side_icon', 'qr_svg', 'label'] as const;

export type SpreadsheetFormat = 'csv' | 'tsv' | 'xlsx';

const FORMATS: Record<string, SpreadsheetFormat> = {
  '.csv': 'csv',
  '.tsv': 'tsv',
  '.xlsx': 'xlsx',
};

const DELIMITERS: Record<Exclude<SpreadsheetFormat, 'xlsx'>, string> = {
  csv: ',',
  tsv: '\t',
};

export interface SpreadsheetTable {
  columns: string[];
  rows: Record<string, string>[];
  /** Row-level parse problems that did not stop parsing */
  warnings: string[];
}

export interface PartsFile {
  table: SpreadsheetTable;
  /** One per table row, in the same order */
  records: LabelRecord[];
}

const cell = z
  .string()
  .optional()
  .transform((value) => (value ?? '').trim());

const recordSchema = z
  .object({
    name: cell,
    description: cell,
    top_symbol: cell,
    side_symbol: cell,
    reorder_url: cell,
    top_icon: cell,
    side_icon: cell,
    qr_svg: cell,
  })
  .transform(
    (row): LabelRecord => ({
      name: row.name,
      description: row.description,
      topSymbol: row.top_symbol,
      sideSymbol: row.side_symbol,
      reorderUrl: row.reorder_url,
      topIcon: row.top_icon || undefined,
      sideIcon: row.side_icon || undefined,
      qrSvg: row.qr_svg || undefined,
    })
  );

export function spreadsheetFormat(filePath: string): SpreadsheetFormat {
  const ext = path.extname(filePath).toLowerCase();
  const format = FORMATS[ext];
  if (!format) {
    throw new AppError(
      ErrorCodes.UNSUPPORTED_FORMAT,
      `Unsupported spreadsheet format '${ext || filePath}'. Supported: ${Object.keys(FORMATS).join(', ')}`,
      { path: filePath }
    );
  }
  return format;
}

// ========================================
// DELIMITED TEXT
// ========================================

/**
 * Parse delimited text with a header row
 */
export function parseTable(text: string, delimiter: string): SpreadsheetTable {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    delimiter,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim(),
  });

  return {
    columns: parsed.meta.fields ?? [],
    rows: parsed.data,
    warnings: parsed.errors.map((err) => `Row ${err.row === undefined ? '?' : err.row + 1}: ${err.message}`),
  };
}

function formatTable(table: Pick<SpreadsheetTable, 'columns' | 'rows'>, delimiter: string): string {
  const text = Papa.unparse(
    { fields: table.columns, data: table.rows.map((row) => table.columns.map((column) => row[column] ?? '')) },
    { delimiter, newline: '\n' }
  );
  return text + '\n';
}

// ========================================
// WORKBOOKS
// ========================================

/**
 * First worksheet of a workbook as a table. Cells are read as their displayed text.
 */
async function readWorkbook(filePath: string): Promise<SpreadsheetTable> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    return { columns: [], rows: [], warnings: [] };
  }

  const header = sheet.getRow(1);
  const columns: string[] = [];
  for (let col = 1; col <= header.cellCount; col++) {
    columns.push(header.getCell(col).text.trim());
  }

  const rows: Record<string, string>[] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const sheetRow = sheet.getRow(rowNumber);
    const row: Record<string, string> = {};
    let empty = true;
    columns.forEach((column, index) => {
      const text = sheetRow.getCell(index + 1).text;
      if (text) empty = false;
      row[column] = text;
    });
    if (!empty) rows.push(row);
  }

  return { columns, rows, warnings: [] };
}

async function writeWorkbook(filePath: string, table: Pick<SpreadsheetTable, 'columns' | 'rows'>): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Parts');
  sheet.addRow(table.columns);
  for (const row of table.rows) {
    sheet.addRow(table.columns.map((column) => row[column] ?? ''));
  }
  await workbook.xlsx.writeFile(filePath);
}

// ========================================
// FILES
// ========================================

export async function readSpreadsheet(filePath: string): Promise<SpreadsheetTable> {
  const format = spreadsheetFormat(filePath);

  try {
    if (format === 'xlsx') {
      return await readWorkbook(filePath);
    }
    return parseTable(await fs.readFile(filePath, 'utf8'), DELIMITERS[format]);
  } catch (error) {
    throw new AppError(ErrorCodes.NOT_FOUND, `Parts file '${filePath}' could not be read`, {
      path: filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

export async function writeSpreadsheet(filePath: string, table: Pick<SpreadsheetTable, 'columns' | 'rows'>): Promise<void> {
  const format = spreadsheetFormat(filePath);
  if (format === 'xlsx') {
    await writeWorkbook(filePath, table);
    return;
  }
  await fs.writeFile(filePath, formatTable(table, DELIMITERS[format]), 'utf8');
}

export function assertColumns(table: SpreadsheetTable, required: readonly string[] = REQUIRED_COLUMNS): void {
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new AppError(ErrorCodes.MISSING_COLUMNS, `Missing required columns: ${missing.join(', ')}`, {
      missing,
    });
  }
}

export function toLabelRecords(table: SpreadsheetTable): LabelRecord[] {
  assertColumns(table);
  return table.rows.map((row) => recordSchema.parse(row));
}

/**
 * Read the parts file, keeping the table alongside its records for a later write-back
 */
export async function readPartsFile(filePath: string, logger: Logger = silentLogger): Promise<PartsFile> {
  const table = await readSpreadsheet(filePath);
  for (const warning of table.warnings) {
    logger.warn(`${filePath}: ${warning}`);
  }
  return { table, records: toLabelRecords(table) };
}

/**
 * Read the parts file and return one record per data row, in file order
 */
export async function parseSpreadsheet(filePath: string, logger: Logger = silentLogger): Promise<LabelRecord[]> {
  const { records } = await readPartsFile(filePath, logger);
  return records;
}
