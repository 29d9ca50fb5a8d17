/**
 * Export Service
 *
 * Writes a rendered label document to disk:
 * - svg: the document as-is
 * - png: rasterised with resvg to exactly the label's size in pixels at the target density
 * - pdf: the PNG raster embedded by pdfkit on a page the physical size of the label
 */

import path from 'path';
import { promises as fs } from 'fs';
import { Resvg } from '@resvg/resvg-js';
import PDFDocument from 'pdfkit';
import { AppError, ErrorCodes, isAppError } from '@/lib/utils/errors';
import { MM_PER_INCH, POINTS_PER_INCH } from '@/lib/constants/label';
import { setRootSize } from '@/lib/utils/svg';
import type { ExportFormat, ExportTarget, LabelDimensions, LabelRecord, RasterFormat } from '@/lib/types/label';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['png', 'pdf', 'svg'];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

// ========================================
// UNITS & FILE NAMES
// ========================================

export function mmToPx(mm: number, density: number): number {
  return Math.round((mm * density) / MM_PER_INCH);
}

export function mmToPoints(mm: number): number {
  return (mm * POINTS_PER_INCH) / MM_PER_INCH;
}

/**
 * Make a record field safe for a file name: spaces become '_', path separators '-'
 */
export function sanitizeFileName(value: string): string {
  return value.replace(/ /g, '_').replace(/[/\\]/g, '-');
}

export function labelFileName(record: Pick<LabelRecord, 'name' | 'description'>, format: ExportFormat): string {
  let base = sanitizeFileName(record.name);
  if (record.description) {
    base += '+' + sanitizeFileName(record.description);
  }
  return `${base}.${format}`;
}

// ========================================
// RASTERISER
// ========================================

export interface RasterSize {
  widthPx: number;
  heightPx: number;
  /** Physical size, for the PDF page */
  widthMm: number;
  heightMm: number;
}

export interface LabelRasterizer {
  convert(svg: string, format: RasterFormat, size: RasterSize): Promise<Buffer>;
}

/**
 * Renders an SVG document to a PNG of exactly widthPx x heightPx
 */
function renderSvgToPng(svgString: string, widthPx: number, heightPx: number): Buffer {
  const resvg = new Resvg(setRootSize(svgString, widthPx, heightPx), {
    fitTo: {
      mode: 'width',
      value: widthPx,
    },
    background: '#FFFFFF',
    font: {
      loadSystemFonts: true,
      defaultFontFamily: 'Arial, Helvetica, sans-serif',
    },
    shapeRendering: 1, // crispEdges
    textRendering: 1, // optimizeLegibility
  });

  return resvg.render().asPng();
}

/**
 * Creates a single-page PDF holding the PNG at the given physical size
 */
function createPdfFromPng(png: Buffer, widthPt: number, heightPt: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];

    const doc = new PDFDocument({
      size: [widthPt, heightPt],
      margin: 0,
      autoFirstPage: false,
    });

    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    doc.addPage({ size: [widthPt, heightPt], margin: 0 });
    doc.image(png, 0, 0, { width: widthPt, height: heightPt });
    doc.end();
  });
}

export class ResvgRasterizer implements LabelRasterizer {
  async convert(svg: string, format: RasterFormat, size: RasterSize): Promise<Buffer> {
    const png = renderSvgToPng(svg, size.widthPx, size.heightPx);
    if (format === 'png') {
      return png;
    }

    return createPdfFromPng(png, mmToPoints(size.widthMm), mmToPoints(size.heightMm));
  }
}

let defaultRasterizer: LabelRasterizer | null = null;

export function getDefaultRasterizer(): LabelRasterizer {
  if (!defaultRasterizer) {
    defaultRasterizer = new ResvgRasterizer();
  }
  return defaultRasterizer;
}

// ========================================
// EXPORT
// ========================================

export interface ExportOptions {
  dimensions: LabelDimensions;
  rasterizer?: LabelRasterizer;
}

/**
 * Write the document to destinationPath in the target format. Existing files are overwritten.
 */
export async function exportLabel(
  document: string,
  target: ExportTarget,
  destinationPath: string,
  options: ExportOptions
): Promise<string> {
  if (!isExportFormat(target.format)) {
    throw new AppError(ErrorCodes.UNSUPPORTED_FORMAT, `Unsupported export format: ${String(target.format)}`);
  }

  try {
    let data: string | Buffer;
    if (target.format === 'svg') {
      data = document;
    } else {
      const rasterizer = options.rasterizer ?? getDefaultRasterizer();
      data = await rasterizer.convert(document, target.format, {
        widthPx: mmToPx(options.dimensions.widthMm, target.density),
        heightPx: mmToPx(options.dimensions.heightMm, target.density),
        widthMm: options.dimensions.widthMm,
        heightMm: options.dimensions.heightMm,
      });
    }

    await fs.mkdir(path.dirname(destinationPath), { recursive: true });
    await fs.writeFile(destinationPath, data);
  } catch (error) {
    if (isAppError(error)) throw error;
    throw new AppError(
      ErrorCodes.EXPORT_BACKEND_FAILURE,
      `Failed to export ${target.format} to ${destinationPath}: ${error instanceof Error ? error.message : String(error)}`,
      { format: target.format, path: destinationPath }
    );
  }

  return destinationPath;
}
