import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ResvgRasterizer,
  exportLabel,
  isExportFormat,
  labelFileName,
  mmToPoints,
  mmToPx,
  sanitizeFileName,
  type LabelRasterizer,
} from '@/lib/services/exportService';
import { ErrorCodes, isAppError } from '@/lib/utils/errors';

const SAMPLE_SVG =
  '<svg xmlns="http://www.w3.org/2000/svg" width="36mm" height="9mm" viewBox="0 0 36 9">' +
  '<rect width="36" height="9" fill="#FFFFFF"/><rect x="1" y="1" width="7" height="7" fill="#000000"/></svg>';

describe('mmToPx', () => {
  it('converts millimetres at the given density', () => {
    expect(mmToPx(9, 150)).toBe(53);
    expect(mmToPx(36, 150)).toBe(213);
    expect(mmToPx(25.4, 150)).toBe(150);
    expect(mmToPx(7.7, 150)).toBe(45);
  });

  it('converts millimetres to PDF points', () => {
    expect(mmToPoints(25.4)).toBe(72);
    expect(mmToPoints(0)).toBe(0);
  });
});

describe('file names', () => {
  it('replaces spaces and path separators', () => {
    expect(sanitizeFileName('M3 x 10 / hex')).toBe('M3_x_10_-_hex');
    expect(sanitizeFileName('a\\b')).toBe('a-b');
  });

  it('is idempotent', () => {
    const once = sanitizeFileName('Wood screws / 4 x 40');
    expect(sanitizeFileName(once)).toBe(once);
  });

  it('joins name and description with a plus', () => {
    expect(labelFileName({ name: 'Hex Nuts', description: 'M4/M5' }, 'pdf')).toBe('Hex_Nuts+M4-M5.pdf');
  });

  it('uses the name alone when there is no description', () => {
    expect(labelFileName({ name: 'Screws', description: '' }, 'png')).toBe('Screws.png');
  });

  it('accepts only the three export formats', () => {
    expect(isExportFormat('svg')).toBe(true);
    expect(isExportFormat('jpg')).toBe(false);
  });
});

describe('exportLabel', () => {
  let dir: string;
  const dimensions = { widthMm: 36, heightMm: 7.7 };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'label-export-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes svg documents unchanged', async () => {
    const destination = path.join(dir, 'Screws.svg');

    const written = await exportLabel(SAMPLE_SVG, { format: 'svg', density: 150 }, destination, { dimensions });

    expect(written).toBe(destination);
    expect(await fs.readFile(destination, 'utf8')).toBe(SAMPLE_SVG);
  });

  it('creates the output directory', async () => {
    const destination = path.join(dir, 'nested', 'out', 'Screws.svg');

    await exportLabel(SAMPLE_SVG, { format: 'svg', density: 150 }, destination, { dimensions });

    expect(await fs.readFile(destination, 'utf8')).toBe(SAMPLE_SVG);
  });

  it('passes the pixel size to the rasteriser', async () => {
    const convert = vi.fn(async () => Buffer.from('raster'));
    const rasterizer: LabelRasterizer = { convert };
    const destination = path.join(dir, 'Screws.png');

    await exportLabel(SAMPLE_SVG, { format: 'png', density: 150 }, destination, { dimensions, rasterizer });

    expect(convert).toHaveBeenCalledWith(SAMPLE_SVG, 'png', { widthPx: 213, heightPx: 45, widthMm: 36, heightMm: 7.7 });
    expect(await fs.readFile(destination, 'utf8')).toBe('raster');
  });

  it('raises EXPORT_BACKEND_FAILURE when conversion fails', async () => {
    const rasterizer: LabelRasterizer = {
      convert: vi.fn(async () => {
        throw new Error('renderer crashed');
      }),
    };
    const destination = path.join(dir, 'Screws.pdf');

    const attempt = exportLabel(SAMPLE_SVG, { format: 'pdf', density: 150 }, destination, { dimensions, rasterizer });

    await expect(attempt).rejects.toSatisfy((error: unknown) => isAppError(error, ErrorCodes.EXPORT_BACKEND_FAILURE));
    await expect(fs.access(destination)).rejects.toThrow();
  });
});

describe('ResvgRasterizer', () => {
  const rasterizer = new ResvgRasterizer();
  const LANDSCAPE_SVG =
    '<svg xmlns="http://www.w3.org/2000/svg" width="36mm" height="7.7mm" viewBox="0 0 36 7.7">' +
    '<rect width="36" height="7.7" fill="#FFFFFF"/><rect x="1" y="1" width="5" height="5" fill="#000000"/></svg>';
  const PORTRAIT_SVG =
    '<svg xmlns="http://www.w3.org/2000/svg" width="9mm" height="36mm" viewBox="0 0 9 36">' +
    '<rect width="9" height="36" fill="#FFFFFF"/></svg>';

  it('renders a PNG', async () => {
    const png = await rasterizer.convert(SAMPLE_SVG, 'png', { widthPx: 213, heightPx: 53, widthMm: 36, heightMm: 9 });

    expect(png.subarray(0, 8)).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]));
    // IHDR width and height, big-endian
    expect(png.readUInt32BE(16)).toBe(213);
    expect(png.readUInt32BE(20)).toBe(53);
  });

  it('renders exactly the rounded pixel size of a 36 x 7.7 mm label at 150 dpi', async () => {
    const png = await rasterizer.convert(LANDSCAPE_SVG, 'png', {
      widthPx: mmToPx(36, 150),
      heightPx: mmToPx(7.7, 150),
      widthMm: 36,
      heightMm: 7.7,
    });

    expect(png.readUInt32BE(16)).toBe(213);
    expect(png.readUInt32BE(20)).toBe(45);
  });

  it('renders exactly the rounded pixel size of a portrait 9 x 36 mm label', async () => {
    const png = await rasterizer.convert(PORTRAIT_SVG, 'png', {
      widthPx: mmToPx(9, 150),
      heightPx: mmToPx(36, 150),
      widthMm: 9,
      heightMm: 36,
    });

    expect(png.readUInt32BE(16)).toBe(53);
    expect(png.readUInt32BE(20)).toBe(213);
  });

  it('renders a PDF page of the physical label size', async () => {
    const pdf = await rasterizer.convert(LANDSCAPE_SVG, 'pdf', { widthPx: 213, heightPx: 45, widthMm: 36, heightMm: 7.7 });
    const text = pdf.toString('latin1');

    expect(text.startsWith('%PDF-')).toBe(true);
    // 36mm and 7.7mm in points
    expect(text).toContain('/MediaBox [0 0 102.047244 21.826772]');
  });
});
