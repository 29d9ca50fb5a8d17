import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  generateLabels,
  summarizeOutcomes,
  withLabelColumns,
  type GenerateLabelsOptions,
} from '@/lib/services/labelService';
import { IconRegistry } from '@/lib/icons/registry';
import type { CodeEncoder } from '@/lib/services/codeEncoderService';
import type { LabelRasterizer } from '@/lib/services/exportService';
import { ErrorCodes, isAppError } from '@/lib/utils/errors';
import type { Logger } from '@/lib/utils/logger';
import type { LabelRecord } from '@/lib/types/label';

const TEMPLATE = '<svg><g>{{ icon_svg }}</g><text>{{ name }}</text>{{#qr_size}}<g>{{ qr_svg }}</g>{{/qr_size}}</svg>';

const registry = IconRegistry.fromDefinitions({
  top: [{ names: ['nut'], draw: () => '<svg id="nut-top"/>' }],
  side: [{ names: ['nut'], draw: () => '<svg id="nut-side"/>' }],
});

const encoder: CodeEncoder = {
  encodeMicro: vi.fn(async () => ({ svg: '<svg viewBox="0 0 13 13"><path/></svg>', modules: 13 })),
  encodeStandard: vi.fn(async () => ({ svg: '<svg viewBox="0 0 21 21"><path/></svg>', modules: 21 })),
};

function record(overrides: Partial<LabelRecord>): LabelRecord {
  return { name: 'Nuts', description: '', topSymbol: '', sideSymbol: '', reorderUrl: '', ...overrides };
}

function createRecordingLogger() {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    log: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

describe('generateLabels', () => {
  let dir: string;
  let options: GenerateLabelsOptions;
  let logger: Logger;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'label-batch-'));
    logger = createRecordingLogger();
    options = {
      template: TEMPLATE,
      outputDir: dir,
      target: { format: 'svg', density: 150 },
      codeMode: 'compact',
      dimensions: { widthMm: 36, heightMm: 7.7 },
      codeModuleMm: 0.5,
      registry,
      encoder,
      shortener: null,
      logger,
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('renders icons, text and code into one file per record', async () => {
    const outcomes = await generateLabels(
      [record({ name: 'Hex nuts', description: 'M4', topSymbol: 'nut', sideSymbol: 'nut', reorderUrl: '12345' })],
      options
    );

    const outputPath = path.join(dir, 'Hex_nuts+M4.svg');
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]).toMatchObject({ status: 'generated', outputPath });
    expect(await fs.readFile(outputPath, 'utf8')).toBe(
      '<svg><g>' +
        '<g transform="translate(0 25) scale(0.5)"><svg id="nut-top"/></g>' +
        '<g transform="translate(50 25) scale(0.5)"><svg id="nut-side"/></g>' +
        '</g><text>Hex nuts</text>' +
        '<g><svg width="6.5" height="6.5" viewBox="0 0 13 13" shape-rendering="crispEdges"><path/></svg></g></svg>'
    );
    expect(logger.log).toHaveBeenCalledWith(`Generated ${outputPath}`);
  });

  it('records a failure and carries on with the next record', async () => {
    const outcomes = await generateLabels(
      [record({ name: 'Mystery', topSymbol: 'bogus' }), record({ name: 'Nuts', topSymbol: 'nut' })],
      options
    );

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['failed', 'generated']);
    const failed = outcomes[0];
    expect(failed.status === 'failed' && isAppError(failed.error, ErrorCodes.UNKNOWN_ICON_TOKEN)).toBe(true);
    expect(await fs.readdir(dir)).toEqual(['Nuts.svg']);
    expect(logger.error).toHaveBeenCalledWith(
      "Failed to generate label for 'Mystery': [UNKNOWN_ICON_TOKEN] top icon generator not found for 'bogus'"
    );
  });

  it('warns when a later record overwrites an earlier file', async () => {
    const outcomes = await generateLabels([record({ topSymbol: 'nut' }), record({ sideSymbol: 'nut' })], options);

    expect(summarizeOutcomes(outcomes)).toEqual({ generated: 2, failed: 0 });
    expect(logger.warn).toHaveBeenCalledWith(
      `Overwrote ${path.join(dir, 'Nuts.svg')}: another record has the same name and description`
    );
    expect(await fs.readFile(path.join(dir, 'Nuts.svg'), 'utf8')).toBe(
      '<svg><g><svg id="nut-side"/></g><text>Nuts</text></svg>'
    );
  });

  it('reuses icons and codes supplied by the record instead of generating them', async () => {
    const encodeMicro = vi.fn(async () => ({ svg: '<svg viewBox="0 0 13 13"><path/></svg>', modules: 13 }));
    const encodeStandard = vi.fn(async () => ({ svg: '<svg viewBox="0 0 21 21"><path/></svg>', modules: 21 }));

    const outcomes = await generateLabels(
      [
        record({
          topSymbol: 'nut',
          reorderUrl: 'https://example.com/x',
          topIcon: '<?xml version="1.0"?>\n<svg id="supplied-top"/>',
          qrSvg: '<svg width="5mm" viewBox="0 0 13 13"><path/></svg>',
        }),
      ],
      { ...options, encoder: { encodeMicro, encodeStandard } }
    );

    expect(encodeMicro).not.toHaveBeenCalled();
    expect(encodeStandard).not.toHaveBeenCalled();
    expect(outcomes[0]).toMatchObject({ status: 'generated', code: { size: 5, payload: 'https://example.com/x' } });
    expect(await fs.readFile(path.join(dir, 'Nuts.svg'), 'utf8')).toBe(
      '<svg><g><svg id="supplied-top"/></g><text>Nuts</text>' +
        '<g><svg width="5" height="5" viewBox="0 0 13 13" shape-rendering="crispEdges"><path/></svg></g></svg>'
    );
  });

  it('sizes a supplied code without a width to the label height', async () => {
    const outcomes = await generateLabels([record({ qrSvg: '<svg viewBox="0 0 13 13"><path/></svg>' })], options);

    expect(outcomes[0]).toMatchObject({ status: 'generated', code: { size: 7.7 } });
  });

  it('fails a record whose supplied code is not SVG', async () => {
    const outcomes = await generateLabels([record({ qrSvg: 'not svg' })], options);

    const failed = outcomes[0];
    expect(failed.status === 'failed' && isAppError(failed.error, ErrorCodes.INVALID_INPUT)).toBe(true);
  });

  it('hands raster formats to the rasteriser at the target density', async () => {
    const convert = vi.fn(async () => Buffer.from('%PDF-'));
    const rasterizer: LabelRasterizer = { convert };

    await generateLabels([record({})], { ...options, target: { format: 'pdf', density: 300 }, rasterizer });

    expect(convert).toHaveBeenCalledWith('<svg><g></g><text>Nuts</text></svg>', 'pdf', {
      widthPx: 425,
      heightPx: 91,
      widthMm: 36,
      heightMm: 7.7,
    });
    expect(await fs.readFile(path.join(dir, 'Nuts.pdf'), 'utf8')).toBe('%PDF-');
  });
});

describe('summarizeOutcomes', () => {
  it('counts generated and failed records', () => {
    expect(
      summarizeOutcomes([
        { status: 'failed', record: record({}), error: new Error('x') },
        {
          status: 'generated',
          record: record({}),
          outputPath: 'Nuts.svg',
          code: { svg: '', size: 0, mode: 'compact', payload: '', shortened: false },
          artifacts: { topIcon: '', sideIcon: '', qrSvg: '', label: '' },
        },
      ])
    ).toEqual({ generated: 1, failed: 1 });
  });
});

describe('withLabelColumns', () => {
  const code = { svg: '<svg id="code"/>', size: 6.5, mode: 'compact' as const, payload: '12345', shortened: false };

  it('fills the label columns of generated rows and leaves failed rows alone', () => {
    const table = {
      columns: ['name', 'notes'],
      rows: [
        { name: 'Nuts', notes: 'bin 4' },
        { name: 'Mystery', notes: '' },
      ],
      warnings: [],
    };

    const updated = withLabelColumns(table, [
      {
        status: 'generated',
        record: record({}),
        outputPath: 'out/Nuts.svg',
        code,
        artifacts: { topIcon: '<svg id="t"/>', sideIcon: '', qrSvg: '<svg id="code"/>', label: '<svg>label</svg>' },
      },
      { status: 'failed', record: record({ name: 'Mystery' }), error: new Error('bad token') },
    ]);

    expect(updated.columns).toEqual(['name', 'notes', 'top_icon', 'side_icon', 'qr_svg', 'label']);
    expect(updated.rows).toEqual([
      {
        name: 'Nuts',
        notes: 'bin 4',
        top_icon: '<svg id="t"/>',
        side_icon: '',
        qr_svg: '<svg id="code"/>',
        label: '<svg>label</svg>',
      },
      { name: 'Mystery', notes: '' },
    ]);
  });

  it('keeps existing label columns in place', () => {
    const table = { columns: ['qr_svg', 'name'], rows: [{ qr_svg: 'old', name: 'Nuts' }], warnings: [] };

    const updated = withLabelColumns(table, [
      {
        status: 'generated',
        record: record({}),
        outputPath: 'out/Nuts.svg',
        code,
        artifacts: { topIcon: '', sideIcon: '', qrSvg: 'new', label: 'doc' },
      },
    ]);

    expect(updated.columns).toEqual(['qr_svg', 'name', 'top_icon', 'side_icon', 'label']);
    expect(updated.rows[0].qr_svg).toBe('new');
  });

  it('rejects outcomes that do not line up with the rows', () => {
    expect(() => withLabelColumns({ columns: ['name'], rows: [{ name: 'Nuts' }], warnings: [] }, [])).toThrow(
      'Expected one outcome per row: 1 rows, 0 outcomes'
    );
  });
});
