// Label pipeline types

import type { AppError } from '@/lib/utils/errors';

/**
 * A self-contained SVG snippet with no XML declaration, safe to embed in a larger document
 */
export type SvgFragment = string;

export type IconSlot = 'top' | 'side';

export type IconSplit = 'horizontal' | 'vertical';

export interface IconProducer {
  produce(): SvgFragment;
}

/** One row of the parts spreadsheet. Empty strings mean "not set". */
export interface LabelRecord {
  name: string;
  description: string;
  topSymbol: string;
  sideSymbol: string;
  reorderUrl: string;
  /** Ready-made SVG from the parts file, used instead of the generated icon or code */
  topIcon?: SvgFragment;
  sideIcon?: SvgFragment;
  qrSvg?: SvgFragment;
}

export type CodeMode = 'compact' | 'standard';

export interface CodeResult {
  svg: SvgFragment;
  /** Side of the code's bounding square, in millimetres. 0 when there is no code. */
  size: number;
  /** Encoding actually used, after any fallback */
  mode: CodeMode;
  /** Exact string that was encoded */
  payload: string;
  shortened: boolean;
}

export interface LabelDimensions {
  widthMm: number;
  heightMm: number;
}

export type ExportFormat = 'png' | 'pdf' | 'svg';

export type RasterFormat = Exclude<ExportFormat, 'svg'>;

export interface ExportTarget {
  format: ExportFormat;
  /** Pixels per inch; ignored for svg */
  density: number;
}

/** What a generated label was built from, as written back to the parts file */
export interface LabelArtifacts {
  topIcon: SvgFragment;
  sideIcon: SvgFragment;
  qrSvg: SvgFragment;
  /** The rendered label document */
  label: string;
}

export type LabelOutcome =
  | {
      status: 'generated';
      record: LabelRecord;
      outputPath: string;
      code: CodeResult;
      artifacts: LabelArtifacts;
    }
  | {
      status: 'failed';
      record: LabelRecord;
      error: AppError | Error;
    };
