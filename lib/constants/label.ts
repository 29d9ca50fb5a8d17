// LABEL CONSTANTS
// Physical units, icon design space and Micro QR capacity limits

export const MM_PER_INCH = 25.4;
export const POINTS_PER_INCH = 72;

// Icons are authored against a 100x100 square
export const ICON_DESIGN_SIZE = 100;

export const URL_SCHEME_PREFIXES = ['http://', 'https://'] as const;

// ========================================
// MICRO QR CAPACITY (ISO/IEC 18004, error correction level L)
// ========================================

export type MicroQrVersion = 'M2' | 'M3' | 'M4';

export interface MicroQrCapacity {
  version: MicroQrVersion;
  /** Symbol side length in modules */
  modules: number;
  numeric: number;
  alphanumeric: number;
  byte: number;
}

// Level L capacities. M1 only carries digits with error detection; labels start at M2.
// M2 has no byte mode, so any lower-case or non-ASCII payload starts at M3.
export const MICRO_QR_CAPACITIES: readonly MicroQrCapacity[] = [
  { version: 'M2', modules: 13, numeric: 10, alphanumeric: 6, byte: 0 },
  { version: 'M3', modules: 15, numeric: 23, alphanumeric: 14, byte: 9 },
  { version: 'M4', modules: 17, numeric: 35, alphanumeric: 21, byte: 15 },
];

export const MICRO_QR_ERROR_CORRECTION = 'L';
export const STANDARD_QR_ERROR_CORRECTION = 'L';

// QR alphanumeric charset: digits, upper-case letters, space and $%*+-./:
export const QR_ALPHANUMERIC_PATTERN = /^[0-9A-Z $%*+\-./:]*$/;
export const QR_NUMERIC_PATTERN = /^[0-9]*$/;
