/**
 * Code Encoder Service
 *
 * Turns a payload into a QR symbol as SVG markup:
 * - Micro QR (compact) via bwip-js, which carries the full BWIPP symbology set
 * - QR Model 2 (standard) via qrcode
 *
 * Micro QR version selection happens here, from the ISO capacity table, so the
 * caller can decide on a fallback before asking the encoder for anything.
 */

import bwipjs from 'bwip-js';
import QRCode from 'qrcode';
import {
  MICRO_QR_CAPACITIES,
  MICRO_QR_ERROR_CORRECTION,
  QR_ALPHANUMERIC_PATTERN,
  QR_NUMERIC_PATTERN,
  STANDARD_QR_ERROR_CORRECTION,
  type MicroQrCapacity,
  type MicroQrVersion,
} from '@/lib/constants/label';
import { extractViewBox } from '@/lib/utils/svg';

export interface EncodedSymbol {
  /** Raw encoder output; may carry an XML declaration */
  svg: string;
  /** Symbol side length in modules, quiet zone excluded */
  modules: number;
}

export interface CodeEncoder {
  encodeMicro(payload: string, version: MicroQrVersion): Promise<EncodedSymbol>;
  encodeStandard(payload: string): Promise<EncodedSymbol>;
}

// ========================================
// MICRO QR CAPACITY
// ========================================

export type QrDataMode = 'numeric' | 'alphanumeric' | 'byte';

/**
 * Most compact single encoding mode able to carry the whole payload
 */
export function qrDataMode(payload: string): QrDataMode {
  if (QR_NUMERIC_PATTERN.test(payload)) return 'numeric';
  if (QR_ALPHANUMERIC_PATTERN.test(payload)) return 'alphanumeric';
  return 'byte';
}

/**
 * Payload length in the units its mode is counted in (characters, or UTF-8 bytes)
 */
export function qrDataLength(payload: string, mode: QrDataMode = qrDataMode(payload)): number {
  return mode === 'byte' ? Buffer.byteLength(payload, 'utf8') : payload.length;
}

/**
 * Smallest Micro QR version that holds the payload, or null if it exceeds M4
 */
export function selectMicroQrVersion(payload: string): MicroQrCapacity | null {
  const mode = qrDataMode(payload);
  const length = qrDataLength(payload, mode);
  return MICRO_QR_CAPACITIES.find((capacity) => length <= capacity[mode]) ?? null;
}

export function microQrModules(version: MicroQrVersion): number {
  const capacity = MICRO_QR_CAPACITIES.find((c) => c.version === version);
  if (!capacity) {
    throw new Error(`Unknown Micro QR version: ${version}`);
  }
  return capacity.modules;
}

// ========================================
// DEFAULT ENCODER
// ========================================

export const defaultCodeEncoder: CodeEncoder = {
  async encodeMicro(payload: string, version: MicroQrVersion): Promise<EncodedSymbol> {
    // BWIPP reads one byte per character: hand it the UTF-8 bytes that were counted for capacity
    const options = {
      bcid: 'microqrcode',
      text: Buffer.from(payload, 'utf8').toString('latin1'),
      version,
      eclevel: MICRO_QR_ERROR_CORRECTION,
      scale: 1,
    };
    const svg = bwipjs.toSVG(options);
    return { svg, modules: microQrModules(version) };
  },

  async encodeStandard(payload: string): Promise<EncodedSymbol> {
    const svg = await QRCode.toString(payload, {
      type: 'svg',
      errorCorrectionLevel: STANDARD_QR_ERROR_CORRECTION,
      margin: 0,
      color: {
        dark: '#000000',
        light: '#FFFFFF'
      }
    });
    return { svg, modules: standardQrModules(svg) };
  },
};

/**
 * Symbol size read back from the qrcode SVG: with no margin the viewBox is "0 0 N N"
 */
export function standardQrModules(svg: string): number {
  const viewBox = extractViewBox(svg);
  const size = viewBox ? Number(viewBox.trim().split(/[\s,]+/)[2]) : NaN;
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`QR encoder returned no usable viewBox: ${viewBox ?? 'missing'}`);
  }
  return size;
}
