// CODE SERVICE - Reorder-link QR code for a label
//
// RULES:
// - Compact mode encodes a Micro QR of the payload with its http(s):// scheme removed
// - A URL too long for Micro QR is sent through the link shortener once
// - Anything that still doesn't fit falls back to a standard QR of the full, unshortened payload
// - Shortening failures degrade with a warning; encoder failures fail the record
// - The fragment never carries an XML declaration, so it can be nested in the label
// - A code already present in the parts file is reused as-is, never re-encoded

import { AppError, ErrorCodes, toErrorMessage } from '@/lib/utils/errors';
import { silentLogger, type Logger } from '@/lib/utils/logger';
import { extractViewBox, fmt, readRootAttributes, sanitizeSvg, stripOuterSvg } from '@/lib/utils/svg';
import type { CodeMode, CodeResult, SvgFragment } from '@/lib/types/label';
import { defaultCodeEncoder, selectMicroQrVersion, type CodeEncoder, type EncodedSymbol } from './codeEncoderService';
import { isUrlShaped, stripUrlScheme, type LinkShortener } from './linkShortenerService';

export interface CodeGeneratorDeps {
  encoder?: CodeEncoder;
  /** Null or absent disables shortening */
  shortener?: LinkShortener | null;
  logger?: Logger;
}

export interface CodeSizeOptions {
  /** Physical size of one module in millimetres */
  moduleSizeMm: number;
  /** The code is scaled down to fit this square */
  maxSizeMm: number;
}

export const DEFAULT_CODE_SIZE: CodeSizeOptions = {
  moduleSizeMm: 0.45,
  maxSizeMm: 7.7,
};

/**
 * Generate the code fragment and its size for one payload
 */
export async function generateCode(
  payload: string,
  mode: CodeMode,
  deps: CodeGeneratorDeps = {},
  sizing: CodeSizeOptions = DEFAULT_CODE_SIZE
): Promise<CodeResult> {
  const encoder = deps.encoder ?? defaultCodeEncoder;
  const logger = deps.logger ?? silentLogger;

  // Neither encoder accepts empty input: an empty payload yields the degenerate, zero-size code
  if (!payload) {
    logger.debug('Empty payload, label gets no code');
    return { svg: '', size: 0, mode, payload: '', shortened: false };
  }

  logger.debug(`Generating ${mode} QR for content: ${payload}`);

  if (mode === 'standard') {
    return encodeStandard(encoder, payload, sizing);
  }

  const compactPayload = stripUrlScheme(payload);
  if (selectMicroQrVersion(compactPayload)) {
    return encodeMicro(encoder, compactPayload, false, sizing);
  }

  if (isUrlShaped(payload) && deps.shortener) {
    const shortened = await tryShorten(deps.shortener, payload, logger);
    if (shortened !== null) {
      const shortPayload = stripUrlScheme(shortened);
      if (selectMicroQrVersion(shortPayload)) {
        logger.debug(`Shortened ${payload} -> ${shortened}`);
        return encodeMicro(encoder, shortPayload, true, sizing);
      }
      logger.info(`Shortened URL still too long for micro QR: ${shortened}`);
    }
  }

  logger.info(`URL too long for micro QR, using standard QR: ${payload}`);
  return encodeStandard(encoder, payload, sizing);
}

async function tryShorten(shortener: LinkShortener, url: string, logger: Logger): Promise<string | null> {
  try {
    return await shortener.shorten(url);
  } catch (error) {
    logger.warn(toErrorMessage(error));
    return null;
  }
}

async function encodeMicro(
  encoder: CodeEncoder,
  payload: string,
  shortened: boolean,
  sizing: CodeSizeOptions
): Promise<CodeResult> {
  const capacity = selectMicroQrVersion(payload);
  if (!capacity) {
    throw new AppError(ErrorCodes.CODE_ENCODING_FAILURE, `Payload does not fit a Micro QR code: ${payload}`);
  }

  const symbol = await runEncoder('compact', payload, () => encoder.encodeMicro(payload, capacity.version));
  return toCodeResult(symbol, 'compact', payload, shortened, sizing);
}

async function encodeStandard(encoder: CodeEncoder, payload: string, sizing: CodeSizeOptions): Promise<CodeResult> {
  const symbol = await runEncoder('standard', payload, () => encoder.encodeStandard(payload));
  return toCodeResult(symbol, 'standard', payload, false, sizing);
}

async function runEncoder(
  mode: CodeMode,
  payload: string,
  encode: () => Promise<EncodedSymbol>
): Promise<EncodedSymbol> {
  try {
    return await encode();
  } catch (error) {
    throw new AppError(
      ErrorCodes.CODE_ENCODING_FAILURE,
      `Failed to generate ${mode} QR code: ${error instanceof Error ? error.message : String(error)}`,
      { payload, mode }
    );
  }
}

function toCodeResult(
  symbol: EncodedSymbol,
  mode: CodeMode,
  payload: string,
  shortened: boolean,
  sizing: CodeSizeOptions
): CodeResult {
  if (!(symbol.modules > 0)) {
    throw new AppError(ErrorCodes.CODE_ENCODING_FAILURE, `Encoder returned an empty ${mode} symbol`, { payload });
  }

  const size = Math.round(Math.min(symbol.modules * sizing.moduleSizeMm, sizing.maxSizeMm) * 1000) / 1000;
  return {
    svg: toCodeFragment(symbol.svg, size),
    size,
    mode,
    payload,
    shortened,
  };
}

/**
 * Reuse a ready-made code. Its size comes from the root width (in mm, unit optional),
 * or is the fallback size when the root has none.
 */
export function reuseCode(svg: string, payload: string, mode: CodeMode, fallbackSizeMm: number): CodeResult {
  let size: number;
  let fragment: SvgFragment;
  try {
    const width = parseFloat(readRootAttributes(sanitizeSvg(svg)).width ?? '');
    size = width > 0 ? width : fallbackSizeMm;
    fragment = toCodeFragment(svg, size);
  } catch (error) {
    throw new AppError(ErrorCodes.INVALID_INPUT, `Invalid qr_svg: ${error instanceof Error ? error.message : String(error)}`, { payload });
  }
  return { svg: fragment, size, mode, payload, shortened: false };
}

/**
 * Re-root encoder output as a nested <svg> sized to the code square
 */
export function toCodeFragment(svg: string, size: number): SvgFragment {
  let cleaned: string;
  let attrs: Record<string, string>;
  try {
    cleaned = sanitizeSvg(svg);
    attrs = readRootAttributes(cleaned);
  } catch (error) {
    throw new AppError(ErrorCodes.CODE_ENCODING_FAILURE, `Encoder produced invalid SVG: ${toErrorMessage(error)}`);
  }

  let viewBox = extractViewBox(cleaned);
  if (!viewBox) {
    const width = parseFloat(attrs.width ?? '');
    const height = parseFloat(attrs.height ?? '');
    if (!(width > 0) || !(height > 0)) {
      throw new AppError(ErrorCodes.CODE_ENCODING_FAILURE, 'Encoder SVG has neither a viewBox nor a size');
    }
    viewBox = `0 0 ${fmt(width)} ${fmt(height)}`;
  }

  return `<svg width="${fmt(size)}" height="${fmt(size)}" viewBox="${viewBox}" shape-rendering="crispEdges">${stripOuterSvg(cleaned)}</svg>`;
}
