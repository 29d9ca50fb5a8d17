// SVG string utilities shared by the icon, code and template services

import { AppError, ErrorCodes } from '@/lib/utils/errors';

/**
 * Remove XML declarations, doctypes and comments, and collapse whitespace between tags.
 * Empty input stays empty (a slot with no icon).
 */
export function sanitizeSvg(svg: string): string {
  if (!svg) return '';

  const cleaned = svg
    .replace(/<\?xml[\s\S]*?\?>/gi, '')
    .replace(/<!doctype[\s\S]*?>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/>\s+</g, '><')
    .trim();

  if (cleaned && !(cleaned.startsWith('<') && cleaned.endsWith('>'))) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'Invalid SVG content');
  }

  return cleaned;
}

export function hasXmlDeclaration(svg: string): boolean {
  return /<\?xml/i.test(svg) || /<!doctype/i.test(svg);
}

export function extractViewBox(svg: string): string | null {
  const m = svg.match(/\bviewBox="([^"]+)"/i);
  return m ? m[1] : null;
}

export function stripOuterSvg(svg: string): string {
  return svg
    .replace(/<\?xml[^?]*\?>/i, '')
    .replace(/<!doctype[^>]*>/i, '')
    .replace(/<svg[^>]*>/i, '')
    .replace(/<\/svg>\s*$/i, '')
    .trim();
}

/**
 * Read the attributes of the root <svg> element
 */
export function readRootAttributes(svg: string): Record<string, string> {
  const rootMatch = svg.match(/<svg\b([^>]*)>/i);
  if (!rootMatch) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'Invalid SVG: No root <svg> tag found');
  }

  const attrs: Record<string, string> = {};
  for (const m of rootMatch[1].matchAll(/([\w:-]+)="([^"]*)"/g)) {
    attrs[m[1]] = m[2];
  }
  return attrs;
}

/**
 * Give the root element an exact pixel size, stretching its viewBox to fill it.
 * A root without a viewBox gets one from its numeric width and height.
 */
export function setRootSize(svg: string, widthPx: number, heightPx: number): string {
  const root = svg.match(/<svg\b[^>]*>/i);
  if (!root) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'Invalid SVG: No root <svg> tag found');
  }

  let viewBox = '';
  if (!/\sviewBox\s*=/.test(root[0])) {
    const attrs = readRootAttributes(svg);
    const width = parseFloat(attrs.width ?? '');
    const height = parseFloat(attrs.height ?? '');
    if (!(width > 0) || !(height > 0)) {
      throw new AppError(ErrorCodes.INVALID_INPUT, 'Invalid SVG: root needs a viewBox or a numeric width and height');
    }
    viewBox = ` viewBox="0 0 ${fmt(width)} ${fmt(height)}"`;
  }

  const tag = root[0]
    .replace(/\s(?:width|height|preserveAspectRatio)\s*=\s*(?:"[^"]*"|'[^']*')/g, '')
    .replace(/^<svg/i, `<svg width="${widthPx}" height="${heightPx}"${viewBox} preserveAspectRatio="none"`);
  return svg.replace(root[0], () => tag);
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

/**
 * Format a coordinate for SVG output: at most 3 decimals, no trailing zeros
 */
export function fmt(value: number): string {
  return String(Math.round(value * 1000) / 1000);
}
