import { describe, it, expect } from 'vitest';
import {
  escapeXml,
  extractViewBox,
  fmt,
  readRootAttributes,
  sanitizeSvg,
  setRootSize,
  stripOuterSvg,
} from '@/lib/utils/svg';
import { AppError } from '@/lib/utils/errors';

describe('sanitizeSvg', () => {
  it('removes the XML declaration, doctype and comments', () => {
    const svg =
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
      '<!DOCTYPE svg PUBLIC "-//W3C//DTD SVG 1.1//EN" "http://www.w3.org/Graphics/SVG/1.1/DTD/svg11.dtd">\n' +
      '<svg viewBox="0 0 10 10">\n  <!-- outline -->\n  <rect width="10" height="10"/>\n</svg>\n';

    expect(sanitizeSvg(svg)).toBe('<svg viewBox="0 0 10 10"><rect width="10" height="10"/></svg>');
  });

  it('keeps whitespace inside text', () => {
    expect(sanitizeSvg('<text> M3 nuts </text>')).toBe('<text> M3 nuts </text>');
  });

  it('is idempotent', () => {
    const once = sanitizeSvg('<svg>\n <g>\n  <circle/>\n </g>\n</svg>');
    expect(sanitizeSvg(once)).toBe(once);
  });

  it('leaves an empty fragment empty', () => {
    expect(sanitizeSvg('')).toBe('');
  });

  it('rejects text that is not markup', () => {
    expect(() => sanitizeSvg('hello')).toThrow(AppError);
  });
});

describe('SVG helpers', () => {
  it('reads the viewBox', () => {
    expect(extractViewBox('<svg viewBox="0 0 17 17"><path/></svg>')).toBe('0 0 17 17');
    expect(extractViewBox('<svg width="10"/>')).toBeNull();
  });

  it('reads root attributes', () => {
    expect(readRootAttributes('<svg width="29" height="29" xmlns:xlink="http://www.w3.org/1999/xlink"><g/></svg>')).toEqual({
      width: '29',
      height: '29',
      'xmlns:xlink': 'http://www.w3.org/1999/xlink',
    });
  });

  it('strips the outer svg element', () => {
    expect(stripOuterSvg('<svg viewBox="0 0 1 1"><rect/><circle/></svg>')).toBe('<rect/><circle/>');
  });

  it('escapes XML special characters', () => {
    expect(escapeXml(`Tom's "M3" <nuts> & bolts`)).toBe('Tom&apos;s &quot;M3&quot; &lt;nuts&gt; &amp; bolts');
  });

  it('formats coordinates', () => {
    expect(fmt(0.5)).toBe('0.5');
    expect(fmt(2)).toBe('2');
    expect(fmt(1.23456)).toBe('1.235');
  });
});

describe('setRootSize', () => {
  it('replaces the physical size with pixels and keeps the viewBox', () => {
    const svg =
      '<?xml version="1.0"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="36mm" height="7.7mm" viewBox="0 0 36 7.7">' +
      '<rect width="36" height="7.7" stroke-width="0.1"/></svg>';

    expect(setRootSize(svg, 213, 45)).toBe(
      '<?xml version="1.0"?>\n<svg width="213" height="45" preserveAspectRatio="none" xmlns="http://www.w3.org/2000/svg" viewBox="0 0 36 7.7">' +
        '<rect width="36" height="7.7" stroke-width="0.1"/></svg>'
    );
  });

  it('derives a viewBox from a root without one', () => {
    expect(setRootSize('<svg width="36mm" height="9mm"><g/></svg>', 213, 53)).toBe(
      '<svg width="213" height="53" viewBox="0 0 36 9" preserveAspectRatio="none"><g/></svg>'
    );
  });

  it('rejects a root it cannot scale', () => {
    expect(() => setRootSize('<svg><g/></svg>', 10, 10)).toThrow(
      'Invalid SVG: root needs a viewBox or a numeric width and height'
    );
  });
});
