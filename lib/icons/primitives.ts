// ICON PRIMITIVES - Shape builders for the fastener icon set
// Every shape is drawn inside the 100x100 design square, black on white

import { fmt } from '@/lib/utils/svg';
import type { SvgFragment } from '@/lib/types/label';

const BLACK = '#000000';
const WHITE = '#FFFFFF';

/**
 * Wrap shape markup in a nested <svg> sized to the design square
 */
export function iconSvg(body: string, viewBox: string = '0 0 100 100'): SvgFragment {
  return `<svg width="100" height="100" viewBox="${viewBox}">${body}</svg>`;
}

function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * points="" attribute for a regular n-gon sized by its flat-to-flat distance
 */
export function polygonPoints(
  n: number,
  flatToFlat: number,
  cx: number = 50,
  cy: number = 50,
  rotationDeg: number = 0
): string {
  // circumradius from apothem: flatToFlat = 2 * R * cos(pi / n)
  const r = flatToFlat / (2 * Math.cos(Math.PI / n));
  const pts: string[] = [];
  for (let i = 0; i < n; i++) {
    const a = degToRad(rotationDeg + (i * 360) / n);
    pts.push(`${(cx + r * Math.cos(a)).toFixed(2)},${(cy + r * Math.sin(a)).toFixed(2)}`);
  }
  return `points="${pts.join(' ')}"`;
}

/**
 * d="" attribute for a star with the given number of lobes, first point up
 */
export function star(lobes: number, outerRadius: number, innerRadius: number): string {
  const pts: string[] = [];
  for (let i = 0; i < lobes * 2; i++) {
    const r = i % 2 === 0 ? outerRadius : innerRadius;
    const a = degToRad((i * 360) / (lobes * 2) - 90);
    pts.push(`${(50 + r * Math.cos(a)).toFixed(2)} ${(50 + r * Math.sin(a)).toFixed(2)}`);
  }
  return `d="M ${pts[0]} L ${pts.slice(1).join(' ')} Z"`;
}

export function annulus(outerRadius: number, innerRadius: number, color: string = BLACK): string {
  return (
    `<circle cx="50" cy="50" r="${fmt(outerRadius)}" fill="${color}"/>` +
    `<circle cx="50" cy="50" r="${fmt(innerRadius)}" fill="${WHITE}"/>`
  );
}

// ========================================
// SCREW HEADS (side view)
// ========================================

export function capSide(headWidth: number, headHeight: number): string {
  const r = fmt(headHeight / 4);
  return `<rect x="${fmt((100 - headWidth) / 2)}" y="${fmt(20 - headHeight)}" width="${fmt(headWidth)}" height="${fmt(headHeight)}" rx="${r}" ry="${r}" fill="${BLACK}"/>`;
}

export function buttonSide(headDiameter: number, headHeight: number): string {
  const top = 20 - headHeight;
  return (
    `<ellipse cx="50" cy="${fmt(top + headHeight / 2)}" rx="${fmt(headDiameter / 2)}" ry="${fmt(headHeight / 2)}" fill="${BLACK}"/>` +
    `<rect x="${fmt((100 - headDiameter) / 2)}" y="${fmt(top + headHeight / 2)}" width="${fmt(headDiameter)}" height="${fmt(headHeight / 2)}" fill="${BLACK}"/>`
  );
}

export function countersunkSide(headDiameter: number = 50, headHeight: number = 20): string {
  const top = 20 - headHeight;
  return `<path d="M ${fmt((100 - headDiameter) / 2)} ${fmt(top)} L ${fmt((100 + headDiameter) / 2)} ${fmt(top)} L 60 20 L 40 20 Z" fill="${BLACK}"/>`;
}

/**
 * Threaded shaft hanging from y = 100 - shaftLength, with a chamfer or a point at the bottom
 */
export function boltShaft(shaftWidth: number, shaftLength: number, pointed: boolean = false): string {
  const x = (100 - shaftWidth) / 2;
  const y = 100 - shaftLength;
  const chamfer = shaftWidth / 4;
  const bodyLength = shaftLength - (pointed ? shaftWidth : chamfer);
  const bottom = y + bodyLength;

  let out = `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(shaftWidth)}" height="${fmt(bodyLength)}" fill="${BLACK}"/>`;

  const threads = 6;
  for (let i = 0; i < threads; i++) {
    const ty = y + ((i + 1) * bodyLength) / (threads + 1);
    out += `<line x1="${fmt(x)}" y1="${fmt(ty)}" x2="${fmt((100 + shaftWidth) / 2)}" y2="${fmt(ty - shaftWidth / 4)}" stroke="${WHITE}" stroke-width="2"/>`;
  }

  if (pointed) {
    out += `<path d="M ${fmt(x)} ${fmt(bottom)} L 50 100 L ${fmt(x + shaftWidth)} ${fmt(bottom)} Z" fill="${BLACK}"/>`;
  } else {
    out += `<path d="M ${fmt(x)} ${fmt(bottom)} L ${fmt(x + shaftWidth)} ${fmt(bottom)} L ${fmt(x + shaftWidth - chamfer / 2)} ${fmt(bottom + chamfer)} L ${fmt(x + chamfer / 2)} ${fmt(bottom + chamfer)} Z" fill="${BLACK}"/>`;
  }

  return out;
}

// ========================================
// NUTS
// ========================================

export function nutHexTop(flatToFlat: number, color: string = BLACK): string {
  return (
    `<polygon ${polygonPoints(6, flatToFlat)} fill="${color}"/>` +
    `<circle cx="50" cy="50" r="${fmt(flatToFlat / 4)}" fill="${WHITE}"/>`
  );
}

export function nutHexSide(thickness: number, flatToFlat: number, color: string = BLACK): string {
  const x = (100 - thickness) / 2;
  const y = (100 - flatToFlat) / 2;
  const overhang = flatToFlat / 4;
  const line = (ly: number) =>
    `<line x1="${fmt(x - overhang)}" y1="${fmt(ly)}" x2="${fmt(x + thickness + overhang)}" y2="${fmt(ly)}" stroke="${WHITE}" stroke-width="2"/>`;
  return (
    `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(thickness)}" height="${fmt(flatToFlat)}" fill="${color}"/>` +
    line(y + flatToFlat * 0.25) +
    line(y + flatToFlat * 0.75)
  );
}

/**
 * White bar through the centre, used for drive slots
 */
export function slot(length: number = 75, width: number = 10, angle: number = 0): string {
  return `<rect x="${fmt((100 - length) / 2)}" y="${fmt((100 - width) / 2)}" width="${fmt(length)}" height="${fmt(width)}" transform="rotate(${fmt(angle)} 50 50)" fill="${WHITE}"/>`;
}

export { BLACK, WHITE };
