// Side-view icons (secondary slot)

import { fmt } from '@/lib/utils/svg';
import { boltShaft, buttonSide, capSide, countersunkSide, iconSvg, nutHexSide, BLACK, WHITE } from './primitives';
import type { IconDefinition } from './registry';

// ========================================
// SCREWS
// ========================================

function buttonHeadSide(): string {
  return iconSvg(buttonSide(50, 20) + boltShaft(25, 80));
}

function capHeadSide(): string {
  return iconSvg(capSide(50, 30) + boltShaft(25, 80));
}

function flushHeadSide(pointed: boolean): string {
  return iconSvg(countersunkSide(50, 20) + boltShaft(20, 80, pointed));
}

// ========================================
// WASHERS
// ========================================

function washerSide(outerDiameter: number = 80, innerDiameter: number = 35): string {
  const thickness = outerDiameter / 6;
  const x = fmt((100 - thickness) / 2);
  return iconSvg(
    `<rect x="${x}" y="${fmt((100 - outerDiameter) / 2)}" width="${fmt(thickness)}" height="${fmt(outerDiameter)}" fill="${BLACK}"/>` +
      `<rect x="${x}" y="${fmt((100 - innerDiameter) / 2)}" width="${fmt(thickness)}" height="${fmt(innerDiameter)}" fill="${WHITE}"/>`
  );
}

function washerSplitSide(diameter: number = 80): string {
  const inner = diameter / 2;
  const t = diameter / 10;
  const x = (100 - t) / 2;
  return iconSvg(
    `<path d="M ${fmt(x)} ${fmt((100 - diameter) / 2 + 5)} Q ${fmt(x - 5)} 45 ${fmt(x)} 50 Q ${fmt(x + 5)} 55 ${fmt(x)} ${fmt((100 + diameter) / 2 - 5)}" stroke="${BLACK}" stroke-width="${fmt(t)}" fill="none"/>` +
      `<line x1="${fmt((100 + t) / 2 + 10)}" y1="${fmt((100 - inner) / 2)}" x2="${fmt(x - 10)}" y2="${fmt((100 + inner) / 2)}" stroke="${WHITE}" stroke-width="${fmt(t)}"/>`
  );
}

// ========================================
// NUTS
// ========================================

function nutLockSide(diameter: number = 80): string {
  const thickness = 30;
  return iconSvg(
    nutHexSide(thickness, diameter) +
      `<rect x="50" y="${fmt(50 - diameter * 0.5 + diameter * 0.1)}" width="${thickness}" height="${fmt(diameter * 0.8)}" fill="${BLACK}"/>`,
    '5 0 100 100'
  );
}

function nutFlangeSide(diameter: number = 80): string {
  const thickness = 30;
  const flange = diameter * 1.2;
  return iconSvg(
    nutHexSide(thickness, diameter) +
      `<rect x="${fmt((100 - thickness) / 2)}" y="${fmt((100 - flange) / 2)}" width="${fmt(thickness * 0.4)}" height="${fmt(flange)}" fill="${BLACK}"/>`
  );
}

function nutCapSide(diameter: number = 80): string {
  const thickness = 20;
  return iconSvg(
    `<ellipse cx="50" cy="50" rx="${fmt(diameter * 0.4)}" ry="${fmt(diameter * 0.4)}" fill="${BLACK}"/>` +
      `<rect x="0" y="0" height="100" width="50" fill="${WHITE}"/>` +
      `<rect x="${50 - thickness}" y="${fmt((100 - diameter) / 2)}" width="${thickness}" height="${fmt(diameter)}" fill="${BLACK}"/>` +
      `<rect x="50" y="0" width="${fmt(thickness * 0.2)}" height="100" fill="${WHITE}"/>`
  );
}

function nutWingSide(diameter: number = 80): string {
  const wingWidth = diameter * 0.6;
  const wingHeight = diameter * 0.2;
  const inner = diameter * 0.6;
  const y = (100 - inner) / 2 + wingHeight;
  const wing = (angle: number) =>
    `<rect x="50" y="${fmt(y)}" width="${fmt(wingWidth)}" height="${fmt(wingHeight)}" transform="rotate(${angle} 50 50)" fill="${BLACK}"/>`;
  return iconSvg(wing(-60) + wing(60) + nutHexSide(30, inner), '5 0 100 100');
}

// ========================================
// THREADED INSERTS
// ========================================

function insertHeatSide(diameter: number = 80, length: number = 60): string {
  const wideHeight = length / 3;
  const wideWidth = diameter * 0.5;
  const narrowHeight = length / 6;
  const narrowWidth = diameter * 0.4;
  const top = Math.max(100 - length * 1.3, 0);
  const left = 5;

  const rect = (width: number, y: number, height: number) =>
    `<rect x="${fmt(left + (100 - width) / 2)}" y="${fmt(y)}" width="${fmt(width)}" height="${fmt(height)}" fill="${BLACK}"/>`;

  let body =
    rect(wideWidth, top, wideHeight) +
    rect(narrowWidth, top + wideHeight, narrowHeight) +
    rect(wideWidth, top + wideHeight + narrowHeight, wideHeight) +
    rect(narrowWidth, top + 2 * wideHeight + narrowHeight, narrowHeight);

  // knurling: white hatch lines at 30 degrees, opposite directions on the two wide bands
  const spacing = 10;
  const run = wideHeight * Math.tan((30 * Math.PI) / 180);
  const start = Math.trunc((100 - wideWidth) / 2);
  const end = Math.trunc((100 + wideWidth) / 2) + spacing;
  const lowerTop = top + wideHeight + narrowHeight;
  for (let x = start; x < end; x += spacing) {
    body += `<line x1="${fmt(x + left)}" y1="${fmt(top)}" x2="${fmt(x + left - run)}" y2="${fmt(top + wideHeight)}" stroke="${WHITE}" stroke-width="2"/>`;
  }
  for (let x = start; x < end; x += spacing) {
    body += `<line x1="${fmt(x + left)}" y1="${fmt(lowerTop)}" x2="${fmt(x + left + run)}" y2="${fmt(lowerTop + wideHeight)}" stroke="${WHITE}" stroke-width="2"/>`;
  }

  return iconSvg(body);
}

function insertWoodSide(diameter: number = 60): string {
  const r = diameter / 2;
  let notches = '';
  for (let i = 0; i < 7; i++) {
    const y = 30 + i * 8;
    notches += `<line x1="${fmt(50 - r)}" y1="${y}" x2="${fmt(50 + r)}" y2="${fmt(y - r * 0.4)}" stroke="${WHITE}" stroke-width="2"/>`;
  }
  return iconSvg(
    `<rect x="${fmt(50 - r)}" y="${fmt((100 - diameter * 0.7) / 2)}" width="${fmt(diameter)}" height="${fmt(diameter * 0.7)}" fill="${BLACK}"/>` +
      `<path d="M ${fmt(50 - r)} 70 L ${fmt(50 + r)} 70 L ${fmt(50 + r * 0.7)} 90 L ${fmt(50 - r * 0.7)} 90 Z" fill="${BLACK}"/>` +
      notches +
      `<rect x="45" y="25" width="10" height="15" fill="${WHITE}"/>`
  );
}

function insertPressSide(diameter: number = 60): string {
  const r = diameter / 2;
  const height = diameter * 1.2;
  const section = height * 0.25;
  const groove = diameter * 0.2;
  const top = (100 - height) / 2;
  let grooves = '';
  for (let i = 0; i < 8; i++) {
    grooves += `<rect x="${fmt(50 - r + i * groove - groove / 3)}" y="${fmt(100 - height - section)}" width="2" height="${fmt(section)}" fill="${WHITE}"/>`;
  }
  for (let i = 0; i < 8; i++) {
    grooves += `<rect x="${fmt(50 - r + i * groove - groove / 2)}" y="${fmt(top + height - section)}" width="2" height="${fmt(section)}" fill="${WHITE}"/>`;
  }
  return iconSvg(
    `<rect x="${fmt(50 - r)}" y="${fmt(top)}" width="${fmt(diameter)}" height="${fmt(section)}" fill="${BLACK}"/>` +
      `<rect x="${fmt(50 - r)}" y="${fmt(top + height - section)}" width="${fmt(diameter)}" height="${fmt(section)}" fill="${BLACK}"/>` +
      `<rect x="${fmt(50 - r * 0.7)}" y="${fmt(top + section)}" width="${fmt(diameter * 0.7)}" height="${fmt(height - 2 * section)}" fill="${BLACK}"/>` +
      grooves
  );
}

// ========================================
// BEARINGS & SPRINGS
// ========================================

function bearingSide(flanged: boolean, outerDiameter: number = 80, innerDiameter: number = 30): string {
  const thickness = outerDiameter / 3;
  const x = fmt((100 - thickness) / 2);
  const flangeDiameter = outerDiameter * 1.2;
  const flange = flanged
    ? `<rect x="${x}" y="${fmt((100 - flangeDiameter) / 2)}" width="${fmt((flangeDiameter - outerDiameter) / 2)}" height="${fmt(flangeDiameter)}" fill="${BLACK}"/>`
    : '';
  return iconSvg(
    `<rect x="${x}" y="${fmt((100 - outerDiameter) / 2)}" width="${fmt(thickness)}" height="${fmt(outerDiameter)}" fill="${BLACK}"/>` +
      flange +
      `<rect x="${x}" y="${fmt((100 - innerDiameter) / 2)}" width="${fmt(thickness)}" height="${fmt(innerDiameter)}" fill="${WHITE}"/>`
  );
}

function springSide(diameter: number = 40, length: number = 60): string {
  const startY = (100 - length) / 2;
  const endY = startY + length;
  const startX = (100 - diameter) / 2;
  const endX = startX + diameter;
  const coils = 7;
  const pitch = (diameter * 2) / coils;

  let lines = '';
  for (let i = 0; i < coils; i++) {
    const y = startY + i * pitch;
    if (y + pitch > endY) {
      if (y < endY) {
        lines += `<line x1="${fmt(startX)}" y1="${fmt(y)}" x2="${fmt(endX)}" y2="${fmt(endY)}" stroke="${BLACK}" stroke-width="5"/>`;
      }
      break;
    }
    lines += `<line x1="${fmt(startX)}" y1="${fmt(y)}" x2="${fmt(endX)}" y2="${fmt(y + pitch)}" stroke="${BLACK}" stroke-width="5"/>`;
  }

  return iconSvg(
    `<line x1="${fmt(startX)}" y1="${fmt(startY)}" x2="${fmt(endX)}" y2="${fmt(startY)}" stroke="${BLACK}" stroke-width="8"/>` +
      `<line x1="${fmt(startX)}" y1="${fmt(endY)}" x2="${fmt(endX)}" y2="${fmt(endY)}" stroke="${BLACK}" stroke-width="8"/>` +
      lines
  );
}

export const SIDE_ICONS: readonly IconDefinition[] = [
  { names: ['button_head', 'button'], draw: buttonHeadSide },
  { names: ['cap_head', 'cap'], draw: capHeadSide },
  // hex heads read the same as cap heads at label size
  { names: ['hex_head', 'hex', 'bolt'], draw: capHeadSide },
  { names: ['flush_head', 'flat_head', 'flat', 'countersunk'], draw: () => flushHeadSide(false) },
  { names: ['wood_screw', 'wood'], draw: () => flushHeadSide(true) },
  { names: ['washer_std', 'washer'], draw: () => washerSide() },
  { names: ['washer_fender', 'fender'], draw: () => washerSide(80, 80 / 3) },
  { names: ['washer_split', 'split'], draw: () => washerSplitSide() },
  { names: ['washer_star_inner', 'star_inner'], draw: () => washerSide(80, 40) },
  { names: ['washer_star_outer', 'star_outer', 'star'], draw: () => washerSide(80, 40) },
  { names: ['nut_standard', 'nut'], draw: () => iconSvg(nutHexSide(30, 80)) },
  { names: ['nut_thin', 'thin_nut'], draw: () => iconSvg(nutHexSide(30, 80)) },
  { names: ['nut_lock', 'nyloc'], draw: () => nutLockSide() },
  { names: ['nut_flange', 'flange_nut'], draw: () => nutFlangeSide() },
  { names: ['nut_cap', 'cap_nut', 'acorn', 'acorn_nut'], draw: () => nutCapSide() },
  { names: ['nut_wing', 'wing_nut', 'wing'], draw: () => nutWingSide() },
  { names: ['insert_heat', 'heat_insert', 'heat_set_insert', 'hsi', 'heat_set'], draw: () => insertHeatSide() },
  { names: ['insert_wood', 'wood_insert'], draw: () => insertWoodSide() },
  { names: ['insert_press', 'press_insert'], draw: () => insertPressSide() },
  { names: ['bearing'], draw: () => bearingSide(false) },
  { names: ['bearing_flange', 'flange_bearing'], draw: () => bearingSide(true) },
  { names: ['spring', 'coil', 'coil_spring'], draw: () => springSide() },
];
