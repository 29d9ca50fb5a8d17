// Top-view icons (primary slot)

import { fmt } from '@/lib/utils/svg';
import { annulus, iconSvg, nutHexTop, polygonPoints, slot, star, BLACK, WHITE } from './primitives';
import type { IconDefinition } from './registry';

// ========================================
// WASHERS
// ========================================

function washerTop(outerDiameter: number = 80, innerDiameter: number = 35): string {
  return iconSvg(annulus(outerDiameter / 2, innerDiameter / 2));
}

function washerSplitTop(diameter: number = 80): string {
  const outerRadius = diameter / 2;
  const gapWidth = diameter / 10;
  return iconSvg(
    annulus(outerRadius, outerRadius / 2) +
      `<rect x="50" y="${fmt(50 - gapWidth / 2)}" width="50" height="${fmt(gapWidth)}" transform="rotate(-20 50 50)" fill="${WHITE}"/>`
  );
}

function washerStarInnerTop(diameter: number = 80): string {
  const outerRadius = diameter * 0.5;
  const innerRadius = outerRadius * 0.5;
  return iconSvg(
    annulus(outerRadius, innerRadius) +
      `<path ${star(12, outerRadius * 0.8, innerRadius * 0.8)} fill="${WHITE}"/>` +
      `<circle cx="50" cy="50" r="${fmt(innerRadius * 1.1)}" fill="${WHITE}"/>`
  );
}

function washerStarOuterTop(diameter: number = 80): string {
  const outerRadius = diameter * 0.4;
  const innerRadius = outerRadius * 0.7;
  return iconSvg(
    `<path ${star(12, outerRadius * 1.3, innerRadius)} fill="${BLACK}"/>` +
      `<circle cx="50" cy="50" r="${fmt(outerRadius)}" fill="${BLACK}"/>` +
      `<circle cx="50" cy="50" r="${fmt(innerRadius)}" fill="${WHITE}"/>`
  );
}

// ========================================
// NUTS
// ========================================

function nutLockTop(diameter: number = 80): string {
  return iconSvg(nutHexTop(diameter) + `<circle cx="50" cy="50" r="${fmt(diameter * 0.2)}" fill="${WHITE}"/>`);
}

function nutFlangeTop(diameter: number = 80): string {
  return iconSvg(
    `<circle cx="50" cy="50" r="${fmt(diameter * 0.6)}" fill="${BLACK}"/>` +
      nutHexTop(diameter * 0.9, WHITE) +
      nutHexTop(diameter * 0.8, BLACK)
  );
}

function nutCapTop(diameter: number = 80): string {
  return iconSvg(
    `<polygon ${polygonPoints(6, diameter)} fill="${BLACK}"/>` +
      `<circle cx="50" cy="50" r="${fmt(diameter * 0.4)}" fill="${WHITE}"/>` +
      `<circle cx="50" cy="50" r="${fmt(diameter * 0.35)}" fill="${BLACK}"/>`
  );
}

function nutWingTop(diameter: number = 80): string {
  const wing = diameter * 0.25;
  return iconSvg(
    annulus(diameter * 0.4, diameter * 0.2) +
      `<rect x="${fmt((100 - wing) / 2)}" y="0" width="${fmt(wing)}" height="${fmt(wing)}" transform="rotate(45 50 50)" fill="${BLACK}"/>` +
      `<rect x="${fmt((100 - wing) / 2)}" y="${fmt(100 - wing)}" width="${fmt(wing)}" height="${fmt(wing)}" transform="rotate(45 50 50)" fill="${BLACK}"/>`
  );
}

// ========================================
// THREADED INSERTS
// ========================================

function insertHeatTop(diameter: number = 80): string {
  return iconSvg(
    `<path ${star(20, diameter * 0.6, diameter * 0.5)} fill="${BLACK}"/>` +
      `<circle cx="50" cy="50" r="${fmt(diameter * 0.2)}" fill="${WHITE}"/>`
  );
}

function insertWoodTop(diameter: number = 80): string {
  let teeth = '';
  for (let i = 0; i < 12; i++) {
    teeth += `<rect x="50" y="${fmt(50 + diameter * 0.4)}" width="${fmt(diameter * 0.1)}" height="${fmt(diameter * 0.1)}" transform="rotate(${fmt((i * 360) / 12)} 50 50)" fill="${WHITE}"/>`;
  }
  return iconSvg(
    `<circle cx="50" cy="50" r="${fmt(diameter * 0.5)}" fill="${BLACK}"/>` +
      `<circle cx="50" cy="50" r="${fmt(diameter * 0.2)}" fill="${WHITE}"/>` +
      teeth
  );
}

// ========================================
// DRIVE HEADS
// ========================================

function headDisc(diameter: number): string {
  return `<circle cx="50" cy="50" r="${fmt(diameter * 0.5)}" fill="${BLACK}"/>`;
}

function headHexTop(diameter: number = 80): string {
  return iconSvg(`<polygon ${polygonPoints(6, (diameter * Math.sqrt(3)) / 2, 50, 50, 30)} fill="${BLACK}"/>`);
}

function headSocketTop(diameter: number = 80): string {
  return iconSvg(headDisc(diameter) + `<polygon ${polygonPoints(6, diameter / 2)} fill="${WHITE}"/>`);
}

function headTorxTop(diameter: number = 80): string {
  return iconSvg(headDisc(diameter) + `<path ${star(6, diameter * 0.3, diameter * 0.2)} fill="${WHITE}"/>`);
}

function headSquareTop(diameter: number = 80): string {
  const size = diameter * 0.4;
  return iconSvg(
    headDisc(diameter) +
      `<rect x="${fmt(50 - size / 2)}" y="${fmt(50 - size / 2)}" width="${fmt(size)}" height="${fmt(size)}" fill="${WHITE}"/>`
  );
}

function headSlottedTop(diameter: number = 80): string {
  return iconSvg(headDisc(diameter) + slot());
}

function headPhillipsTop(diameter: number = 80): string {
  return iconSvg(headDisc(diameter) + slot() + slot(75, 10, 90));
}

function headPozidrivTop(diameter: number = 80): string {
  return iconSvg(headDisc(diameter) + slot() + slot(75, 10, 90) + slot(50, 5, 45) + slot(50, 5, -45));
}

// ========================================
// BEARINGS & SPRINGS
// ========================================

function bearingTop(outerDiameter: number = 80, innerDiameter: number = 30): string {
  const outerRadius = outerDiameter * 0.5;
  const innerRadius = innerDiameter * 0.5;
  return iconSvg(
    `<circle cx="50" cy="50" r="${fmt(outerRadius)}" fill="${BLACK}"/>` +
      `<circle cx="50" cy="50" r="${fmt(outerRadius * 0.8)}" fill="${WHITE}"/>` +
      `<circle cx="50" cy="50" r="${fmt(innerRadius * 1.2)}" fill="${BLACK}"/>` +
      `<circle cx="50" cy="50" r="${fmt(innerRadius)}" fill="${WHITE}"/>`
  );
}

function springTop(diameter: number = 80): string {
  return iconSvg(annulus(diameter * 0.5, diameter * 0.35));
}

export const TOP_ICONS: readonly IconDefinition[] = [
  { names: ['washer_std', 'washer'], draw: () => washerTop() },
  { names: ['washer_fender', 'fender'], draw: () => washerTop(80, 80 / 3) },
  { names: ['washer_split', 'split'], draw: () => washerSplitTop() },
  { names: ['washer_star_inner', 'star_inner'], draw: () => washerStarInnerTop() },
  { names: ['washer_star_outer', 'star_outer', 'star'], draw: () => washerStarOuterTop() },
  { names: ['nut_standard', 'nut'], draw: () => iconSvg(nutHexTop(80)) },
  { names: ['nut_thin', 'thin_nut'], draw: () => iconSvg(nutHexTop(80)) },
  { names: ['nut_lock', 'nyloc'], draw: () => nutLockTop() },
  { names: ['nut_flange', 'flange_nut'], draw: () => nutFlangeTop() },
  { names: ['nut_cap', 'cap_nut', 'acorn', 'acorn_nut'], draw: () => nutCapTop() },
  { names: ['nut_wing', 'wing_nut', 'wing'], draw: () => nutWingTop() },
  {
    names: ['insert_heat', 'heat_insert', 'heat_set_insert', 'hsi', 'heat_set', 'insert_press'],
    draw: () => insertHeatTop(),
  },
  { names: ['insert_wood', 'wood_insert'], draw: () => insertWoodTop() },
  { names: ['head_hex', 'hex_head', 'hex'], draw: () => headHexTop() },
  { names: ['head_socket', 'socket_head', 'socket'], draw: () => headSocketTop() },
  { names: ['head_torx', 'torx_head', 'torx'], draw: () => headTorxTop() },
  { names: ['head_square', 'square_head', 'square', 'robertson', 'robertson_head'], draw: () => headSquareTop() },
  { names: ['head_slotted', 'slotted_head', 'slotted', 'flat_head', 'flat'], draw: () => headSlottedTop() },
  { names: ['head_phillips', 'phillips_head', 'phillips', 'screw'], draw: () => headPhillipsTop() },
  { names: ['head_pozidriv', 'pozidriv_head', 'pozidriv', 'pozi'], draw: () => headPozidrivTop() },
  { names: ['bearing'], draw: () => bearingTop() },
  { names: ['spring', 'coil', 'coil_spring'], draw: () => springTop() },
];
