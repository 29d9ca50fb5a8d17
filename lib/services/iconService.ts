// ICON SERVICE - Resolve symbol tokens to icon fragments and combine the two slots
//
// Both slots are authored against the 100x100 design square. When both are
// present they are shrunk into fixed, non-overlapping halves of that square.

import { AppError, ErrorCodes } from '@/lib/utils/errors';
import { sanitizeSvg, fmt } from '@/lib/utils/svg';
import { ICON_DESIGN_SIZE } from '@/lib/constants/label';
import type { IconRegistry } from '@/lib/icons/registry';
import type { IconSlot, IconSplit, SvgFragment } from '@/lib/types/label';

// ========================================
// RESOLUTION
// ========================================

/**
 * Look up a token in one slot of the registry.
 * Returns null for an empty token; an unknown token fails the record.
 */
export function resolveIcon(registry: IconRegistry, slot: IconSlot, token: string | undefined): SvgFragment | null {
  if (!token) {
    return null;
  }

  const producer = registry.get(slot, token);
  if (!producer) {
    throw new AppError(ErrorCodes.UNKNOWN_ICON_TOKEN, `${slot} icon generator not found for '${token}'`, {
      slot,
      token,
    });
  }

  return sanitizeSvg(producer.produce());
}

// ========================================
// COMPOSITION
// ========================================

export interface SubRegion {
  x: number;
  y: number;
  scale: number;
}

/**
 * Where each slot goes when both are populated, in design-square units
 */
export const ICON_SPLIT_LAYOUTS: Record<IconSplit, { top: SubRegion; side: SubRegion }> = {
  horizontal: {
    top: { x: 0, y: ICON_DESIGN_SIZE / 4, scale: 0.5 },
    side: { x: ICON_DESIGN_SIZE / 2, y: ICON_DESIGN_SIZE / 4, scale: 0.5 },
  },
  vertical: {
    top: { x: ICON_DESIGN_SIZE / 4, y: 0, scale: 0.5 },
    side: { x: ICON_DESIGN_SIZE / 4, y: ICON_DESIGN_SIZE / 2, scale: 0.5 },
  },
};

function place(fragment: SvgFragment, region: SubRegion): string {
  return `<g transform="translate(${fmt(region.x)} ${fmt(region.y)}) scale(${fmt(region.scale)})">${fragment}</g>`;
}

/**
 * Combine the top and side icons into one fragment for the icon area
 */
export function composeIcons(
  top: SvgFragment | null,
  side: SvgFragment | null,
  split: IconSplit = 'horizontal'
): SvgFragment {
  if (!top && !side) return '';
  if (top && !side) return top;
  if (side && !top) return side;

  const layout = ICON_SPLIT_LAYOUTS[split];
  return place(top ?? '', layout.top) + place(side ?? '', layout.side);
}
