// ICON REGISTRY
// Immutable token -> producer tables for the two icon slots.
// Built once at startup and shared read-only by every record.

import { AppError, ErrorCodes } from '@/lib/utils/errors';
import type { IconProducer, IconSlot, SvgFragment } from '@/lib/types/label';
import { TOP_ICONS } from './topIcons';
import { SIDE_ICONS } from './sideIcons';

export interface IconDefinition {
  /** Tokens that select this icon; matched exactly, case-sensitive */
  names: readonly string[];
  draw: () => SvgFragment;
}

export class IconRegistry {
  private readonly slots: Readonly<Record<IconSlot, ReadonlyMap<string, IconProducer>>>;

  private constructor(top: Map<string, IconProducer>, side: Map<string, IconProducer>) {
    this.slots = Object.freeze({ top, side });
  }

  /**
   * Build a registry from icon definitions.
   * A token registered twice within one slot is a programming error.
   */
  static fromDefinitions(definitions: Record<IconSlot, readonly IconDefinition[]>): IconRegistry {
    return new IconRegistry(buildSlot('top', definitions.top), buildSlot('side', definitions.side));
  }

  get(slot: IconSlot, token: string): IconProducer | undefined {
    return this.slots[slot].get(token);
  }

  has(slot: IconSlot, token: string): boolean {
    return this.slots[slot].has(token);
  }

  tokens(slot: IconSlot): string[] {
    return [...this.slots[slot].keys()];
  }
}

function buildSlot(slot: IconSlot, definitions: readonly IconDefinition[]): Map<string, IconProducer> {
  const producers = new Map<string, IconProducer>();
  for (const def of definitions) {
    const producer: IconProducer = { produce: def.draw };
    for (const name of def.names) {
      if (producers.has(name)) {
        throw new AppError(ErrorCodes.INVALID_INPUT, `Icon '${name}' already registered in ${slot} registry`);
      }
      producers.set(name, producer);
    }
  }
  return producers;
}

let defaultRegistry: IconRegistry | null = null;

/**
 * Registry with the built-in fastener icons
 */
export function getDefaultIconRegistry(): IconRegistry {
  if (!defaultRegistry) {
    defaultRegistry = IconRegistry.fromDefinitions({ top: TOP_ICONS, side: SIDE_ICONS });
  }
  return defaultRegistry;
}
