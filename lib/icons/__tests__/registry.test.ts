import { describe, it, expect } from 'vitest';
import { IconRegistry, getDefaultIconRegistry } from '@/lib/icons/registry';
import { AppError } from '@/lib/utils/errors';
import { hasXmlDeclaration } from '@/lib/utils/svg';

describe('IconRegistry', () => {
  it('maps every alias of a definition to the same drawing', () => {
    const registry = IconRegistry.fromDefinitions({
      top: [{ names: ['washer_std', 'washer'], draw: () => '<svg><circle/></svg>' }],
      side: [],
    });

    expect(registry.get('top', 'washer')?.produce()).toBe('<svg><circle/></svg>');
    expect(registry.get('top', 'washer_std')?.produce()).toBe('<svg><circle/></svg>');
    expect(registry.tokens('top')).toEqual(['washer_std', 'washer']);
  });

  it('keeps the two slots apart', () => {
    const registry = IconRegistry.fromDefinitions({
      top: [{ names: ['hex'], draw: () => '<svg/>' }],
      side: [],
    });

    expect(registry.has('top', 'hex')).toBe(true);
    expect(registry.has('side', 'hex')).toBe(false);
  });

  it('matches tokens case-sensitively', () => {
    const registry = IconRegistry.fromDefinitions({
      top: [{ names: ['nut'], draw: () => '<svg/>' }],
      side: [],
    });

    expect(registry.get('top', 'Nut')).toBeUndefined();
  });

  it('rejects a token registered twice in one slot', () => {
    const build = () =>
      IconRegistry.fromDefinitions({
        top: [
          { names: ['nut'], draw: () => '<svg/>' },
          { names: ['nut_standard', 'nut'], draw: () => '<svg/>' },
        ],
        side: [],
      });

    expect(build).toThrow(AppError);
    expect(build).toThrow("Icon 'nut' already registered in top registry");
  });
});

describe('getDefaultIconRegistry', () => {
  const registry = getDefaultIconRegistry();

  it('returns the same instance on every call', () => {
    expect(getDefaultIconRegistry()).toBe(registry);
  });

  it('registers screw as the phillips head top view', () => {
    expect(registry.get('top', 'screw')?.produce()).toBe(registry.get('top', 'head_phillips')?.produce());
  });

  it.each([
    ['top', 'washer'],
    ['top', 'nyloc'],
    ['top', 'torx'],
    ['side', 'bolt'],
    ['side', 'insert_press'],
    ['side', 'bearing_flange'],
  ] as const)('draws %s icon %s in the 100x100 design square', (slot, token) => {
    const svg = registry.get(slot, token)?.produce() ?? '';

    expect(svg.startsWith('<svg width="100" height="100" viewBox="0 0 100 100">')).toBe(true);
    expect(svg.endsWith('</svg>')).toBe(true);
    expect(hasXmlDeclaration(svg)).toBe(false);
  });

  it('produces identical output on repeated calls', () => {
    const producer = registry.get('side', 'spring');
    expect(producer?.produce()).toBe(producer?.produce());
  });

  it('has no duplicate tokens', () => {
    expect(new Set(registry.tokens('top')).size).toBe(registry.tokens('top').length);
  });
});
