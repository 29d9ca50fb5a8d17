import { describe, it, expect, vi } from 'vitest';
import { createConsoleLogger, levelFromVerbosity } from '@/lib/utils/logger';

function fakeConsole() {
  return { debug: vi.fn(), info: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createConsoleLogger', () => {
  it('hides messages below the level', () => {
    const out = fakeConsole();
    const logger = createConsoleLogger({ level: 'warn', console: out });

    logger.debug('a');
    logger.info('b');
    logger.log('c');
    logger.warn('d');
    logger.error('e');

    expect(out.debug).not.toHaveBeenCalled();
    expect(out.info).not.toHaveBeenCalled();
    expect(out.log).not.toHaveBeenCalled();
    expect(out.warn).toHaveBeenCalledWith('[WARN] d');
    expect(out.error).toHaveBeenCalledWith('[ERROR] e');
  });

  it('prints progress output without a tag', () => {
    const out = fakeConsole();
    createConsoleLogger({ console: out }).log('Generated output/Screws.png');

    expect(out.log).toHaveBeenCalledWith('Generated output/Screws.png');
  });

  it('prefixes the scope of a child logger', () => {
    const out = fakeConsole();
    const logger = createConsoleLogger({ level: 'debug', console: out }).child('code');

    logger.debug('Generating compact QR', { payload: 'example.com/x' });

    expect(out.debug).toHaveBeenCalledWith('[DEBUG] [code] Generating compact QR', { payload: 'example.com/x' });
  });

  it('prints nothing when silent', () => {
    const out = fakeConsole();
    createConsoleLogger({ level: 'silent', console: out }).error('boom');

    expect(out.error).not.toHaveBeenCalled();
  });
});

describe('levelFromVerbosity', () => {
  it.each([
    [0, false, 'normal'],
    [1, false, 'info'],
    [2, false, 'debug'],
    [3, false, 'debug'],
    [2, true, 'error'],
  ] as const)('maps %i -v flags (quiet: %s) to %s', (verbose, quiet, level) => {
    expect(levelFromVerbosity(verbose, quiet)).toBe(level);
  });
});
