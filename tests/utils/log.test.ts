import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, levelFromEnv } from '../../src/utils/log';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('prefixes lines with the tag and filters by level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const l = createLogger('rom', 'warn');
    l.warn('odd size', 3);
    l.info('hidden');
    l.trace('hidden');
    expect(warn).toHaveBeenCalledWith('[rom]', 'odd size', 3);
    expect(log).not.toHaveBeenCalled();
    expect(l.enabled('error')).toBe(true);
    expect(l.enabled('debug')).toBe(false);
  });

  it('silent turns everything off', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    const l = createLogger('x', 'silent');
    l.error('nope');
    expect(err).not.toHaveBeenCalled();
    expect(l.enabled('error')).toBe(false);
  });

  it('reads CHIP8_LOG, defaulting to info', () => {
    expect(levelFromEnv({ CHIP8_LOG: 'TRACE' })).toBe('trace');
    expect(levelFromEnv({ CHIP8_LOG: 'loud' })).toBe('info');
    expect(levelFromEnv({})).toBe('info');
  });
});
