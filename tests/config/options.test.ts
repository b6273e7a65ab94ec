import { describe, it, expect } from 'vitest';
import { parseArgs, parsePresses, resolveRunOptions } from '../../src/config/options';

describe('run options', () => {
  it('parses --key=value and bare flags, ignoring positionals', () => {
    expect(parseArgs(['--rom=games/pong.ch8', '--trace', 'extra', '--press=1@5,2@9'])).toEqual({
      rom: 'games/pong.ch8',
      trace: true,
      press: '1@5,2@9',
    });
  });

  it('parses presses as hex digits or key names, sorted by time', () => {
    expect(parsePresses('5@100,KeyQ@50')).toEqual([
      { code: 4, atMs: 50 },
      { code: 5, atMs: 100 },
    ]);
    expect(parsePresses(undefined)).toEqual([]);
    expect(() => parsePresses('KeyP@10')).toThrow('Unknown key in --press: "KeyP"');
    expect(() => parsePresses('1@soon')).toThrow('Bad press time in --press: "1@soon"');
  });

  it('fills defaults', () => {
    expect(resolveRunOptions({}, {})).toEqual({
      romPath: undefined,
      outPath: 'screen.png',
      ms: 2000,
      scale: 10,
      presses: [],
      traceEveryInstr: 0,
      onCpuError: 'throw',
      logLevel: undefined,
    });
  });

  it('prefers args over environment', () => {
    const env = { CHIP8_ROM: 'env.ch8', CHIP8_MS: '750', CHIP8_SCALE: '4', CHIP8_TRACE: '100' };
    const fromEnv = resolveRunOptions({}, env);
    expect(fromEnv.romPath).toBe('env.ch8');
    expect(fromEnv.ms).toBe(750);
    expect(fromEnv.scale).toBe(4);
    expect(fromEnv.traceEveryInstr).toBe(100);

    const fromArgs = resolveRunOptions({ rom: 'arg.ch8', ms: '10', scale: 'big', onCpuError: 'record', log: 'debug' }, env);
    expect(fromArgs.romPath).toBe('arg.ch8');
    expect(fromArgs.ms).toBe(10);
    expect(fromArgs.scale).toBe(10);
    expect(fromArgs.onCpuError).toBe('record');
    expect(fromArgs.logLevel).toBe('debug');
  });

  it('rejects an unknown error mode', () => {
    expect(() => resolveRunOptions({ onCpuError: 'ignore' }, {})).toThrow('Bad --onCpuError: ignore');
  });
});
