import type { CpuErrorMode } from '../emulator/scheduler';
import { parseKey } from '../input/keymap';
import { isLogLevel, type LogLevel } from '../utils/log';

export type Args = Record<string, string | true>;

export interface KeyPress {
  code: number;
  atMs: number;
}

export interface RunOptions {
  romPath: string | undefined;
  outPath: string;
  ms: number;
  scale: number;
  presses: KeyPress[];
  traceEveryInstr: number;
  onCpuError: CpuErrorMode;
  logLevel: LogLevel | undefined;
}

// --key=value pairs; bare --flag becomes true. Positional args are ignored.
export function parseArgs(argv: string[]): Args {
  const out: Args = {};
  for (const a of argv) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
    else if (a.startsWith('--')) out[a.slice(2)] = true;
  }
  return out;
}

function str(v: string | true | undefined): string | undefined {
  return typeof v === 'string' && v.length > 0 ? v : undefined;
}

function num(v: string | undefined, fallback: number, min: number): number {
  if (v === undefined) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? Math.max(min, Math.floor(n)) : fallback;
}

// "5@100,KeyQ@400" -> presses sorted by time
export function parsePresses(list: string | undefined): KeyPress[] {
  if (!list) return [];
  return list
    .split(',')
    .filter((p) => p.trim().length > 0)
    .map((p) => {
      const [key, at] = p.split('@');
      const code = parseKey(key ?? '');
      const atMs = Number(at);
      if (code === null) throw new Error(`Unknown key in --press: "${key}"`);
      if (!Number.isFinite(atMs) || atMs < 0) throw new Error(`Bad press time in --press: "${p}"`);
      return { code, atMs };
    })
    .sort((a, b) => a.atMs - b.atMs);
}

export function resolveRunOptions(args: Args, env: Record<string, string | undefined> = process.env): RunOptions {
  const errMode = str(args.onCpuError) ?? env.CHIP8_CPUERR ?? 'throw';
  if (errMode !== 'throw' && errMode !== 'record') throw new Error(`Bad --onCpuError: ${errMode}`);
  const level = str(args.log);
  return {
    romPath: str(args.rom) ?? env.CHIP8_ROM,
    outPath: str(args.out) ?? 'screen.png',
    ms: num(str(args.ms) ?? env.CHIP8_MS, 2000, 1),
    scale: num(str(args.scale) ?? env.CHIP8_SCALE, 10, 1),
    presses: parsePresses(str(args.press)),
    traceEveryInstr: num(str(args.trace) ?? env.CHIP8_TRACE, 0, 0),
    onCpuError: errMode,
    logLevel: level !== undefined && isLogLevel(level) ? level : undefined,
  };
}
