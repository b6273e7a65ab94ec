import type { Word } from '../emulator/types';

type X = { x: number };
type XY = { x: number; y: number };
type XKK = { x: number; kk: number };
type Addr = { addr: number };

export type Instruction =
  | { op: 'cls' }
  | { op: 'ret' }
  | ({ op: 'jp' } & Addr)
  | ({ op: 'call' } & Addr)
  | ({ op: 'seImm' } & XKK)
  | ({ op: 'sneImm' } & XKK)
  | ({ op: 'seReg' } & XY)
  | ({ op: 'ldImm' } & XKK)
  | ({ op: 'addImm' } & XKK)
  | ({ op: 'ldReg' } & XY)
  | ({ op: 'or' } & XY)
  | ({ op: 'and' } & XY)
  | ({ op: 'xor' } & XY)
  | ({ op: 'addReg' } & XY)
  | ({ op: 'sub' } & XY)
  | ({ op: 'shr' } & XY)
  | ({ op: 'subn' } & XY)
  | ({ op: 'shl' } & XY)
  | ({ op: 'sneReg' } & XY)
  | ({ op: 'ldI' } & Addr)
  | ({ op: 'jpV0' } & Addr)
  | ({ op: 'rnd' } & XKK)
  | ({ op: 'drw'; n: number } & XY)
  | ({ op: 'skp' } & X)
  | ({ op: 'sknp' } & X)
  | ({ op: 'ldVxDt' } & X)
  | ({ op: 'waitKey' } & X)
  | ({ op: 'ldDtVx' } & X)
  | ({ op: 'ldStVx' } & X)
  | ({ op: 'addI' } & X)
  | ({ op: 'ldF' } & X)
  | ({ op: 'bcd' } & X)
  | ({ op: 'store' } & X)
  | ({ op: 'load' } & X);

function decodeAlu(n: number, x: number, y: number): Instruction | null {
  switch (n) {
    case 0x0: return { op: 'ldReg', x, y };
    case 0x1: return { op: 'or', x, y };
    case 0x2: return { op: 'and', x, y };
    case 0x3: return { op: 'xor', x, y };
    case 0x4: return { op: 'addReg', x, y };
    case 0x5: return { op: 'sub', x, y };
    case 0x6: return { op: 'shr', x, y };
    case 0x7: return { op: 'subn', x, y };
    case 0xe: return { op: 'shl', x, y };
    default: return null;
  }
}

function decodeMisc(kk: number, x: number): Instruction | null {
  switch (kk) {
    case 0x07: return { op: 'ldVxDt', x };
    case 0x0a: return { op: 'waitKey', x };
    case 0x15: return { op: 'ldDtVx', x };
    case 0x18: return { op: 'ldStVx', x };
    case 0x1e: return { op: 'addI', x };
    case 0x29: return { op: 'ldF', x };
    case 0x33: return { op: 'bcd', x };
    case 0x55: return { op: 'store', x };
    case 0x65: return { op: 'load', x };
    default: return null;
  }
}

/**
 * Splits a 16-bit word into its operand fields and picks the instruction.
 * Families 0x0/0xE/0xF select on the low byte, 0x5/0x8/0x9 on the low nibble.
 * Returns null when nothing matches.
 */
export function decode(word: Word): Instruction | null {
  const family = (word >>> 12) & 0xf;
  const addr = word & 0x0fff;
  const kk = word & 0x00ff;
  const n = word & 0x000f;
  const x = (word >>> 8) & 0xf;
  const y = (word >>> 4) & 0xf;

  switch (family) {
    case 0x0:
      // The x nibble is ignored; other 0nnn machine calls are not supported.
      if (kk === 0xe0) return { op: 'cls' };
      if (kk === 0xee) return { op: 'ret' };
      return null;
    case 0x1: return { op: 'jp', addr };
    case 0x2: return { op: 'call', addr };
    case 0x3: return { op: 'seImm', x, kk };
    case 0x4: return { op: 'sneImm', x, kk };
    case 0x5: return n === 0 ? { op: 'seReg', x, y } : null;
    case 0x6: return { op: 'ldImm', x, kk };
    case 0x7: return { op: 'addImm', x, kk };
    case 0x8: return decodeAlu(n, x, y);
    case 0x9: return n === 0 ? { op: 'sneReg', x, y } : null;
    case 0xa: return { op: 'ldI', addr };
    case 0xb: return { op: 'jpV0', addr };
    case 0xc: return { op: 'rnd', x, kk };
    case 0xd: return { op: 'drw', x, y, n };
    case 0xe:
      if (kk === 0x9e) return { op: 'skp', x };
      if (kk === 0xa1) return { op: 'sknp', x };
      return null;
    case 0xf: return decodeMisc(kk, x);
    default:
      return null;
  }
}
