import { describe, it, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { MAX_ROM_SIZE, readRomFile, validateRom } from '../../src/cart/loader';

describe('ROM loader', () => {
  it('accepts images up to the space above $200', () => {
    expect(MAX_ROM_SIZE).toBe(3584);
    expect(validateRom(new Uint8Array(MAX_ROM_SIZE)).length).toBe(3584);
  });

  it('rejects empty and oversize images', () => {
    expect(() => validateRom(new Uint8Array(0))).toThrow('ROM is empty');
    expect(() => validateRom(new Uint8Array(MAX_ROM_SIZE + 1))).toThrow('ROM too large: 3585 bytes (max 3584)');
  });

  it('reads raw bytes from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rom-'));
    const file = path.join(dir, 'loop.ch8');
    try {
      fs.writeFileSync(file, Buffer.from([0x12, 0x00]));
      expect(Array.from(readRomFile(file))).toEqual([0x12, 0x00]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
