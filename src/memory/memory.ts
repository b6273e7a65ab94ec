import type { Byte, IMemory } from '../emulator/types';
import { MemoryAccessError } from '../emulator/errors';
import glyphs from './glyphs.json';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const GLYPH_BYTES = 5;
export const GLYPH_REGION_SIZE = glyphs.length * GLYPH_BYTES; // 0x50

// 4 KiB flat RAM. $000-$04F hold the hex digit glyphs, programs start at $200.
export class Memory implements IMemory {
  private readonly mem = new Uint8Array(MEMORY_SIZE);

  read(address: number): Byte {
    return this.mem[this.check(address)];
  }

  write(address: number, value: Byte): void {
    this.mem[this.check(address)] = value & 0xff;
  }

  /** Copies the 16 digit glyphs to $000. Only valid once, on fresh memory. */
  loadBuiltInSprites(): void {
    if (this.mem.subarray(0, GLYPH_REGION_SIZE).some((b) => b !== 0)) {
      throw new Error('Glyph region already written; built-in sprites must be loaded first and only once');
    }
    let address = 0;
    for (const glyph of glyphs) {
      for (const row of glyph) this.write(address++, row);
    }
  }

  // No length check: anything past $FFF surfaces as a MemoryAccessError.
  loadProgram(bytes: ArrayLike<number>): void {
    for (let i = 0; i < bytes.length; i++) {
      this.write(PROGRAM_START + i, bytes[i]);
    }
  }

  dump(start: number, length: number): Uint8Array {
    const from = this.check(start);
    return this.mem.slice(from, Math.min(MEMORY_SIZE, from + Math.max(0, length)));
  }

  private check(address: number): number {
    if (!Number.isInteger(address) || address < 0 || address >= MEMORY_SIZE) {
      throw new MemoryAccessError(address);
    }
    return address;
  }
}
