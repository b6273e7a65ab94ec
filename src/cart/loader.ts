import fs from 'fs';
import { MEMORY_SIZE, PROGRAM_START } from '../memory/memory';

export const MAX_ROM_SIZE = MEMORY_SIZE - PROGRAM_START; // 3584 bytes

// ROM images are raw program bytes with no header. Reject what cannot fit before it reaches memory.
export function validateRom(rom: Uint8Array): Uint8Array {
  if (rom.length === 0) throw new Error('ROM is empty');
  if (rom.length > MAX_ROM_SIZE) {
    throw new Error(`ROM too large: ${rom.length} bytes (max ${MAX_ROM_SIZE})`);
  }
  return rom;
}

export function readRomFile(path: string): Uint8Array {
  return validateRom(new Uint8Array(fs.readFileSync(path)));
}
