#!/usr/bin/env tsx
/*
Print a disassembly listing of a ROM image.

Usage:
  tsx scripts/disasm_rom.ts --rom=path/to/game.ch8
*/
import { parseArgs } from '../src/config/options';
import { readRomFile } from '../src/cart/loader';
import { disassemble } from '../src/cpu/disasm';

function main() {
  const args = parseArgs(process.argv.slice(2));
  const path = typeof args.rom === 'string' ? args.rom : process.env.CHIP8_ROM;
  if (!path) {
    console.error('Usage: --rom=path/to/game.ch8');
    process.exit(2);
  }
  for (const line of disassemble(readRomFile(path))) {
    console.log(`${line.address.toString(16).padStart(3, '0')}: ${line.word.toString(16).padStart(4, '0')}  ${line.text}`);
  }
}

try {
  main();
} catch (e) {
  console.error('[disasm]', e instanceof Error ? e.message : e);
  process.exit(1);
}
