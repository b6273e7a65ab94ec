import { describe, it, expect } from 'vitest';
import { mkEmu, run } from '../helpers/vm';

const GLYPH_ZERO = ['####....', '#..#....', '#..#....', '#..#....', '####....'];

describe('Dxyn sprite draw', () => {
  it('draws a glyph from I at (Vx, Vy) with VF = 0', () => {
    // I = glyph 0, V1 = 0, V2 = 0
    const { emu } = mkEmu([0xa000, 0xd125]);
    run(emu, 2);
    const rows = emu.framebuffer.toAscii();
    for (let r = 0; r < 5; r++) expect(rows[r].slice(0, 8)).toBe(GLYPH_ZERO[r]);
    expect(rows[5]).toBe('.'.repeat(64));
    expect(emu.cpu.state.V[0xf]).toBe(0);
  });

  it('a second identical draw erases it and sets VF = 1', () => {
    const { emu } = mkEmu([0xa000, 0xd125, 0xd125]);
    run(emu, 3);
    expect(emu.framebuffer.snapshot().pixels.every((p) => p === 0)).toBe(true);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });

  it('VF is cleared again by a draw that erases nothing', () => {
    const { emu } = mkEmu([0xa000, 0xd125, 0xd125, 0x6a20, 0xda25]);
    run(emu, 5);
    expect(emu.cpu.state.V[0xf]).toBe(0);
  });

  it('rows past the bottom wrap to the top, one row at a time', () => {
    // V1 = 0, V2 = 30
    const { emu } = mkEmu([0x621e, 0xa000, 0xd125]);
    run(emu, 3);
    const fb = emu.framebuffer;
    expect(fb.toAscii()[30].slice(0, 8)).toBe('####....');
    expect(fb.toAscii()[31].slice(0, 8)).toBe('#..#....');
    expect(fb.toAscii()[0].slice(0, 8)).toBe('#..#....');
    expect(fb.toAscii()[2].slice(0, 8)).toBe('####....');
  });

  it('columns past the right edge wrap', () => {
    // V1 = 62
    const { emu } = mkEmu([0x613e, 0xa000, 0xd121]);
    run(emu, 3);
    const row = emu.framebuffer.toAscii()[0];
    expect(row.slice(62)).toBe('##');
    expect(row.slice(0, 3)).toBe('##.');
  });

  it('coordinates above the screen size wrap modulo width/height', () => {
    // V1 = 0x41 (65 -> 1), V2 = 0x22 (34 -> 2)
    const { emu } = mkEmu([0x6141, 0x6222, 0xa000, 0xd121]);
    run(emu, 4);
    expect(emu.framebuffer.toAscii()[2].slice(0, 6)).toBe('.####.');
  });

  it('00E0 after a draw leaves an all-zero framebuffer', () => {
    const { emu } = mkEmu([0xa000, 0xd125, 0x00e0]);
    run(emu, 3);
    expect(emu.framebuffer.snapshot().pixels.every((p) => p === 0)).toBe(true);
    expect(emu.cpu.state.PC).toBe(0x206);
  });

  it('n = 0 draws nothing and clears VF', () => {
    const { emu } = mkEmu([0x6f01, 0xa000, 0xd120]);
    run(emu, 3);
    expect(emu.framebuffer.snapshot().pixels.every((p) => p === 0)).toBe(true);
    expect(emu.cpu.state.V[0xf]).toBe(0);
  });
});
