import type { Byte, IFramebuffer } from '../emulator/types';
import { systemClock, type Clock } from '../timing/clock';
import { TIMING } from '../timing/constants';

export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

export interface FrameView {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint8Array; // row-major, one byte (0/1) per pixel
}

// Display collaborator: presents a fully composited frame.
export interface DisplaySink {
  present(frame: FrameView): void;
}

export class Framebuffer implements IFramebuffer {
  readonly width = SCREEN_WIDTH;
  readonly height = SCREEN_HEIGHT;
  private readonly pixels = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  private lastFlushAt: number;

  constructor(private readonly clock: Clock = systemClock) {
    this.lastFlushAt = clock.now();
  }

  clear(): void {
    this.pixels.fill(0);
  }

  /**
   * XORs the 8 bits of `byte` (MSB first) onto row `y` starting at column `x`.
   * Both axes wrap. Returns true if any lit pixel was turned off.
   */
  drawRow(byte: Byte, x: number, y: number): boolean {
    let erased = false;
    const row = (y % this.height) * this.width;
    for (let bit = 0; bit < 8; bit++) {
      const i = row + ((x + bit) % this.width);
      const prev = this.pixels[i];
      const next = prev ^ ((byte >> (7 - bit)) & 1);
      this.pixels[i] = next;
      if (prev === 1 && next === 0) erased = true;
    }
    return erased;
  }

  pixel(x: number, y: number): number {
    return this.pixels[(y % this.height) * this.width + (x % this.width)];
  }

  snapshot(): FrameView {
    return { width: this.width, height: this.height, pixels: this.pixels.slice() };
  }

  toAscii(): string[] {
    const out: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let line = '';
      for (let x = 0; x < this.width; x++) line += this.pixels[y * this.width + x] ? '#' : '.';
      out.push(line);
    }
    return out;
  }

  // FNV-1a over the cells, as 8 hex digits.
  hash(): string {
    let h = 0x811c9dc5;
    for (const p of this.pixels) h = Math.imul(h ^ p, 0x01000193) >>> 0;
    return h.toString(16).padStart(8, '0');
  }

  canFlush(): boolean {
    return this.clock.now() - this.lastFlushAt > TIMING.flushIntervalMs;
  }

  flush(sink: DisplaySink): void {
    sink.present(this.snapshot());
    this.lastFlushAt = this.clock.now();
  }
}
