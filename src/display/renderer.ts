import type { FrameView } from './framebuffer';

export type RGB = readonly [number, number, number];

export interface Palette {
  off: RGB;
  on: RGB;
}

export const DEFAULT_PALETTE: Palette = { off: [0, 0, 0], on: [255, 255, 255] };

// Magnify a 0/1 frame into an RGBA buffer of (width*scale) x (height*scale).
export function renderFrameRGBA(frame: FrameView, scale = 1, palette: Palette = DEFAULT_PALETTE): Uint8Array {
  const s = Math.max(1, scale | 0);
  const outW = frame.width * s;
  const outH = frame.height * s;
  const out = new Uint8Array(outW * outH * 4);
  for (let oy = 0; oy < outH; oy++) {
    const row = Math.floor(oy / s) * frame.width;
    for (let ox = 0; ox < outW; ox++) {
      const [r, g, b] = frame.pixels[row + Math.floor(ox / s)] ? palette.on : palette.off;
      const o = (oy * outW + ox) * 4;
      out[o] = r;
      out[o + 1] = g;
      out[o + 2] = b;
      out[o + 3] = 255;
    }
  }
  return out;
}
