import fs from 'fs';
import { PNG } from 'pngjs';
import type { DisplaySink, FrameView } from './framebuffer';
import { DEFAULT_PALETTE, renderFrameRGBA, type Palette } from './renderer';

export function encodeFramePng(frame: FrameView, scale = 1, palette: Palette = DEFAULT_PALETTE): Buffer {
  const s = Math.max(1, scale | 0);
  const png = new PNG({ width: frame.width * s, height: frame.height * s });
  const rgba = renderFrameRGBA(frame, s, palette);
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  return PNG.sync.write(png);
}

export function writeFramePng(path: string, frame: FrameView, scale = 1, palette: Palette = DEFAULT_PALETTE): void {
  fs.writeFileSync(path, encodeFramePng(frame, scale, palette));
}

// Headless display collaborator: keeps the most recent frame so it can be written out at the end.
export class LastFrameSink implements DisplaySink {
  last: FrameView | null = null;
  presented = 0;

  present(frame: FrameView): void {
    this.last = frame;
    this.presented++;
  }
}
