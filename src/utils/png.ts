import fs from 'node:fs';
import path from 'node:path';
import { PNG } from 'pngjs';
import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from '@core/display/display';

export type Rgb = [number, number, number];

export interface PngOptions {
  scale?: number;
  on?: Rgb;
  off?: Rgb;
}

// Expand a 64x32 0/1 framebuffer into an RGBA PNG, `scale` pixels per CHIP-8 pixel
export function framebufferToPng(fb: Uint8Array, opts: PngOptions = {}): PNG {
  const scale = Math.max(1, opts.scale ?? 8);
  const on = opts.on ?? [255, 255, 255];
  const off = opts.off ?? [0, 0, 0];
  const W = DISPLAY_WIDTH * scale, H = DISPLAY_HEIGHT * scale;
  const png = new PNG({ width: W, height: H });
  for (let y = 0; y < DISPLAY_HEIGHT; y++) {
    for (let x = 0; x < DISPLAY_WIDTH; x++) {
      const [r, g, b] = fb[y * DISPLAY_WIDTH + x] ? on : off;
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + x * scale + dx) << 2;
          png.data[o + 0] = r;
          png.data[o + 1] = g;
          png.data[o + 2] = b;
          png.data[o + 3] = 255;
        }
      }
    }
  }
  return png;
}

export const writeFramePng = async (outPath: string, fb: Uint8Array, opts: PngOptions = {}): Promise<void> => {
  const png = framebufferToPng(fb, opts);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  const stream = fs.createWriteStream(outPath);
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve());
    stream.on('error', (e) => reject(e));
    png.pack().pipe(stream);
  });
};
