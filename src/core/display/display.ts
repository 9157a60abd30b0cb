export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

// Monochrome framebuffer, one byte per pixel (0 = off, 1 = on), row-major.
export class Display {
  private framebuffer = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);

  clear(): void {
    this.framebuffer.fill(0);
  }

  // XOR an 8-pixel-wide sprite, one byte per row. Pixels wrap around both edges.
  // Returns true if any lit pixel was turned off.
  drawSprite(x: number, y: number, rows: ArrayLike<number>): boolean {
    const x0 = ((x % DISPLAY_WIDTH) + DISPLAY_WIDTH) % DISPLAY_WIDTH;
    const y0 = ((y % DISPLAY_HEIGHT) + DISPLAY_HEIGHT) % DISPLAY_HEIGHT;
    let collision = false;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row] & 0xFF;
      if (bits === 0) continue;
      const py = (y0 + row) % DISPLAY_HEIGHT;
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;
        const px = (x0 + col) % DISPLAY_WIDTH;
        const idx = py * DISPLAY_WIDTH + px;
        if (this.framebuffer[idx] === 1) collision = true;
        this.framebuffer[idx] ^= 1;
      }
    }
    return collision;
  }

  getPixel(x: number, y: number): boolean {
    return this.framebuffer[y * DISPLAY_WIDTH + x] === 1;
  }

  snapshot(): Uint8Array {
    return this.framebuffer.slice();
  }

  litCount(): number {
    let n = 0;
    for (let i = 0; i < this.framebuffer.length; i++) n += this.framebuffer[i];
    return n;
  }

  // Text rendering for headless inspection: '#' lit, '.' dark, one line per row
  toAscii(): string {
    const lines: string[] = [];
    for (let y = 0; y < DISPLAY_HEIGHT; y++) {
      let line = '';
      for (let x = 0; x < DISPLAY_WIDTH; x++) line += this.framebuffer[y * DISPLAY_WIDTH + x] ? '#' : '.';
      lines.push(line);
    }
    return lines.join('\n');
  }
}
