const hex2 = (v: number) => (v & 0xFF).toString(16).toUpperCase().padStart(2, '0');
const hex4 = (v: number) => (v & 0xFFFF).toString(16).toUpperCase().padStart(4, '0');

export interface HexdumpOptions {
  // Address of bytes[0]
  base?: number;
  width?: number;
  // Collapse runs of all-zero rows into a single '*'
  squeezeZeros?: boolean;
}

// Format `0200  00 E0 12 00 ...` rows
export function hexdump(bytes: Uint8Array, opts: HexdumpOptions = {}): string[] {
  const base = opts.base ?? 0;
  const width = opts.width ?? 16;
  const out: string[] = [];
  let squeezed = false;
  for (let off = 0; off < bytes.length; off += width) {
    const row = bytes.subarray(off, Math.min(off + width, bytes.length));
    if (opts.squeezeZeros && row.every((b) => b === 0)) {
      if (!squeezed) out.push('*');
      squeezed = true;
      continue;
    }
    squeezed = false;
    out.push(`${hex4(base + off)}  ${Array.from(row, hex2).join(' ')}`);
  }
  return out;
}
