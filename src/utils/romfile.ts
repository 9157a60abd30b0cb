import fs from 'node:fs';
import path from 'node:path';

export const ROM_EXTENSIONS = ['.ch8', '.chip8'];

// Read a CHIP-8 program from disk. The file must exist and carry a .ch8/.chip8 extension.
export function loadRomFile(romPath: string): Uint8Array {
  if (!romPath) throw new Error('No ROM path given');
  if (!fs.existsSync(romPath)) throw new Error(`ROM not found: ${romPath}`);
  const ext = path.extname(romPath).toLowerCase();
  if (!ROM_EXTENSIONS.includes(ext)) {
    throw new Error(`Not a CHIP-8 ROM (expected ${ROM_EXTENSIONS.join(' or ')}): ${romPath}`);
  }
  return new Uint8Array(fs.readFileSync(romPath));
}
