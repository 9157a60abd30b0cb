import type { Byte, Word } from '@core/cpu/types';
import { Chip8Error } from '@core/errors';
import glyphs from './font.json';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_ROM_SIZE = MEMORY_SIZE - PROGRAM_START;

// Hex digit sprites 0..F, 5 bytes each
export const FONT_BASE = 0x050;
export const FONT_GLYPH_BYTES = 5;
export const FONT: Uint8Array = Uint8Array.from(glyphs.flat());

export interface BusDevice {
  read(addr: Word): Byte;
  write(addr: Word, value: Byte): void;
}

export class Memory implements BusDevice {
  private ram = new Uint8Array(MEMORY_SIZE);

  // Full reset: clears RAM, installs the font, copies the program at 0x200.
  load(rom: Uint8Array): void {
    if (rom.length > MAX_ROM_SIZE) {
      throw new Chip8Error('CapacityExceeded', `ROM is ${rom.length} bytes, at most ${MAX_ROM_SIZE} fit above 0x200`);
    }
    this.ram.fill(0);
    this.ram.set(FONT, FONT_BASE);
    this.ram.set(rom, PROGRAM_START);
  }

  read(addr: Word): Byte {
    this.check(addr);
    return this.ram[addr];
  }

  write(addr: Word, value: Byte): void {
    this.check(addr);
    this.ram[addr] = value & 0xFF;
  }

  // Big-endian instruction word
  readWord(addr: Word): Word {
    return (this.read(addr) << 8) | this.read(addr + 1);
  }

  dump(start = 0, length = MEMORY_SIZE - start): Uint8Array {
    this.checkRange(start, length);
    return this.ram.slice(start, start + length);
  }

  // Throws OutOfBounds unless every address in start..start+length-1 exists
  checkRange(start: Word, length: number): void {
    this.check(start);
    if (length > 0) this.check(start + length - 1);
  }

  private check(addr: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= this.ram.length) {
      throw Chip8Error.outOfBounds(addr);
    }
  }
}
