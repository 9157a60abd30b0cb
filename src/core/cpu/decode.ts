import type { Word } from './types';
import { Chip8Error } from '@core/errors';

export type OpTag =
  | 'sys'      // 0NNN
  | 'cls'      // 00E0
  | 'ret'      // 00EE
  | 'jp'       // 1NNN
  | 'call'     // 2NNN
  | 'seByte'   // 3XNN
  | 'sneByte'  // 4XNN
  | 'seReg'    // 5XY0
  | 'ldByte'   // 6XNN
  | 'addByte'  // 7XNN
  | 'ldReg'    // 8XY0
  | 'or'       // 8XY1
  | 'and'      // 8XY2
  | 'xor'      // 8XY3
  | 'addReg'   // 8XY4
  | 'sub'      // 8XY5
  | 'shr'      // 8XY6
  | 'subn'     // 8XY7
  | 'shl'      // 8XYE
  | 'sneReg'   // 9XY0
  | 'ldI'      // ANNN
  | 'jpV0'     // BNNN
  | 'rnd'      // CXNN
  | 'drw'      // DXYN
  | 'skp'      // EX9E
  | 'sknp'     // EXA1
  | 'ldVxDt'   // FX07
  | 'ldVxK'    // FX0A
  | 'ldDtVx'   // FX15
  | 'ldStVx'   // FX18
  | 'addI'     // FX1E
  | 'ldF'      // FX29
  | 'ldB'      // FX33
  | 'ldIVx'    // FX55
  | 'ldVxI';   // FX65

export interface Instruction {
  op: OpTag;
  word: Word;
  x: number;   // second nibble
  y: number;   // third nibble
  n: number;   // low nibble
  nn: number;  // low byte
  nnn: number; // low 12 bits
}

type Table = Readonly<Record<number, OpTag>>;

// Top nibbles that fully determine the operation
const DIRECT: Readonly<Record<number, OpTag>> = {
  0x1: 'jp', 0x2: 'call', 0x3: 'seByte', 0x4: 'sneByte', 0x6: 'ldByte', 0x7: 'addByte',
  0xA: 'ldI', 0xB: 'jpV0', 0xC: 'rnd', 0xD: 'drw',
};

// Top nibbles further keyed by the low nibble
const BY_LOW_NIBBLE: Readonly<Record<number, Table>> = {
  0x5: { 0x0: 'seReg' },
  0x8: {
    0x0: 'ldReg', 0x1: 'or', 0x2: 'and', 0x3: 'xor', 0x4: 'addReg',
    0x5: 'sub', 0x6: 'shr', 0x7: 'subn', 0xE: 'shl',
  },
  0x9: { 0x0: 'sneReg' },
};

// Top nibbles further keyed by the low byte
const BY_LOW_BYTE: Readonly<Record<number, Table>> = {
  0xE: { 0x9E: 'skp', 0xA1: 'sknp' },
  0xF: {
    0x07: 'ldVxDt', 0x0A: 'ldVxK', 0x15: 'ldDtVx', 0x18: 'ldStVx', 0x1E: 'addI',
    0x29: 'ldF', 0x33: 'ldB', 0x55: 'ldIVx', 0x65: 'ldVxI',
  },
};

const SYSTEM_WORDS: Table = { 0x00E0: 'cls', 0x00EE: 'ret' };

export function classify(word: Word): OpTag | null {
  const top = (word >>> 12) & 0xF;
  if (top === 0x0) return SYSTEM_WORDS[word] ?? 'sys';
  const direct = DIRECT[top];
  if (direct) return direct;
  const byNibble = BY_LOW_NIBBLE[top];
  if (byNibble) return byNibble[word & 0xF] ?? null;
  const byByte = BY_LOW_BYTE[top];
  if (byByte) return byByte[word & 0xFF] ?? null;
  return null;
}

export function decode(word: Word): Instruction {
  const w = word & 0xFFFF;
  const op = classify(w);
  if (op === null) throw Chip8Error.unknownOpcode(w);
  return {
    op,
    word: w,
    x: (w >>> 8) & 0xF,
    y: (w >>> 4) & 0xF,
    n: w & 0xF,
    nn: w & 0xFF,
    nnn: w & 0xFFF,
  };
}
