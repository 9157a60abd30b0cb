export type Chip8ErrorKind =
  | 'OutOfBounds'
  | 'InvalidRegister'
  | 'InvalidKey'
  | 'StackOverflow'
  | 'StackUnderflow'
  | 'CapacityExceeded'
  | 'UnknownOpcode';

export interface Chip8ErrorDetail {
  address?: number;
  opcode?: number;
}

const hex = (v: number, width: number) => `0x${v.toString(16).toUpperCase().padStart(width, '0')}`;

export class Chip8Error extends Error {
  readonly kind: Chip8ErrorKind;
  readonly address?: number;
  readonly opcode?: number;

  constructor(kind: Chip8ErrorKind, message: string, detail: Chip8ErrorDetail = {}) {
    super(message);
    this.name = 'Chip8Error';
    this.kind = kind;
    this.address = detail.address;
    this.opcode = detail.opcode;
  }

  static outOfBounds(address: number): Chip8Error {
    return new Chip8Error('OutOfBounds', `Address ${hex(address, 4)} is outside the address space`, { address });
  }

  static unknownOpcode(opcode: number): Chip8Error {
    return new Chip8Error('UnknownOpcode', `Unknown opcode ${hex(opcode, 4)}`, { opcode });
  }
}

export const isChip8Error = (e: unknown): e is Chip8Error => e instanceof Chip8Error;

export const formatHex = hex;
