import type { Byte, RegisterState, Word } from './types';
import { Chip8Error, formatHex } from '@core/errors';
import { PROGRAM_START } from '@core/bus/memory';

export const REGISTER_COUNT = 16;
export const STACK_DEPTH = 16;
export const VF = 0xF;

export class RegisterFile {
  private v = new Uint8Array(REGISTER_COUNT);
  private stack = new Uint16Array(STACK_DEPTH);
  private _sp = 0;
  private _i: Word = 0;
  private _pc: Word = PROGRAM_START;

  get i(): Word { return this._i; }
  set i(value: Word) { this._i = value & 0xFFFF; }

  get pc(): Word { return this._pc; }
  set pc(value: Word) { this._pc = value & 0xFFFF; }

  get sp(): number { return this._sp; }

  getV(x: number): Byte {
    this.checkRegister(x);
    return this.v[x];
  }

  setV(x: number, value: Byte): void {
    this.checkRegister(x);
    this.v[x] = value & 0xFF;
  }

  push(addr: Word): void {
    if (this._sp >= STACK_DEPTH) {
      throw new Chip8Error('StackOverflow', `Call stack is full (${STACK_DEPTH} entries) pushing ${formatHex(addr, 4)}`, { address: addr });
    }
    this.stack[this._sp++] = addr & 0xFFFF;
  }

  pop(): Word {
    if (this._sp === 0) {
      throw new Chip8Error('StackUnderflow', 'Return with an empty call stack');
    }
    return this.stack[--this._sp];
  }

  snapshot(): RegisterState {
    return {
      v: Array.from(this.v),
      i: this._i,
      pc: this._pc,
      sp: this._sp,
      stack: Array.from(this.stack.subarray(0, this._sp)),
    };
  }

  private checkRegister(x: number): void {
    if (!Number.isInteger(x) || x < 0 || x >= REGISTER_COUNT) {
      throw new Chip8Error('InvalidRegister', `Register index ${x} is not in 0..15`);
    }
  }
}
