import type { Word } from './types';
import { decode, type Instruction, type OpTag } from './decode';
import { RegisterFile, VF } from './registers';
import { FONT_BASE, FONT_GLYPH_BYTES, Memory } from '@core/bus/memory';
import { Timers } from '@core/timers/timers';
import { Keypad } from '@core/input/keypad';
import { Display } from '@core/display/display';
import type { Quirks, RandomByte } from '@core/system/config';

// Everything an instruction may touch. Owned by Chip8System, rebuilt on each load.
export interface Machine {
  memory: Memory;
  registers: RegisterFile;
  timers: Timers;
  keypad: Keypad;
  display: Display;
}

export interface CpuOptions {
  quirks: Quirks;
  random: RandomByte;
}

type Handler = (ins: Instruction) => void;

export class Chip8CPU {
  private traceHook: ((pc: Word, ins: Instruction) => void) | null = null;
  private readonly ops: Record<OpTag, Handler>;

  constructor(private readonly m: Machine, private readonly opts: CpuOptions) {
    this.ops = this.buildTable();
  }

  // Optional per-instruction callback, invoked after decode and before execution
  setTraceHook(fn: ((pc: Word, ins: Instruction) => void) | null) { this.traceHook = fn; }

  // Fetch, decode and execute one instruction. PC is advanced before execution,
  // so jumps and skips operate relative to the next instruction.
  step(): Instruction {
    const r = this.m.registers;
    const pc = r.pc;
    const ins = decode(this.m.memory.readWord(pc));
    if (this.traceHook) this.traceHook(pc, ins);
    r.pc = pc + 2;
    this.ops[ins.op](ins);
    return ins;
  }

  private skipIf(cond: boolean): void {
    if (cond) this.m.registers.pc += 2;
  }

  private buildTable(): Record<OpTag, Handler> {
    const { memory, registers: r, timers, keypad, display } = this.m;
    const q = this.opts.quirks;
    const V = (x: number) => r.getV(x);
    const setV = (x: number, v: number) => r.setV(x, v);
    // Result first, flag last: when X is F the flag survives.
    const setWithFlag = (x: number, result: number, flag: boolean) => {
      setV(x, result);
      setV(VF, flag ? 1 : 0);
    };
    const logic = (x: number, result: number) => {
      setV(x, result);
      if (q.logicResetsVf) setV(VF, 0);
    };

    return {
      sys: () => {},
      cls: () => display.clear(),
      ret: () => { r.pc = r.pop(); },
      jp: ({ nnn }) => { r.pc = nnn; },
      call: ({ nnn }) => { r.push(r.pc); r.pc = nnn; },
      seByte: ({ x, nn }) => this.skipIf(V(x) === nn),
      sneByte: ({ x, nn }) => this.skipIf(V(x) !== nn),
      seReg: ({ x, y }) => this.skipIf(V(x) === V(y)),
      ldByte: ({ x, nn }) => setV(x, nn),
      addByte: ({ x, nn }) => setV(x, V(x) + nn),
      ldReg: ({ x, y }) => setV(x, V(y)),
      or: ({ x, y }) => logic(x, V(x) | V(y)),
      and: ({ x, y }) => logic(x, V(x) & V(y)),
      xor: ({ x, y }) => logic(x, V(x) ^ V(y)),
      addReg: ({ x, y }) => {
        const sum = V(x) + V(y);
        setWithFlag(x, sum, sum > 0xFF);
      },
      sub: ({ x, y }) => {
        const a = V(x), b = V(y);
        setWithFlag(x, a - b, a >= b);
      },
      shr: ({ x, y }) => {
        const src = q.shiftUsesVy ? V(y) : V(x);
        setWithFlag(x, src >>> 1, (src & 0x01) !== 0);
      },
      subn: ({ x, y }) => {
        const a = V(x), b = V(y);
        setWithFlag(x, b - a, b >= a);
      },
      shl: ({ x, y }) => {
        const src = q.shiftUsesVy ? V(y) : V(x);
        setWithFlag(x, src << 1, (src & 0x80) !== 0);
      },
      sneReg: ({ x, y }) => this.skipIf(V(x) !== V(y)),
      ldI: ({ nnn }) => { r.i = nnn; },
      jpV0: ({ nnn }) => { r.pc = (nnn + V(0)) & 0xFFF; },
      rnd: ({ x, nn }) => setV(x, this.opts.random() & nn),
      drw: ({ x, y, n }) => {
        const rows = new Uint8Array(n);
        for (let k = 0; k < n; k++) rows[k] = memory.read(r.i + k);
        const collision = display.drawSprite(V(x), V(y), rows);
        setV(VF, collision ? 1 : 0);
      },
      skp: ({ x }) => this.skipIf(keypad.isDown(V(x) & 0xF)),
      sknp: ({ x }) => this.skipIf(!keypad.isDown(V(x) & 0xF)),
      ldVxDt: ({ x }) => setV(x, timers.delay),
      ldVxK: ({ x }) => {
        // Stay on this instruction until Chip8System delivers a key press
        keypad.beginWait(x);
        r.pc -= 2;
      },
      ldDtVx: ({ x }) => timers.setDelay(V(x)),
      ldStVx: ({ x }) => timers.setSound(V(x)),
      addI: ({ x }) => { r.i = r.i + V(x); },
      ldF: ({ x }) => { r.i = FONT_BASE + (V(x) & 0xF) * FONT_GLYPH_BYTES; },
      ldB: ({ x }) => {
        const v = V(x);
        memory.checkRange(r.i, 3);
        memory.write(r.i, Math.floor(v / 100));
        memory.write(r.i + 1, Math.floor(v / 10) % 10);
        memory.write(r.i + 2, v % 10);
      },
      ldIVx: ({ x }) => {
        memory.checkRange(r.i, x + 1);
        for (let k = 0; k <= x; k++) memory.write(r.i + k, V(k));
        if (q.memoryIncrementsI) r.i = r.i + x + 1;
      },
      ldVxI: ({ x }) => {
        memory.checkRange(r.i, x + 1);
        for (let k = 0; k <= x; k++) setV(k, memory.read(r.i + k));
        if (q.memoryIncrementsI) r.i = r.i + x + 1;
      },
    };
  }
}
