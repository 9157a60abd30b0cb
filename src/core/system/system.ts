import { Memory } from '@core/bus/memory';
import { Chip8CPU, type Machine } from '@core/cpu/cpu';
import type { Instruction } from '@core/cpu/decode';
import { RegisterFile } from '@core/cpu/registers';
import type { RegisterState, Word } from '@core/cpu/types';
import { Display } from '@core/display/display';
import { formatHex, isChip8Error, type Chip8Error, type Chip8ErrorKind } from '@core/errors';
import { Keypad } from '@core/input/keypad';
import { Timers } from '@core/timers/timers';
import { makeConfig, type Chip8Config, type ConfigOverrides } from './config';
import { trace, traceEnabled } from '@utils/trace';

export type RunState = 'idle' | 'running' | 'waitingForKey' | 'halted';

export interface Fault {
  kind: Chip8ErrorKind;
  message: string;
  pc: Word;
  opcode: Word | null;
}

const emptyMachine = (): Machine => ({
  memory: new Memory(),
  registers: new RegisterFile(),
  timers: new Timers(),
  keypad: new Keypad(),
  display: new Display(),
});

export class Chip8System {
  readonly config: Chip8Config;
  private m: Machine = emptyMachine();
  private cpu: Chip8CPU;
  private _state: RunState = 'idle';
  private _fault: Fault | null = null;
  private _cycles = 0;
  private readonly traceCpu: boolean;
  private readonly traceSystem: boolean;

  // Accepts a full Chip8Config as well as partial overrides
  constructor(config: ConfigOverrides = {}) {
    this.config = makeConfig(config);
    this.traceCpu = traceEnabled('TRACE_CPU');
    this.traceSystem = traceEnabled('TRACE_SYSTEM');
    this.cpu = this.makeCpu();
  }

  get state(): RunState { return this._state; }
  get fault(): Fault | null { return this._fault; }
  // Instructions executed since the last load
  get cycles(): number { return this._cycles; }

  // Replace all machine state with a fresh instance holding `rom`.
  // An oversized ROM throws CapacityExceeded and leaves the current machine untouched.
  load(rom: Uint8Array): void {
    const m = emptyMachine();
    m.memory.load(rom);
    this.m = m;
    this.cpu = this.makeCpu();
    this._fault = null;
    this._cycles = 0;
    this.transition('running');
    if (this.traceSystem) trace('system', `loaded ${rom.length} bytes`);
  }

  // Execute one instruction. Does nothing unless running; faults halt the machine.
  stepCycle(): RunState {
    if (this._state !== 'running') return this._state;
    const pc = this.m.registers.pc;
    try {
      this.cpu.step();
      this._cycles++;
    } catch (e) {
      if (!isChip8Error(e)) throw e;
      this.halt(e, pc);
      return this._state;
    }
    if (this.m.keypad.waiting) this.transition('waitingForKey');
    return this._state;
  }

  // One 60 Hz timer tick. Timers keep running while waiting for a key.
  // Returns false when the tick was not applied (idle or halted).
  tickTimers(): boolean {
    if (this._state !== 'running' && this._state !== 'waitingForKey') return false;
    this.m.timers.tick();
    return true;
  }

  setKey(key: number, down: boolean): void {
    const pressed = this.m.keypad.setKey(key, down);
    if (!pressed || this._state !== 'waitingForKey') return;
    const { keypad, registers } = this.m;
    registers.setV(keypad.waitRegister, key);
    keypad.endWait();
    registers.pc += 2;
    this.transition('running');
  }

  isKeyDown(key: number): boolean { return this.m.keypad.isDown(key); }

  framebuffer(): Uint8Array { return this.m.display.snapshot(); }
  screenAscii(): string { return this.m.display.toAscii(); }
  soundActive(): boolean { return this.m.timers.soundActive(); }
  get delayTimer(): number { return this.m.timers.delay; }
  get soundTimer(): number { return this.m.timers.sound; }
  registers(): RegisterState { return this.m.registers.snapshot(); }
  dumpMemory(start?: number, length?: number): Uint8Array { return this.m.memory.dump(start, length); }

  private makeCpu(): Chip8CPU {
    const cpu = new Chip8CPU(this.m, { quirks: this.config.quirks, random: this.config.random });
    if (this.traceCpu) {
      cpu.setTraceHook((pc: Word, ins: Instruction) => trace('cpu', `pc=${formatHex(pc, 4)} op=${formatHex(ins.word, 4)} ${ins.op}`));
    }
    return cpu;
  }

  private halt(e: Chip8Error, pc: Word): void {
    let opcode: Word | null = e.opcode ?? null;
    if (opcode === null) {
      try { opcode = this.m.memory.readWord(pc); } catch { opcode = null; }
    }
    this._fault = { kind: e.kind, message: e.message, pc, opcode };
    this.transition('halted');
    if (this.traceSystem) trace('system', `halted at pc=${formatHex(pc, 4)}: ${e.message}`);
  }

  private transition(next: RunState): void {
    if (this.traceSystem && next !== this._state) trace('system', `${this._state} -> ${next}`);
    this._state = next;
  }
}
