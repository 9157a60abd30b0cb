import { describe, it, expect } from 'vitest';
import { Chip8System } from '@core/system/system';
import { MAX_ROM_SIZE } from '@core/bus/memory';
import { program, steps, systemWithProgram, thrownKind } from '../helpers/chip8h';

describe('Chip8System lifecycle', () => {
  it('starts idle and ignores cycles until a ROM is loaded', () => {
    const sys = new Chip8System();
    expect(sys.state).toBe('idle');
    expect(sys.stepCycle()).toBe('idle');
    sys.tickTimers();
    expect(sys.cycles).toBe(0);
    sys.load(program([0x00E0]));
    expect(sys.state).toBe('running');
  });

  it('halts on the 17th nested call with StackOverflow', () => {
    const sys = systemWithProgram([0x2200]);
    steps(sys, 16);
    expect(sys.state).toBe('running');
    expect(sys.registers().sp).toBe(16);
    expect(sys.stepCycle()).toBe('halted');
    expect(sys.fault).toEqual({
      kind: 'StackOverflow',
      message: 'Call stack is full (16 entries) pushing 0x0202',
      pc: 0x200,
      opcode: 0x2200,
    });
    expect(sys.cycles).toBe(16);
  });

  it('halts on an unknown opcode and reports the raw word', () => {
    const sys = systemWithProgram([0x6001, 0x5001]);
    steps(sys, 2);
    expect(sys.state).toBe('halted');
    expect(sys.fault).toEqual({ kind: 'UnknownOpcode', message: 'Unknown opcode 0x5001', pc: 0x202, opcode: 0x5001 });
  });

  it('halts when PC runs off the end of memory', () => {
    const sys = systemWithProgram([0x1FFF]);
    steps(sys, 2);
    expect(sys.state).toBe('halted');
    expect(sys.fault).toMatchObject({ kind: 'OutOfBounds', pc: 0xFFF, opcode: null });
  });

  it('stays halted: further cycles and timer ticks do nothing', () => {
    const sys = systemWithProgram([0x6005, 0xF015, 0x5001]);
    steps(sys, 3);
    expect(sys.state).toBe('halted');
    const regs = sys.registers();
    expect(sys.stepCycle()).toBe('halted');
    sys.tickTimers();
    expect(sys.registers()).toEqual(regs);
    expect(sys.delayTimer).toBe(5);
  });

  it('load after a halt starts over from a clean machine', () => {
    const sys = systemWithProgram([0x6A07, 0xA050, 0xD005, 0x6003, 0xF018, 0x5001]);
    sys.setKey(4, true);
    steps(sys, 6);
    expect(sys.state).toBe('halted');
    sys.load(program([0x00E0]));
    expect(sys.state).toBe('running');
    expect(sys.fault).toBeNull();
    expect(sys.cycles).toBe(0);
    const r = sys.registers();
    expect(r.pc).toBe(0x200);
    expect(r.v.every((v) => v === 0)).toBe(true);
    expect(sys.framebuffer().every((p) => p === 0)).toBe(true);
    expect(sys.soundActive()).toBe(false);
    expect(sys.isKeyDown(4)).toBe(false);
  });

  it('rejects an oversized ROM and keeps the loaded program', () => {
    const sys = systemWithProgram([0x6A07]);
    expect(thrownKind(() => sys.load(new Uint8Array(MAX_ROM_SIZE + 1)))).toBe('CapacityExceeded');
    expect(sys.state).toBe('running');
    sys.stepCycle();
    expect(sys.registers().v[0xA]).toBe(7);
  });

  it('instances do not share state', () => {
    const a = systemWithProgram([0x6A01]);
    const b = systemWithProgram([0x6A02]);
    a.stepCycle();
    b.stepCycle();
    expect(a.registers().v[0xA]).toBe(1);
    expect(b.registers().v[0xA]).toBe(2);
  });

  it('framebuffer copies are not written back', () => {
    const sys = systemWithProgram([0x00E0]);
    const fb = sys.framebuffer();
    fb.fill(1);
    expect(sys.framebuffer().every((p) => p === 0)).toBe(true);
  });
});
