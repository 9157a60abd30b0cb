import { describe, it, expect } from 'vitest';
import { runRom } from '@core/harness/headless';
import { program } from '../helpers/chip8h';

describe('headless runRom', () => {
  it('runs the requested number of frames on virtual time', () => {
    const res = runRom(program([0x1200]), { frames: 10, config: { cyclesPerSecond: 600 } });
    expect(res.reason).toBe('timeout');
    expect(res.frames).toBe(10);
    expect(res.cycles).toBe(100);
    expect(res.state).toBe('running');
  });

  it('stops at the first fault', () => {
    const res = runRom(program([0x6001, 0x5001]), { frames: 10 });
    expect(res.reason).toBe('fault');
    expect(res.frames).toBe(1);
    expect(res.fault).toMatchObject({ kind: 'UnknownOpcode', pc: 0x202, opcode: 0x5001 });
    expect(res.message).toBe('Unknown opcode 0x5001');
  });

  it('can stop once the program blocks on a key', () => {
    const res = runRom(program([0xF00A]), { frames: 10, stopOnKeyWait: true });
    expect(res.reason).toBe('waiting');
    expect(res.cycles).toBe(1);
  });

  it('holds the given keys for the whole run', () => {
    const rom = program([0xE09E, 0x1202, 0x5001]);
    expect(runRom(rom, { frames: 3 }).reason).toBe('timeout');
    const pressed = runRom(rom, { frames: 3, keys: [0] });
    expect(pressed.reason).toBe('fault');
    expect(pressed.fault?.pc).toBe(0x204);
  });

  it('draws into the framebuffer', () => {
    // Draw "0" at (0,0) then spin
    const res = runRom(program([0xA050, 0xD005, 0x1204]), { frames: 1 });
    expect(res.sys.screenAscii().split('\n').slice(0, 5)).toEqual([
      '####' + '.'.repeat(60),
      '#..#' + '.'.repeat(60),
      '#..#' + '.'.repeat(60),
      '#..#' + '.'.repeat(60),
      '####' + '.'.repeat(60),
    ]);
  });
});
