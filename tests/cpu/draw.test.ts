import { describe, it, expect } from 'vitest';
import { DISPLAY_WIDTH } from '@core/display/display';
import { steps, systemWithProgram } from '../helpers/chip8h';

const lit = (fb: Uint8Array) => fb.reduce((n, p) => n + p, 0);
const px = (fb: Uint8Array, x: number, y: number) => fb[y * DISPLAY_WIDTH + x];

describe('DXYN / 00E0', () => {
  it('draws a font glyph and reports no collision on a blank screen', () => {
    const sys = systemWithProgram([0x6000, 0x6100, 0xA050, 0xD015]);
    steps(sys, 4);
    const fb = sys.framebuffer();
    expect(lit(fb)).toBe(14);
    expect([px(fb, 0, 0), px(fb, 1, 0), px(fb, 2, 0), px(fb, 3, 0), px(fb, 4, 0)]).toEqual([1, 1, 1, 1, 0]);
    expect([px(fb, 0, 1), px(fb, 1, 1), px(fb, 3, 1)]).toEqual([1, 0, 1]);
    expect(sys.registers().v[0xF]).toBe(0);
  });

  it('drawing the same sprite twice erases it and sets VF', () => {
    const sys = systemWithProgram([0x6000, 0x6100, 0xA050, 0xD015, 0xD015]);
    steps(sys, 5);
    expect(lit(sys.framebuffer())).toBe(0);
    expect(sys.registers().v[0xF]).toBe(1);
  });

  it('wraps pixels around the right and bottom edges', () => {
    // "0" glyph rows F0, 90 at (62, 31)
    const sys = systemWithProgram([0x603E, 0x611F, 0xA050, 0xD012]);
    steps(sys, 4);
    const fb = sys.framebuffer();
    expect([px(fb, 62, 31), px(fb, 63, 31), px(fb, 0, 31), px(fb, 1, 31)]).toEqual([1, 1, 1, 1]);
    expect([px(fb, 62, 0), px(fb, 63, 0), px(fb, 0, 0), px(fb, 1, 0)]).toEqual([1, 0, 0, 1]);
    expect(lit(fb)).toBe(6);
  });

  it('reduces the start coordinate modulo the screen size', () => {
    const sys = systemWithProgram([0x6042, 0x6122, 0xA055, 0xD011]);
    steps(sys, 4);
    const fb = sys.framebuffer();
    // "1" glyph row 0 = 0x20 -> column 2 of the sprite; start (66 % 64, 34 % 32) = (2, 2)
    expect(px(fb, 4, 2)).toBe(1);
    expect(lit(fb)).toBe(1);
  });

  it('DXY0 draws nothing and clears VF', () => {
    const sys = systemWithProgram([0x6F01, 0xA050, 0xD010]);
    steps(sys, 3);
    expect(lit(sys.framebuffer())).toBe(0);
    expect(sys.registers().v[0xF]).toBe(0);
  });

  it('halts when sprite data lies past the end of memory', () => {
    const sys = systemWithProgram([0xAFFE, 0xD003]);
    steps(sys, 2);
    expect(sys.state).toBe('halted');
    expect(sys.fault?.kind).toBe('OutOfBounds');
    expect(lit(sys.framebuffer())).toBe(0);
  });

  it('a ROM of just 00E0 leaves PC at 0x202 and the screen dark', () => {
    const sys = systemWithProgram([0x00E0]);
    sys.stepCycle();
    expect(sys.registers().pc).toBe(0x202);
    expect(lit(sys.framebuffer())).toBe(0);
  });

  it('00E0 clears what was drawn', () => {
    const sys = systemWithProgram([0xA050, 0xD005, 0x00E0]);
    steps(sys, 2);
    expect(lit(sys.framebuffer())).toBe(14);
    sys.stepCycle();
    expect(lit(sys.framebuffer())).toBe(0);
  });
});
