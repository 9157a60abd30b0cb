import type { Byte } from '@core/cpu/types';

export const TIMER_HZ = 60;

const clamp = (v: number): Byte => Math.max(0, Math.min(0xFF, v | 0));

// Delay and sound counters, decremented once per 60 Hz tick and floored at 0.
export class Timers {
  private _delay: Byte = 0;
  private _sound: Byte = 0;

  get delay(): Byte { return this._delay; }
  get sound(): Byte { return this._sound; }

  setDelay(value: number): void { this._delay = clamp(value); }
  setSound(value: number): void { this._sound = clamp(value); }

  tick(): void {
    if (this._delay > 0) this._delay--;
    if (this._sound > 0) this._sound--;
  }

  soundActive(): boolean { return this._sound !== 0; }
}
