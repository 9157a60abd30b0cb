import { Chip8System, type Fault, type RunState } from '@core/system/system';
import { Clock } from '@core/system/clock';
import type { ConfigOverrides } from '@core/system/config';
import { TIMER_HZ } from '@core/timers/timers';

export interface RunResult {
  cycles: number;
  frames: number;
  reason: 'timeout' | 'fault' | 'waiting';
  state: RunState;
  fault?: Fault;
  message?: string;
  sys: Chip8System;
}

export interface RunOptions {
  // Number of 60 Hz frames of virtual time to run
  frames: number;
  config?: ConfigOverrides;
  // Stop early once the program blocks on FX0A
  stopOnKeyWait?: boolean;
  // Keys held down for the whole run
  keys?: number[];
}

// Run a ROM on virtual time, one 1/60 s slice per frame, without any host.
export function runRom(rom: Uint8Array, opts: RunOptions): RunResult {
  const sys = new Chip8System(opts.config);
  sys.load(rom);
  for (const k of opts.keys ?? []) sys.setKey(k, true);
  const clock = new Clock(sys);
  const frameMs = 1000 / TIMER_HZ;

  let frames = 0;
  while (frames < opts.frames) {
    clock.advance(frameMs);
    frames++;
    if (sys.state === 'halted') {
      return { cycles: sys.cycles, frames, reason: 'fault', state: sys.state, fault: sys.fault ?? undefined, message: sys.fault?.message, sys };
    }
    if (opts.stopOnKeyWait && sys.state === 'waitingForKey') {
      return { cycles: sys.cycles, frames, reason: 'waiting', state: sys.state, sys };
    }
  }
  return { cycles: sys.cycles, frames, reason: 'timeout', state: sys.state, sys };
}
