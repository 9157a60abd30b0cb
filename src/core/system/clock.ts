import { TIMER_HZ } from '@core/timers/timers';
import type { Chip8System, RunState } from './system';

export interface AdvanceResult {
  cycles: number;     // instructions actually executed
  timerTicks: number; // 60 Hz ticks applied to the timers
  state: RunState;
  stopped: boolean;
}

// Cooperative scheduler multiplexing the instruction clock and the 60 Hz timer clock
// onto one wall-clock source. Fractional units carry over between calls.
export class Clock {
  private cycleDebt = 0;
  private timerDebt = 0;
  private _stopped = false;
  private cycleHook: ((sys: Chip8System) => void) | null = null;

  constructor(private readonly sys: Chip8System) {}

  get stopped(): boolean { return this._stopped; }

  // Called after every stepCycle() the clock issues (render/input pumps, stop checks)
  setCycleHook(fn: ((sys: Chip8System) => void) | null) { this.cycleHook = fn; }

  // Takes effect before the next instruction; never interrupts one.
  stop(): void { this._stopped = true; }

  start(): void {
    this._stopped = false;
    this.reset();
  }

  reset(): void {
    this.cycleDebt = 0;
    this.timerDebt = 0;
  }

  advance(elapsedMs: number): AdvanceResult {
    const result: AdvanceResult = { cycles: 0, timerTicks: 0, state: this.sys.state, stopped: this._stopped };
    if (this._stopped || this.sys.state === 'idle') return result;
    if (!Number.isFinite(elapsedMs) || elapsedMs <= 0) return result;

    const { cyclesPerSecond, maxCyclesPerAdvance } = this.sys.config;
    this.cycleDebt += (elapsedMs * cyclesPerSecond) / 1000;
    this.timerDebt += (elapsedMs * TIMER_HZ) / 1000;

    let cycles = Math.floor(this.cycleDebt);
    let ticks = Math.floor(this.timerDebt);
    this.cycleDebt -= cycles;
    this.timerDebt -= ticks;
    // Catch-up after a long pause is bounded; the excess instructions and the
    // ticks owed for them are dropped, not deferred
    if (cycles > maxCyclesPerAdvance) {
      cycles = maxCyclesPerAdvance;
      ticks = Math.min(ticks, Math.ceil((maxCyclesPerAdvance * TIMER_HZ) / cyclesPerSecond));
    }

    const startCycles = this.sys.cycles;
    let ticked = 0;
    let applied = 0;
    const tick = () => {
      if (this.sys.tickTimers()) applied++;
      ticked++;
    };
    for (let c = 0; c < cycles; c++) {
      if (this._stopped) break;
      // Ticks land at their wall-time position among the instructions
      const due = Math.floor((c * ticks) / cycles);
      while (ticked < due) tick();
      this.sys.stepCycle();
      if (this.cycleHook) this.cycleHook(this.sys);
    }
    if (!this._stopped) {
      while (ticked < ticks) tick();
    } else {
      this.reset();
    }

    result.cycles = this.sys.cycles - startCycles;
    result.timerTicks = applied;
    result.state = this.sys.state;
    result.stopped = this._stopped;
    return result;
  }
}
