// Interpretations of the opcodes that CHIP-8 interpreters historically disagree on.
export interface Quirks {
  // 8XY6/8XYE shift VY into VX (COSMAC VIP) instead of shifting VX in place
  shiftUsesVy: boolean;
  // FX55/FX65 leave I pointing past the last register transferred
  memoryIncrementsI: boolean;
  // 8XY1/8XY2/8XY3 clear VF
  logicResetsVf: boolean;
}

export type RandomByte = () => number;

export interface Chip8Config {
  cyclesPerSecond: number;
  // Upper bound on instructions drained by a single Clock.advance() call
  maxCyclesPerAdvance: number;
  quirks: Quirks;
  random: RandomByte;
}

export const DEFAULT_CYCLES_PER_SECOND = 700;
export const DEFAULT_MAX_CYCLES_PER_ADVANCE = 10_000;

export const DEFAULT_QUIRKS: Readonly<Quirks> = {
  shiftUsesVy: false,
  memoryIncrementsI: false,
  logicResetsVf: false,
};

export const mathRandomByte: RandomByte = () => Math.floor(Math.random() * 256) & 0xFF;

export type ConfigOverrides = Partial<Omit<Chip8Config, 'quirks'>> & { quirks?: Partial<Quirks> };

export function makeConfig(overrides: ConfigOverrides = {}): Chip8Config {
  const cyclesPerSecond = overrides.cyclesPerSecond ?? DEFAULT_CYCLES_PER_SECOND;
  if (!(cyclesPerSecond > 0) || !Number.isFinite(cyclesPerSecond)) {
    throw new Error(`cyclesPerSecond must be a positive number, got ${cyclesPerSecond}`);
  }
  const maxCyclesPerAdvance = overrides.maxCyclesPerAdvance ?? DEFAULT_MAX_CYCLES_PER_ADVANCE;
  if (!Number.isInteger(maxCyclesPerAdvance) || maxCyclesPerAdvance <= 0) {
    throw new Error(`maxCyclesPerAdvance must be a positive integer, got ${maxCyclesPerAdvance}`);
  }
  return {
    cyclesPerSecond,
    maxCyclesPerAdvance,
    quirks: { ...DEFAULT_QUIRKS, ...overrides.quirks },
    random: overrides.random ?? mathRandomByte,
  };
}

type Env = Record<string, string | undefined>;

const positiveNumber = (raw: string | undefined): number | undefined => {
  if (!raw || !/^\d+(\.\d+)?$/.test(raw.trim())) return undefined;
  const v = parseFloat(raw);
  return v > 0 ? v : undefined;
};

const flag = (raw: string | undefined): boolean | undefined => {
  if (raw === undefined || raw === '') return undefined;
  const v = raw.toLowerCase();
  return v === '1' || v === 'true' || v === 'on';
};

// CHIP8_CPS, CHIP8_MAX_CATCHUP, CHIP8_QUIRK_SHIFT=vy, CHIP8_QUIRK_MEMORY=1, CHIP8_QUIRK_VF_RESET=1.
// Unparseable numbers fall back to the defaults.
export function configFromEnv(env: Env = process.env, overrides: ConfigOverrides = {}): Chip8Config {
  const cps = positiveNumber(env.CHIP8_CPS);
  const catchup = positiveNumber(env.CHIP8_MAX_CATCHUP);
  const shift = env.CHIP8_QUIRK_SHIFT?.toLowerCase();
  const quirks: Partial<Quirks> = {};
  if (shift === 'vy' || shift === 'vx') quirks.shiftUsesVy = shift === 'vy';
  const memory = flag(env.CHIP8_QUIRK_MEMORY);
  if (memory !== undefined) quirks.memoryIncrementsI = memory;
  const vfReset = flag(env.CHIP8_QUIRK_VF_RESET);
  if (vfReset !== undefined) quirks.logicResetsVf = vfReset;
  return makeConfig({
    cyclesPerSecond: cps,
    maxCyclesPerAdvance: catchup !== undefined ? Math.max(1, Math.floor(catchup)) : undefined,
    ...overrides,
    quirks: { ...quirks, ...overrides.quirks },
  });
}
