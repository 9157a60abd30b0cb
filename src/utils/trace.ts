// Env-gated diagnostic logging: `TRACE_CPU=1`, `TRACE_SYSTEM=1`, ...
type Env = Record<string, string | undefined>;

const processEnv = (): Env | undefined => (typeof process !== 'undefined' ? process.env : undefined);

export function traceEnabled(flag: string, env: Env | undefined = processEnv()): boolean {
  const v = env?.[flag];
  return v === '1' || v === 'true';
}

export function trace(tag: string, message: string): void {
  // eslint-disable-next-line no-console
  console.log(`[${tag}] ${message}`);
}
