/** Largest delay `setTimeout` honours; anything above fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/** Throws unless `ms` is usable as a timer delay: finite, > 0 and within the timer limit. */
export function assertTimerDelayMs(ms: number, name: string): void {
  if (!Number.isFinite(ms) || ms <= 0 || ms > MAX_TIMER_DELAY_MS) {
    throw new Error(`Invalid ${name}: ${ms} (must be > 0 and <= ${MAX_TIMER_DELAY_MS}ms)`);
  }
}

/**
 * `<number>[ms|s|m|h]`, unit defaulting to ms. The result is always a valid timer
 * delay, so `0` and anything past ~24.8 days are rejected.
 */
export function parseDurationToMs(input: string): number {
  const trimmed = input.trim();
  if (!trimmed) throw new Error("Duration is empty");

  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/i.exec(trimmed);
  if (!match) throw new Error(`Invalid duration: ${input}`);

  const ms = Number(match[1]) * UNIT_MS[(match[2] ?? "ms").toLowerCase()];
  assertTimerDelayMs(ms, "duration");
  return ms;
}

/** Whole milliseconds, truncated, with a literal `ms` suffix: `1500ms`. */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) throw new Error(`Invalid duration ms: ${ms}`);
  return `${Math.floor(ms)}ms`;
}
