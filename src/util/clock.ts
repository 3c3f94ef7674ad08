export type NowMs = () => number;

export interface MonotonicClock {
  /** hrtime reading that `nowMs()` counts from. */
  readonly originHr: bigint;
  readonly nowMs: NowMs;
}

export function hrDeltaMs(fromHr: bigint, toHr: bigint): number {
  return Number(toHr - fromHr) / 1e6;
}

export function createMonotonicClock(originHr: bigint = process.hrtime.bigint()): MonotonicClock {
  return {
    originHr,
    nowMs: () => hrDeltaMs(originHr, process.hrtime.bigint()),
  };
}

const processClock = createMonotonicClock();

/** Milliseconds on a steady clock shared by the whole process. */
export const monotonicNowMs: NowMs = () => processClock.nowMs();
