import type { NowMs } from "./util/clock";
import { monotonicNowMs } from "./util/clock";
import { formatMs } from "./util/duration";

export interface StopwatchOptions {
  /**
   * Monotonic time source in milliseconds. Defaults to the process hrtime clock.
   * A clock that steps backwards yields negative `elapsedMs`, which renders as `0ms`.
   */
  nowMs?: NowMs;
}

/**
 * Elapsed-time measurement over a monotonic clock.
 *
 * Running iff `startTime` is set. `elapsedMs` is refreshed only by `stop()` and
 * `split()`, and each `start()` zeroes it: durations do not accumulate across
 * start/stop cycles.
 */
export class Stopwatch {
  private readonly nowMs: NowMs;

  private startedAt?: number;
  private splitAt?: number;
  private elapsed = 0;

  constructor(opts: StopwatchOptions = {}) {
    this.nowMs = opts.nowMs ?? monotonicNowMs;
  }

  static startNew(opts: StopwatchOptions = {}): Stopwatch {
    const sw = new Stopwatch(opts);
    sw.start();
    return sw;
  }

  get startTime(): number | undefined {
    return this.startedAt;
  }

  get lastSplit(): number | undefined {
    return this.splitAt;
  }

  get elapsedMs(): number {
    return this.elapsed;
  }

  get isRunning(): boolean {
    return this.startedAt !== undefined;
  }

  start(): void {
    this.startedAt = this.nowMs();
    this.splitAt = undefined;
    this.elapsed = 0;
  }

  /**
   * Halts timing and returns the measured duration.
   * Returns 0 without touching state when not running; check `isRunning` first
   * to tell that apart from a near-instant measurement.
   */
  stop(): number {
    if (this.startedAt === undefined) return 0;
    this.elapsed = this.nowMs() - this.startedAt;
    this.startedAt = undefined;
    this.splitAt = undefined;
    return this.elapsed;
  }

  reset(): void {
    this.startedAt = undefined;
    this.splitAt = undefined;
    this.elapsed = 0;
  }

  restart(): void {
    this.reset();
    this.start();
  }

  /** Elapsed time since start, without stopping. `undefined` when not running. */
  split(): number | undefined {
    if (this.startedAt === undefined) return undefined;
    const now = this.nowMs();
    this.splitAt = now;
    this.elapsed = now - this.startedAt;
    return this.elapsed;
  }

  clone(): Stopwatch {
    const copy = new Stopwatch({ nowMs: this.nowMs });
    copy.startedAt = this.startedAt;
    copy.splitAt = this.splitAt;
    copy.elapsed = this.elapsed;
    return copy;
  }

  toString(): string {
    return formatMs(Number.isFinite(this.elapsed) && this.elapsed > 0 ? this.elapsed : 0);
  }
}
