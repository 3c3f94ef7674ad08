import readline from "node:readline";

import { Stopwatch } from "../stopwatch";
import type { NowMs } from "../util/clock";
import { assertTimerDelayMs } from "../util/duration";

export type LapSessionEndReason = "eof" | "duration" | "aborted";

export interface SplitEvent {
  index: number;
  /** Cumulative from start. */
  elapsedMs: number;
  /** Since the previous split, or since start for the first one. */
  lapMs: number;
  label?: string;
}

export interface LapSessionOptions {
  input: NodeJS.ReadableStream;
  durationMs?: number;
  signal?: AbortSignal;
  nowMs?: NowMs;
  onSplit?: (split: SplitEvent) => void;
}

export interface LapSessionResult {
  splits: SplitEvent[];
  elapsedMs: number;
  rendered: string;
  reason: LapSessionEndReason;
}

export async function runLapSession(opts: LapSessionOptions): Promise<LapSessionResult> {
  if (opts.durationMs !== undefined) assertTimerDelayMs(opts.durationMs, "durationMs");

  const sw = Stopwatch.startNew({ nowMs: opts.nowMs });
  const splits: SplitEvent[] = [];

  return await new Promise<LapSessionResult>((resolve, reject) => {
    let ended = false;
    let reason: LapSessionEndReason = "eof";
    let durationTimer: NodeJS.Timeout | undefined;

    const rl = readline.createInterface({ input: opts.input, terminal: false });

    const end = (why: LapSessionEndReason) => {
      if (ended) return;
      reason = why;
      rl.close();
    };
    const onAbort = () => end("aborted");

    rl.on("line", (line: string) => {
      if (ended) return;
      const elapsedMs = sw.split();
      if (elapsedMs === undefined) return;

      const previous = splits.length ? splits[splits.length - 1].elapsedMs : 0;
      const label = line.trim();
      const split: SplitEvent = { index: splits.length + 1, elapsedMs, lapMs: elapsedMs - previous };
      if (label) split.label = label;

      splits.push(split);
      opts.onSplit?.(split);
    });

    const settle = () => {
      ended = true;
      if (durationTimer) clearTimeout(durationTimer);
      opts.signal?.removeEventListener("abort", onAbort);
      return sw.stop();
    };

    rl.once("close", () => {
      if (ended) return;
      const elapsedMs = settle();
      resolve({ splits, elapsedMs, rendered: sw.toString(), reason });
    });

    // readline re-emits input stream errors here.
    rl.on("error", (err: Error) => {
      if (ended) return;
      settle();
      rl.close();
      reject(err);
    });

    if (opts.durationMs !== undefined) {
      durationTimer = setTimeout(() => end("duration"), opts.durationMs);
    }

    if (opts.signal?.aborted) {
      end("aborted");
    } else {
      opts.signal?.addEventListener("abort", onAbort, { once: true });
    }
  });
}
