export { Stopwatch } from "./stopwatch";
export type { StopwatchOptions } from "./stopwatch";
export { createMonotonicClock, monotonicNowMs } from "./util/clock";
export type { MonotonicClock, NowMs } from "./util/clock";
export { formatMs, parseDurationToMs } from "./util/duration";
export { runLapSession } from "./session/lapSession";
export type { LapSessionEndReason, LapSessionOptions, LapSessionResult, SplitEvent } from "./session/lapSession";
