import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";

import { runLapSession } from "../src/session/lapSession";
import type { SplitEvent } from "../src/session/lapSession";

// Each read advances 100ms: start=0, then 100, 200, ...
function steppingClock(stepMs = 100): () => number {
  let now = -stepMs;
  return () => (now += stepMs);
}

describe("runLapSession", () => {
  it("records a split per line and stops at end of input", async () => {
    const input = new PassThrough();
    const seen: SplitEvent[] = [];

    const pending = runLapSession({ input, nowMs: steppingClock(), onSplit: (s) => seen.push(s) });
    input.end("lap one\n\n");
    const result = await pending;

    expect(result.splits).toEqual([
      { index: 1, elapsedMs: 100, lapMs: 100, label: "lap one" },
      { index: 2, elapsedMs: 200, lapMs: 100 },
    ]);
    expect(seen).toEqual(result.splits);
    expect(result.elapsedMs).toBe(300);
    expect(result.rendered).toBe("300ms");
    expect(result.reason).toBe("eof");
  });

  it("stops when the duration elapses", async () => {
    const input = new PassThrough();
    const result = await runLapSession({ input, durationMs: 20, nowMs: steppingClock() });

    expect(result.splits).toEqual([]);
    expect(result.elapsedMs).toBe(100);
    expect(result.reason).toBe("duration");
  });

  it("stops on abort and ignores later lines", async () => {
    const input = new PassThrough();
    const controller = new AbortController();

    const pending = runLapSession({
      input,
      signal: controller.signal,
      nowMs: steppingClock(),
      onSplit: () => controller.abort(),
    });
    input.write("go\nignored\n");
    const result = await pending;

    expect(result.splits).toEqual([{ index: 1, elapsedMs: 100, lapMs: 100, label: "go" }]);
    expect(result.elapsedMs).toBe(200);
    expect(result.reason).toBe("aborted");
  });

  it("ends immediately with an already-aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runLapSession({ input: new PassThrough(), signal: controller.signal, nowMs: steppingClock() });
    expect(result.splits).toEqual([]);
    expect(result.elapsedMs).toBe(100);
    expect(result.reason).toBe("aborted");
  });

  it("rejects invalid durations before starting", async () => {
    await expect(runLapSession({ input: new PassThrough(), durationMs: 0 })).rejects.toThrow(/durationMs/);
    await expect(runLapSession({ input: new PassThrough(), durationMs: Number.NaN })).rejects.toThrow(/durationMs/);
  });

  it("rejects durations past the timer limit instead of ending at once", async () => {
    await expect(runLapSession({ input: new PassThrough(), durationMs: 2_160_000_000 })).rejects.toThrow(
      "Invalid durationMs: 2160000000 (must be > 0 and <= 2147483647ms)",
    );
  });

  it("rejects when the input stream fails", async () => {
    const input = new PassThrough();
    const pending = runLapSession({ input, durationMs: 60_000, nowMs: steppingClock() });
    input.destroy(new Error("stdin broke"));

    await expect(pending).rejects.toThrow("stdin broke");
  });
});
