import { Command } from "commander";

import { runLapSession } from "../session/lapSession";
import type { LapSessionResult, SplitEvent } from "../session/lapSession";
import type { NowMs } from "../util/clock";
import { formatMs, parseDurationToMs } from "../util/duration";

const OUTPUT_FORMATS = ["text", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface ProgramIo {
  input: NodeJS.ReadableStream;
  write: (text: string) => void;
  nowMs?: NowMs;
}

interface LapOptions {
  duration?: string;
  format: string;
}

const defaultIo: ProgramIo = {
  input: process.stdin,
  write: (text) => {
    process.stdout.write(text);
  },
};

function parseChoiceOption<T extends string>(
  cmd: Command,
  flag: string,
  raw: unknown,
  allowed: readonly T[],
): T {
  const text = String(raw ?? "").toLowerCase();
  for (const v of allowed) {
    if (text === v.toLowerCase()) return v;
  }
  cmd.error(`Invalid value for ${flag}: ${JSON.stringify(String(raw))} (expected ${allowed.map((a) => JSON.stringify(a)).join(" or ")})`);
}

export function formatSplitLine(split: SplitEvent, format: OutputFormat): string {
  if (format === "json") return `${JSON.stringify(split)}\n`;
  const label = split.label ? ` ${split.label}` : "";
  return `#${split.index} ${formatMs(split.elapsedMs)} (+${formatMs(split.lapMs)})${label}\n`;
}

export function formatTotalLine(result: LapSessionResult, format: OutputFormat): string {
  if (format === "json") return `${JSON.stringify({ total: result.elapsedMs, reason: result.reason })}\n`;
  return `total ${result.rendered}\n`;
}

async function lapAction(io: ProgramIo, options: LapOptions, cmdObj: Command): Promise<void> {
  let durationMs: number | undefined;
  try {
    durationMs = options.duration ? parseDurationToMs(String(options.duration)) : undefined;
  } catch (err) {
    cmdObj.error(`Invalid value for --duration: ${JSON.stringify(String(options.duration))} (${err instanceof Error ? err.message : String(err)})`);
  }

  const format = parseChoiceOption(cmdObj, "--format", options.format, OUTPUT_FORMATS);

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    const result = await runLapSession({
      input: io.input,
      durationMs,
      signal: controller.signal,
      nowMs: io.nowMs,
      onSplit: (split) => io.write(formatSplitLine(split, format)),
    });
    io.write(formatTotalLine(result, format));
    if (result.reason === "duration") {
      // eslint-disable-next-line no-console
      console.error(`Duration reached (${durationMs}ms); stopwatch stopped.`);
    }
  } finally {
    process.off("SIGINT", onSigint);
  }
}

export function createProgram(io: ProgramIo = defaultIo): Command {
  const program = new Command();
  program
    .name("stopwatch")
    .description("Lap timer: each line on stdin records a split; EOF, --duration or Ctrl+C stops it")
    .option("--duration <duration>", "Auto-stop after duration (e.g. 90s, 5m)")
    .option("--format <format>", "Output format: text|json", "text")
    .action((options: LapOptions, cmdObj: Command) => lapAction(io, options, cmdObj));

  return program;
}
