import type { Diagnostic } from "./errors.js";

export type OutputFormat = "human" | "jsonl";

export type LineSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

/**
 * Console reporter. Progress goes to stdout, errors to stderr, as plain text
 * or one JSON diagnostic per line.
 */
export type Reporter = {
  info: (d: Omit<Diagnostic, "level">) => void;
  error: (d: Omit<Diagnostic, "level">) => void;
};

export const processSink: LineSink = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

export function formatHuman(d: Diagnostic): string {
  return d.level === "error" && d.stage ? `${d.stage}: ${d.message}` : d.message;
}

export function createReporter(format: OutputFormat, sink: LineSink = processSink): Reporter {
  const emit = (d: Diagnostic, write: (line: string) => void) => {
    write(format === "jsonl" ? JSON.stringify(d) : formatHuman(d));
  };
  return {
    info: (d) => emit({ level: "info", ...d }, sink.out),
    error: (d) => emit({ level: "error", ...d }, sink.err),
  };
}

/** Reporter that drops everything. */
export const silentReporter: Reporter = {
  info: () => {},
  error: () => {},
};
