import type { Logger, LogLevel } from "@trellis/core";

export interface RecordedEntry {
  level: LogLevel;
  msg: string;
  data?: Record<string, unknown>;
}

/**
 * Logger that keeps entries in memory instead of writing them.
 */
export function createRecordingLogger(
  entries: RecordedEntry[] = [],
): Logger & { entries: RecordedEntry[] } {
  const record = (level: LogLevel) =>
  (msg: string, data?: Record<string, unknown>) => {
    entries.push({ level, msg, data });
  };

  return {
    entries,
    trace: record("trace"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    fatal: record("fatal"),
    child: () => createRecordingLogger(entries),
  };
}

export function warnings(entries: RecordedEntry[]): string[] {
  return entries.filter((e) => e.level === "warn").map((e) => e.msg);
}
