// Test fixture: logger that keeps entries in memory for assertions

import type { Logger, LogLevel } from "../types";

export interface LogRecord {
  readonly level: LogLevel;
  readonly message: string;
  readonly data: Record<string, unknown>;
}

export function recordingLogger(
  records: LogRecord[] = [],
  context: Record<string, unknown> = {},
): Logger & { records: LogRecord[] } {
  const write = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    records.push({ level, message, data: { ...context, ...data } });
  };
  return {
    records,
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (extra) => recordingLogger(records, { ...context, ...extra }),
  };
}
