import type { SubsystemLogger } from "../logging/subsystem.js";

export type RecordedLog = {
  level: "trace" | "debug" | "info" | "warn" | "error";
  subsystem: string;
  message: string;
  meta?: Record<string, unknown>;
};

export type RecordingLogger = SubsystemLogger & {
  records: RecordedLog[];
  messages: (level?: RecordedLog["level"]) => string[];
};

/** Subsystem logger that keeps every record in memory; children share the list. */
export function createRecordingLogger(
  subsystem = "test",
  records: RecordedLog[] = [],
): RecordingLogger {
  const record =
    (level: RecordedLog["level"]) => (message: string, meta?: Record<string, unknown>) => {
      records.push({ level, subsystem, message, meta });
    };
  return {
    subsystem,
    records,
    messages: (level) =>
      records.filter((entry) => !level || entry.level === level).map((entry) => entry.message),
    trace: record("trace"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    child: (name) => createRecordingLogger(`${subsystem}/${name}`, records),
  };
}
