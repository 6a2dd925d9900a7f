import { getLogger } from "./logger.js";

export type SubsystemLogger = {
  subsystem: string;
  trace: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  child: (name: string) => SubsystemLogger;
};

type SubsystemLevel = "trace" | "debug" | "info" | "warn" | "error";

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  // Resolve per call so level changes and test overrides apply to long-lived loggers.
  const emit = (level: SubsystemLevel, message: string, meta?: Record<string, unknown>) => {
    const logger = getLogger().getSubLogger({ name: subsystem });
    if (meta) {
      logger[level](message, meta);
    } else {
      logger[level](message);
    }
  };
  return {
    subsystem,
    trace: (message, meta) => emit("trace", message, meta),
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
