import { loggingState } from "./state.js";

export const ALLOWED_LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

// tslog numbering: trace=1 .. fatal=6
const TSLOG_MIN_LEVEL: Record<LogLevel, number> = {
  silent: Number.POSITIVE_INFINITY,
  fatal: 6,
  error: 5,
  warn: 4,
  info: 3,
  debug: 2,
  trace: 1,
};

export function tryParseLogLevel(level?: string): LogLevel | undefined {
  const candidate = level?.trim().toLowerCase();
  return ALLOWED_LOG_LEVELS.find((allowed) => allowed === candidate);
}

export function normalizeLogLevel(level?: string, fallback: LogLevel = "info"): LogLevel {
  return tryParseLogLevel(level) ?? fallback;
}

export function levelToMinLevel(level: LogLevel): number {
  return TSLOG_MIN_LEVEL[level];
}

/**
 * `CHANOP_LOG_LEVEL` wins over the configured level. An unusable value is
 * reported on stderr the first time it is seen.
 */
export function readEnvLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const raw = env.CHANOP_LOG_LEVEL?.trim();
  if (!raw) {
    loggingState.invalidEnvLogLevelValue = null;
    return undefined;
  }
  const parsed = tryParseLogLevel(raw);
  if (parsed) {
    loggingState.invalidEnvLogLevelValue = null;
    return parsed;
  }
  if (loggingState.invalidEnvLogLevelValue !== raw) {
    loggingState.invalidEnvLogLevelValue = raw;
    const allowed = ALLOWED_LOG_LEVELS.join("|");
    process.stderr.write(
      `[chanop] Ignoring invalid CHANOP_LOG_LEVEL="${raw}" (allowed: ${allowed}).\n`,
    );
  }
  return undefined;
}
