import fs from "node:fs";
import path from "node:path";
import { Logger as TsLogger } from "tslog";
import { levelToMinLevel, normalizeLogLevel, readEnvLogLevel } from "./levels.js";
import {
  type ConsoleStyle,
  type LogObj,
  type LoggerSettings,
  type ResolvedLoggerSettings,
  loggingState,
} from "./state.js";

export type { ConsoleStyle, LoggerSettings, ResolvedLoggerSettings };

function normalizeConsoleStyle(style?: string): ConsoleStyle {
  if (style === "pretty" || style === "json" || style === "hidden") {
    return style;
  }
  return process.stdout.isTTY ? "pretty" : "json";
}

function resolveSettings(): ResolvedLoggerSettings {
  const cfg = loggingState.overrideSettings ?? loggingState.configuredSettings;
  const defaultLevel =
    process.env.VITEST === "true" && process.env.CHANOP_TEST_LOG !== "1" ? "silent" : "info";
  const fromConfig = normalizeLogLevel(cfg?.level, defaultLevel);
  const level = readEnvLogLevel() ?? fromConfig;
  const file = cfg?.file?.trim() || undefined;
  return { level, file, consoleStyle: normalizeConsoleStyle(cfg?.consoleStyle) };
}

function settingsChanged(a: ResolvedLoggerSettings | null, b: ResolvedLoggerSettings) {
  if (!a) {
    return true;
  }
  return a.level !== b.level || a.file !== b.file || a.consoleStyle !== b.consoleStyle;
}

function appendLogLine(file: string, line: string): void {
  try {
    fs.appendFileSync(file, line, { encoding: "utf8" });
    loggingState.fileErrorReported = false;
  } catch (err) {
    // never block on logging failures; report the first one of a streak
    if (!loggingState.fileErrorReported) {
      loggingState.fileErrorReported = true;
      process.stderr.write(`[chanop] Failed to write log file ${file}: ${String(err)}\n`);
    }
  }
}

function buildLogger(settings: ResolvedLoggerSettings): TsLogger<LogObj> {
  const logger = new TsLogger<LogObj>({
    name: "chanop",
    minLevel: levelToMinLevel(settings.level),
    type: settings.consoleStyle,
  });
  const file = settings.file;
  if (file) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    logger.attachTransport((logObj: LogObj) => {
      const time = logObj.date?.toISOString() ?? new Date().toISOString();
      appendLogLine(file, `${JSON.stringify({ ...logObj, time })}\n`);
    });
  }
  return logger;
}

export function getLogger(): TsLogger<LogObj> {
  const settings = resolveSettings();
  const cachedLogger = loggingState.cachedLogger;
  if (!cachedLogger || settingsChanged(loggingState.cachedSettings, settings)) {
    const logger = buildLogger(settings);
    loggingState.cachedLogger = logger;
    loggingState.cachedSettings = settings;
    return logger;
  }
  return cachedLogger;
}

export function getResolvedLoggerSettings(): ResolvedLoggerSettings {
  return resolveSettings();
}

/** Applies the `logging` block of a loaded config file. */
export function configureLogging(settings: LoggerSettings | undefined): void {
  loggingState.configuredSettings = settings ?? null;
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
  loggingState.overrideSettings = settings;
  loggingState.cachedLogger = null;
  loggingState.cachedSettings = null;
}

export function resetLogger() {
  loggingState.cachedLogger = null;
  loggingState.cachedSettings = null;
  loggingState.configuredSettings = null;
  loggingState.overrideSettings = null;
}
