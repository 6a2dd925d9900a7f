import type { Logger as TsLogger } from "tslog";
import type { LogLevel } from "./levels.js";

export type LogObj = { date?: Date } & Record<string, unknown>;

export type ConsoleStyle = "pretty" | "json" | "hidden";

export type LoggerSettings = {
  level?: string;
  file?: string;
  consoleStyle?: ConsoleStyle;
};

export type ResolvedLoggerSettings = {
  level: LogLevel;
  file?: string;
  consoleStyle: ConsoleStyle;
};

type LoggingState = {
  cachedLogger: TsLogger<LogObj> | null;
  cachedSettings: ResolvedLoggerSettings | null;
  configuredSettings: LoggerSettings | null;
  overrideSettings: LoggerSettings | null;
  invalidEnvLogLevelValue: string | null;
  fileErrorReported: boolean;
};

export const loggingState: LoggingState = {
  cachedLogger: null,
  cachedSettings: null,
  configuredSettings: null,
  overrideSettings: null,
  invalidEnvLogLevelValue: null,
  fileErrorReported: false,
};
