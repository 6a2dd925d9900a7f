import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  levelToMinLevel,
  normalizeLogLevel,
  readEnvLogLevel,
  tryParseLogLevel,
} from "./levels.js";
import { getLogger, getResolvedLoggerSettings, resetLogger, setLoggerOverride } from "./logger.js";
import { loggingState } from "./state.js";
import { createSubsystemLogger } from "./subsystem.js";

describe("log levels", () => {
  it("parses names without case", () => {
    expect(tryParseLogLevel(" WARN ")).toBe("warn");
    expect(tryParseLogLevel("loud")).toBeUndefined();
    expect(normalizeLogLevel(undefined)).toBe("info");
    expect(normalizeLogLevel("loud", "error")).toBe("error");
  });

  it("maps to tslog minimum levels", () => {
    expect(levelToMinLevel("trace")).toBe(1);
    expect(levelToMinLevel("warn")).toBe(4);
    expect(levelToMinLevel("silent")).toBe(Number.POSITIVE_INFINITY);
  });

  it("reads the env override from the given environment", () => {
    expect(readEnvLogLevel({ CHANOP_LOG_LEVEL: " DEBUG " })).toBe("debug");
    expect(readEnvLogLevel({})).toBeUndefined();
  });
});

describe("logger settings", () => {
  let originalEnv: string | undefined;
  let tmpDir = "";

  beforeEach(() => {
    originalEnv = process.env.CHANOP_LOG_LEVEL;
    delete process.env.CHANOP_LOG_LEVEL;
    loggingState.invalidEnvLogLevelValue = null;
    loggingState.fileErrorReported = false;
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "chanop-log-"));
    resetLogger();
  });

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.CHANOP_LOG_LEVEL;
    } else {
      process.env.CHANOP_LOG_LEVEL = originalEnv;
    }
    resetLogger();
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("applies a valid env override", () => {
    const file = path.join(tmpDir, "chanop.log");
    setLoggerOverride({ level: "error", consoleStyle: "json", file });
    process.env.CHANOP_LOG_LEVEL = "debug";

    expect(getResolvedLoggerSettings()).toEqual({ level: "debug", file, consoleStyle: "json" });
  });

  it("warns once and ignores invalid env values", () => {
    setLoggerOverride({ level: "error", consoleStyle: "hidden" });
    process.env.CHANOP_LOG_LEVEL = "nope";
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    expect(getResolvedLoggerSettings().level).toBe("error");
    expect(getResolvedLoggerSettings().level).toBe("error");

    const warnings = stderrSpy.mock.calls
      .map(([firstArg]) => String(firstArg))
      .filter((line) => line.includes("CHANOP_LOG_LEVEL"));
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain('Ignoring invalid CHANOP_LOG_LEVEL="nope"');
  });

  it("appends JSON lines to the log file", () => {
    const file = path.join(tmpDir, "nested", "chanop.log");
    setLoggerOverride({ level: "info", consoleStyle: "hidden", file });

    createSubsystemLogger("chanop/test").info("hello");
    createSubsystemLogger("chanop/test").debug("too quiet");

    const lines = fs.readFileSync(file, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({ "0": "hello", time: expect.any(String) });
  });

  it("reports a failing log file once per streak", () => {
    setLoggerOverride({ level: "info", consoleStyle: "hidden", file: tmpDir });
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    getLogger().info("first");
    getLogger().info("second");

    const failures = stderrSpy.mock.calls
      .map(([firstArg]) => String(firstArg))
      .filter((line) => line.startsWith("[chanop] Failed to write log file"));
    expect(failures).toHaveLength(1);
  });
});
