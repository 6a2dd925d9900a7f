import { describe, expect, it } from "vitest";
import { ChanopConfigFileError } from "../chanop/errors.js";
import { loadChanopConfigFile, parseConfigJson5, validateChanopConfig } from "./io.js";

const CONFIG_TEXT = `{
  // global defaults
  settings: { autodeop_delay: "60", },
  servers: {
    libera: {
      watchlist: "#ops,#dev",
      channels: { "#ops": { kick_reason: "bye" } },
    },
  },
  logging: { level: "debug" },
}`;

describe("parseConfigJson5", () => {
  it("accepts comments and trailing commas", () => {
    const parsed = parseConfigJson5(CONFIG_TEXT);
    expect(parsed.ok).toBe(true);
  });

  it("reports syntax errors", () => {
    const parsed = parseConfigJson5("{ settings: ");
    expect(parsed.ok).toBe(false);
  });
});

describe("validateChanopConfig", () => {
  it("rejects non-channel keys under channels", () => {
    const result = validateChanopConfig({
      servers: { libera: { channels: { ops: { kick_reason: "bye" } } } },
    });
    expect(result).toEqual({
      ok: false,
      issues: [
        {
          path: "servers.libera.channels.ops",
          message: 'servers.libera.channels keys must be channel names (got "ops")',
        },
      ],
    });
  });

  it("rejects unknown settings and server-only keys on channels", () => {
    const unknown = validateChanopConfig({ settings: { bogus: "1" } });
    expect(unknown.ok).toBe(false);

    const scoped = validateChanopConfig({
      servers: { libera: { channels: { "#ops": { watchlist: "#ops" } } } },
    });
    expect(scoped.ok).toBe(false);
  });

  it("requires string setting values", () => {
    const result = validateChanopConfig({ settings: { autodeop_delay: 60 } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues[0]?.path).toBe("settings.autodeop_delay");
    }
  });
});

describe("loadChanopConfigFile", () => {
  it("reads, parses and validates", () => {
    const config = loadChanopConfigFile("/etc/chanop.json5", { readFile: () => CONFIG_TEXT });
    expect(config.settings?.autodeop_delay).toBe("60");
    expect(config.servers?.libera?.channels?.["#ops"]?.kick_reason).toBe("bye");
    expect(config.logging?.level).toBe("debug");
  });

  it("wraps read failures", () => {
    const load = () =>
      loadChanopConfigFile("/missing.json5", {
        readFile: () => {
          throw new Error("ENOENT");
        },
      });
    expect(load).toThrow(ChanopConfigFileError);
    expect(load).toThrow("Cannot read config /missing.json5: Error: ENOENT");
  });

  it("lists validation issues", () => {
    try {
      loadChanopConfigFile("/bad.json5", { readFile: () => '{ logging: { level: "loud" } }' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ChanopConfigFileError);
      if (err instanceof ChanopConfigFileError) {
        expect(err.configPath).toBe("/bad.json5");
        expect(err.issues.map((issue) => issue.path)).toEqual(["logging.level"]);
      }
    }
  });
});
