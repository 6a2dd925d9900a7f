import { describe, expect, it } from "vitest";
import type { ChanopSettingKey } from "../config/defaults.js";
import { createSettingsReader } from "../config/settings.js";
import { createRecordingLogger } from "../test-utils/recording-logger.js";
import { createServerCapabilities } from "./capabilities.js";

function capabilitiesWith(values: Partial<Record<ChanopSettingKey, string>> = {}) {
  const settings = createSettingsReader((key) => values[key], createRecordingLogger());
  return createServerCapabilities(settings);
}

describe("server capabilities", () => {
  it("falls back to settings before ISUPPORT arrives", () => {
    const capabilities = capabilitiesWith();
    expect(capabilities.has("libera")).toBe(false);
    expect(capabilities.supportedMaskModes("libera")).toEqual(["b"]);
    expect(capabilities.maxModes("libera")).toBe(4);

    const configured = capabilitiesWith({ chanmodes: "bq", modes: "0" });
    expect(configured.supportedMaskModes("libera")).toEqual(["b", "q"]);
    expect(configured.supportsMaskMode("libera", "q")).toBe(true);
    expect(configured.maxModes("libera")).toBe(1);
  });

  it("learns list modes and MODES from ISUPPORT", () => {
    const capabilities = capabilitiesWith();
    capabilities.update("Libera", ["CHANMODES=beIq,k,l,imnpst", "MODES=6", "EXCEPTS"]);

    expect(capabilities.has("libera")).toBe(true);
    expect(capabilities.listModes("libera")).toBe("beIq");
    expect(capabilities.supportedMaskModes("libera")).toEqual(["b", "q"]);
    expect(capabilities.maxModes("libera")).toBe(6);
    expect(capabilities.token("libera", "EXCEPTS")).toBe(true);
  });

  it("ignores a zero MODES token", () => {
    const capabilities = capabilitiesWith();
    capabilities.update("libera", ["MODES=0"]);
    expect(capabilities.maxModes("libera")).toBe(4);
  });

  it("assigns mode arguments using CHANMODES and PREFIX", () => {
    const capabilities = capabilitiesWith();
    capabilities.update("libera", ["CHANMODES=beIq,k,l,imnpst", "PREFIX=(ohv)@%+"]);

    expect(
      capabilities.parseModeChanges("libera", "+bo-l+kv", ["*!*@bad", "alice", "key", "bob"]),
    ).toEqual([
      { action: "+", mode: "b", arg: "*!*@bad" },
      { action: "+", mode: "o", arg: "alice" },
      { action: "-", mode: "l" },
      { action: "+", mode: "k", arg: "key" },
      { action: "+", mode: "v", arg: "bob" },
    ]);
  });

  it("uses default argument modes without ISUPPORT", () => {
    const capabilities = capabilitiesWith();
    expect(capabilities.parseModeChanges("libera", "+lm", ["10"])).toEqual([
      { action: "+", mode: "l", arg: "10" },
      { action: "+", mode: "m" },
    ]);
  });
});
