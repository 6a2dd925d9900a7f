import fs from "node:fs";
import JSON5 from "json5";
import { ChanopConfigFileError, type ChanopConfigIssue } from "../chanop/errors.js";
import { type ChanopConfig, ChanopConfigSchema } from "./schema.js";

export type ParseConfigJson5Result = { ok: true; parsed: unknown } | { ok: false; error: string };

export type ConfigIoDeps = {
  readFile?: (path: string) => string;
  json5?: { parse: (value: string) => unknown };
};

export function parseConfigJson5(
  raw: string,
  json5: { parse: (value: string) => unknown } = JSON5,
): ParseConfigJson5Result {
  try {
    return { ok: true, parsed: json5.parse(raw) };
  } catch (err) {
    return { ok: false, error: String(err) };
  }
}

export function validateChanopConfig(
  raw: unknown,
): { ok: true; config: ChanopConfig } | { ok: false; issues: ChanopConfigIssue[] } {
  const validated = ChanopConfigSchema.safeParse(raw);
  if (!validated.success) {
    return {
      ok: false,
      issues: validated.error.issues.map((iss) => ({
        path: iss.path.join("."),
        message: iss.message,
      })),
    };
  }
  return { ok: true, config: validated.data };
}

export function loadChanopConfigFile(configPath: string, deps: ConfigIoDeps = {}): ChanopConfig {
  const readFile = deps.readFile ?? ((candidate: string) => fs.readFileSync(candidate, "utf-8"));
  let raw: string;
  try {
    raw = readFile(configPath);
  } catch (err) {
    throw new ChanopConfigFileError(`Cannot read config ${configPath}: ${String(err)}`, configPath);
  }
  const parsed = parseConfigJson5(raw, deps.json5);
  if (!parsed.ok) {
    throw new ChanopConfigFileError(`Invalid JSON5 in ${configPath}: ${parsed.error}`, configPath);
  }
  const validated = validateChanopConfig(parsed.parsed);
  if (!validated.ok) {
    const details = validated.issues.map((iss) => `${iss.path || "<root>"}: ${iss.message}`);
    throw new ChanopConfigFileError(
      `Invalid config ${configPath}:\n${details.join("\n")}`,
      configPath,
      validated.issues,
    );
  }
  return validated.config;
}
