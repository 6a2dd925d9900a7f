import type { SettingsReader } from "../config/settings.js";
import { CaseInsensitiveMap } from "./casefold.js";

export const MASK_MODES = ["b", "q"] as const;

export type MaskMode = (typeof MASK_MODES)[number];

export function isMaskMode(mode: string): mode is MaskMode {
  return MASK_MODES.some((candidate) => candidate === mode);
}

export type ModeChange = {
  action: "+" | "-";
  mode: string;
  arg?: string;
};

type IsupportRecord = {
  /** CHANMODES groups: list, always-arg, arg-when-set, no-arg. */
  chanmodes?: [string, string, string, string];
  modes?: number;
  prefixModes?: string;
  tokens: Record<string, string | true>;
};

const DEFAULT_LIST_MODES = "beIq";
const DEFAULT_ALWAYS_ARG_MODES = "k";
const DEFAULT_SET_ARG_MODES = "l";
const DEFAULT_PREFIX_MODES = "ov";

export type ServerCapabilities = {
  update: (server: string, tokens: string[]) => void;
  has: (server: string) => boolean;
  token: (server: string, name: string) => string | true | undefined;
  listModes: (server: string) => string;
  supportedMaskModes: (server: string) => MaskMode[];
  supportsMaskMode: (server: string, mode: MaskMode) => boolean;
  maxModes: (server: string) => number;
  parseModeChanges: (server: string, modes: string, args: readonly string[]) => ModeChange[];
};

function parseChanmodes(value: string): [string, string, string, string] {
  const [list = "", always = "", whenSet = "", none = ""] = value.split(",");
  return [list, always, whenSet, none];
}

function parsePrefixModes(value: string): string | undefined {
  const match = /^\(([^)]*)\)/.exec(value);
  return match?.[1];
}

/** Server capabilities learned from ISUPPORT (005), falling back to settings. */
export function createServerCapabilities(settings: SettingsReader): ServerCapabilities {
  const records = new CaseInsensitiveMap<string, IsupportRecord>();

  const listModes = (server: string) =>
    records.get(server)?.chanmodes?.[0] || settings.string("chanmodes", { server }) || "b";

  const maxModes = (server: string) => {
    const fromServer = records.get(server)?.modes;
    const value = fromServer ?? settings.integer("modes", { server });
    return value >= 1 ? value : 1;
  };

  return {
    update: (server, tokens) => {
      const record = records.get(server) ?? { tokens: {} };
      for (const token of tokens) {
        const eq = token.indexOf("=");
        const name = eq >= 0 ? token.slice(0, eq) : token;
        const value = eq >= 0 ? token.slice(eq + 1) : true;
        if (!name || name.startsWith("-")) {
          continue;
        }
        record.tokens[name] = value;
        if (typeof value !== "string") {
          continue;
        }
        if (name === "CHANMODES") {
          record.chanmodes = parseChanmodes(value);
        } else if (name === "MODES") {
          const parsed = Number.parseInt(value, 10);
          if (Number.isFinite(parsed) && parsed > 0) {
            record.modes = parsed;
          }
        } else if (name === "PREFIX") {
          record.prefixModes = parsePrefixModes(value);
        }
      }
      records.set(server, record);
    },
    has: (server) => records.has(server),
    token: (server, name) => records.get(server)?.tokens[name],
    listModes,
    supportedMaskModes: (server) => {
      const modes = listModes(server);
      return MASK_MODES.filter((mode) => modes.includes(mode));
    },
    supportsMaskMode: (server, mode) => listModes(server).includes(mode),
    maxModes,
    parseModeChanges: (server, modes, args) => {
      const record = records.get(server);
      const [list, always, whenSet] = record?.chanmodes ?? [
        DEFAULT_LIST_MODES,
        DEFAULT_ALWAYS_ARG_MODES,
        DEFAULT_SET_ARG_MODES,
        "",
      ];
      const prefixModes = record?.prefixModes ?? DEFAULT_PREFIX_MODES;
      const takesArg = `${list}${always}${listModes(server)}${prefixModes}`;
      const changes: ModeChange[] = [];
      let action: "+" | "-" = "+";
      let argIndex = 0;
      for (const mode of modes) {
        if (mode === "+" || mode === "-") {
          action = mode;
          continue;
        }
        const consumes = takesArg.includes(mode) || (action === "+" && whenSet.includes(mode));
        if (consumes) {
          changes.push({ action, mode, arg: args[argIndex] });
          argIndex += 1;
        } else {
          changes.push({ action, mode });
        }
      }
      return changes;
    },
  };
}
