import { CaseInsensitiveMap } from "../chanop/casefold.js";
import {
  BAN_MASK_STRATEGIES,
  type BanMaskStrategy,
  isBanMaskStrategy,
} from "../chanop/hostmask.js";
import type { SubsystemLogger } from "../logging/subsystem.js";
import {
  CHANOP_SETTING_DEFAULTS,
  type ChanopSettingKey,
  GLOBAL_ONLY_SETTINGS,
  SERVER_ONLY_SETTINGS,
} from "./defaults.js";
import type { ChanopConfig, ChanopChannelSettings, ChanopServerSettings } from "./schema.js";

export type ConfigScope = {
  server?: string;
  channel?: string;
};

/** Resolves a setting through channel → server → global; `undefined` when unset. */
export type ConfigLookup = (key: ChanopSettingKey, scope?: ConfigScope) => string | undefined;

type SettingsBlock = Partial<Record<ChanopSettingKey, string>>;

function pickSetting(block: SettingsBlock | undefined, key: ChanopSettingKey): string | undefined {
  const value = block?.[key];
  return value ? value : undefined;
}

export function createConfigLookup(config: ChanopConfig = {}): ConfigLookup {
  const servers = new CaseInsensitiveMap<string, ChanopServerSettings>(
    Object.entries(config.servers ?? {}),
  );
  const channelsByServer = new CaseInsensitiveMap<
    string,
    CaseInsensitiveMap<string, ChanopChannelSettings>
  >();
  for (const [server, settings] of servers) {
    channelsByServer.set(server, new CaseInsensitiveMap(Object.entries(settings.channels ?? {})));
  }

  return (key, scope = {}) => {
    const { server, channel } = scope;
    if (server && !GLOBAL_ONLY_SETTINGS.has(key)) {
      if (channel && !SERVER_ONLY_SETTINGS.has(key)) {
        const value = pickSetting(channelsByServer.get(server)?.get(channel), key);
        if (value) {
          return value;
        }
      }
      const value = pickSetting(servers.get(server), key);
      if (value) {
        return value;
      }
    }
    return pickSetting(config.settings, key);
  };
}

const BOOLEAN_VALUES: Record<string, boolean> = { on: true, off: false };

export type SettingsReader = {
  string: (key: ChanopSettingKey, scope?: ConfigScope) => string;
  boolean: (key: ChanopSettingKey, scope?: ConfigScope) => boolean;
  integer: (key: ChanopSettingKey, scope?: ConfigScope) => number;
  list: (key: ChanopSettingKey, scope?: ConfigScope) => string[];
  banMaskStrategy: (scope?: ConfigScope) => BanMaskStrategy[];
};

export function createSettingsReader(lookup: ConfigLookup, log: SubsystemLogger): SettingsReader {
  const raw = (key: ChanopSettingKey, scope?: ConfigScope) =>
    lookup(key, scope) ?? CHANOP_SETTING_DEFAULTS[key];

  const reportInvalid = (key: ChanopSettingKey, value: string, allowed: string) => {
    const fallback = CHANOP_SETTING_DEFAULTS[key];
    log.error(`Error while fetching config '${key}'. Using default value '${fallback}'.`);
    log.error(`'${value}' is invalid, allowed: ${allowed}`);
  };

  const parseBoolean = (value: string): boolean | undefined =>
    BOOLEAN_VALUES[value.trim().toLowerCase()];

  const parseInteger = (value: string): number | undefined => {
    const trimmed = value.trim();
    return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
  };

  const parseStrategy = (value: string): BanMaskStrategy[] | undefined => {
    const keywords = value
      .toLowerCase()
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean);
    const strategy = keywords.filter(isBanMaskStrategy);
    return keywords.length > 0 && strategy.length === keywords.length ? strategy : undefined;
  };

  return {
    string: (key, scope) => raw(key, scope),
    boolean: (key, scope) => {
      const value = raw(key, scope);
      const parsed = parseBoolean(value);
      if (parsed !== undefined) {
        return parsed;
      }
      reportInvalid(key, value, "'on', 'off'");
      return parseBoolean(CHANOP_SETTING_DEFAULTS[key]) ?? false;
    },
    integer: (key, scope) => {
      const value = raw(key, scope);
      const parsed = parseInteger(value);
      if (parsed !== undefined) {
        return parsed;
      }
      reportInvalid(key, value, "a number");
      return parseInteger(CHANOP_SETTING_DEFAULTS[key]) ?? 0;
    },
    list: (key, scope) =>
      raw(key, scope)
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean),
    banMaskStrategy: (scope) => {
      const value = raw("default_banmask", scope);
      const parsed = parseStrategy(value);
      if (parsed) {
        return parsed;
      }
      reportInvalid("default_banmask", value, BAN_MASK_STRATEGIES.join(", "));
      return parseStrategy(CHANOP_SETTING_DEFAULTS.default_banmask) ?? ["host"];
    },
  };
}
