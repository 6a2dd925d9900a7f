export const CHANOP_SETTING_DEFAULTS = {
  op_command: "PRIVMSG ChanServ :OP $channel $nick",
  deop_command: "MODE $channel -o $nick",
  autodeop: "on",
  autodeop_delay: "180",
  default_banmask: "host",
  enable_remove: "off",
  kick_reason: "kthxbye!",
  display_affected: "off",
  enable_multi_kick: "off",
  chanmodes: "b",
  modes: "4",
  watchlist: "",
  ignore_modes: "ovjl",
} as const;

export type ChanopSettingKey = keyof typeof CHANOP_SETTING_DEFAULTS;

/** Settings that may only be set globally or per server. */
export const SERVER_ONLY_SETTINGS: ReadonlySet<ChanopSettingKey> = new Set([
  "chanmodes",
  "modes",
  "watchlist",
  "ignore_modes",
]);

export const GLOBAL_ONLY_SETTINGS: ReadonlySet<ChanopSettingKey> = new Set(["enable_multi_kick"]);
