import type { SettingsReader } from "../config/settings.js";
import type { SubsystemLogger } from "../logging/subsystem.js";
import { parseBanArguments } from "./ban-options.js";
import type { MaskMode, ServerCapabilities } from "./capabilities.js";
import { CaseInsensitiveSet } from "./casefold.js";
import type { CommandQueue } from "./command-queue.js";
import { ChanopArgumentError } from "./errors.js";
import { formatElapsed } from "./format.js";
import {
  type BanMaskStrategy,
  buildBanMask,
  isHostmask,
  isNick,
  parseHostmask,
} from "./hostmask.js";
import type { MaskCache } from "./mask-cache.js";
import type { PrivilegeCoordinator } from "./privilege.js";
import type { ChanopHost } from "./types.js";
import type { UserCache, UserList } from "./user-cache.js";

export const CHANOP_COMMAND_NAMES = [
  "op",
  "deop",
  "kick",
  "ban",
  "mute",
  "unban",
  "unmute",
  "bankick",
  "topic",
  "voice",
  "devoice",
  "mode",
  "list",
  "sync",
] as const;

export type ChanopCommandName = (typeof CHANOP_COMMAND_NAMES)[number];

export function isChanopCommandName(name: string): name is ChanopCommandName {
  return CHANOP_COMMAND_NAMES.some((candidate) => candidate === name);
}

export type CommandInvocation = {
  server: string;
  channel: string;
  /** Everything after the command name. */
  args: string;
};

/** Returns the lines shown to the user, if any. */
export type CommandHandler = (invocation: CommandInvocation) => string[];

export type CommandTable = Readonly<Record<ChanopCommandName, CommandHandler>>;

export type CommandDeps = {
  host: Pick<ChanopHost, "state" | "notify">;
  settings: SettingsReader;
  queue: CommandQueue;
  privilege: PrivilegeCoordinator;
  users: UserCache;
  masks: Readonly<Record<MaskMode, MaskCache>>;
  capabilities: ServerCapabilities;
  now: () => number;
  logger: SubsystemLogger;
};

const LIST_KINDS: Record<string, { mode: MaskMode; label: string }> = {
  bans: { mode: "b", label: "bans" },
  mutes: { mode: "q", label: "mutes" },
};

function words(args: string): string[] {
  return args.split(/\s+/).filter(Boolean);
}

function splitFirst(args: string): [string, string] {
  const trimmed = args.trim();
  const space = trimmed.indexOf(" ");
  if (space < 0) {
    return [trimmed, ""];
  }
  return [trimmed.slice(0, space), trimmed.slice(space + 1).trim()];
}

function unique(values: readonly string[]): string[] {
  return [...new CaseInsensitiveSet(values)];
}

/**
 * Builds the operator command table. Kick and bankick variants are picked
 * here from `enable_multi_kick`.
 */
export function createCommandTable(deps: CommandDeps): CommandTable {
  const { host, settings, queue, privilege, users, masks, capabilities } = deps;
  const log = deps.logger;

  const send = (inv: CommandInvocation, command: string) => {
    const context = { server: inv.server, channel: inv.channel };
    queue.enqueue({ type: "normal", context, command });
  };

  const foundNothing = (inv: CommandInvocation, what: string): false => {
    host.notify({
      server: inv.server,
      channel: inv.channel,
      level: "info",
      message: `Sorry, found nothing to ${what}.`,
    });
    return false;
  };

  const notOnChannel = (inv: CommandInvocation) => {
    host.notify({
      server: inv.server,
      channel: inv.channel,
      level: "error",
      message: `Not on ${inv.channel}.`,
    });
  };

  /**
   * Privileged commands skip empty args and report when off-channel.
   * `prepare` parses arguments before anything is queued.
   */
  const needsOp =
    (prepare: (inv: CommandInvocation) => () => boolean): CommandHandler =>
    (inv) => {
      if (!inv.args.trim()) {
        return [];
      }
      const action = prepare(inv);
      if (privilege.hasPrivilege(inv.server, inv.channel) === undefined) {
        notOnChannel(inv);
        return [];
      }
      privilege.runPrivileged(inv.server, inv.channel, action);
      return [];
    };

  const userList = (inv: CommandInvocation): UserList => users.get(inv.server, inv.channel);

  const kickReason = (inv: CommandInvocation, reason: string) =>
    reason || settings.string("kick_reason", { server: inv.server, channel: inv.channel });

  const kickOne = (inv: CommandInvocation, nick: string, reason: string) => {
    const scope = { server: inv.server, channel: inv.channel };
    if (settings.boolean("enable_remove", scope)) {
      send(inv, `REMOVE ${inv.channel} ${nick} :${reason}`);
    } else {
      send(inv, `KICK ${inv.channel} ${nick} :${reason}`);
    }
  };

  /** Leading arguments that are known nicks, then the reason. */
  const splitNicksAndReason = (inv: CommandInvocation, args: string[]) => {
    const list = userList(inv);
    const nicks: string[] = [];
    let index = 0;
    for (; index < args.length; index += 1) {
      const arg = args[index];
      if (!arg || arg.startsWith(":") || !list.has(arg)) {
        break;
      }
      nicks.push(arg);
    }
    const reason = args.slice(index).join(" ").replace(/^:+/, "");
    return { nicks, reason };
  };

  const sendModeChunks = (
    inv: CommandInvocation,
    prefix: "+" | "-",
    mode: string,
    targets: string[],
  ) => {
    const max = capabilities.maxModes(inv.server);
    for (let start = 0; start < targets.length; start += max) {
      const chunk = targets.slice(start, start + max);
      send(inv, `MODE ${inv.channel} ${prefix}${mode.repeat(chunk.length)} ${chunk.join(" ")}`);
    }
  };

  /** Mute falls back to a regular ban where `q` is unsupported. */
  const effectiveMode = (inv: CommandInvocation, mode: MaskMode): MaskMode => {
    if (mode === "b" || capabilities.supportsMaskMode(inv.server, mode)) {
      return mode;
    }
    host.notify({
      server: inv.server,
      channel: inv.channel,
      level: "error",
      message: `${inv.server} doesn't seem to support channel mode '${mode}', using regular ban.`,
    });
    return "b";
  };

  const strategyFor = (inv: CommandInvocation, strategy: BanMaskStrategy[] | undefined) =>
    strategy ?? settings.banMaskStrategy({ server: inv.server, channel: inv.channel });

  // ban and kick stay independent; bankick composes them
  const banMasks = (inv: CommandInvocation, mode: MaskMode, banmasks: string[]) => {
    sendModeChunks(inv, "+", effectiveMode(inv, mode), unique(banmasks));
  };

  const devoiceIfVoiced = (inv: CommandInvocation, nick: string) => {
    if (host.state.member(inv.server, inv.channel, nick)?.voice) {
      send(inv, `MODE ${inv.channel} -v ${nick}`);
    }
  };

  const ban = (mode: MaskMode, what: string) => (inv: CommandInvocation) => {
    const parsed = parseBanArguments(inv.args, what);
    return (): boolean => {
      const strategy = strategyFor(inv, parsed.strategy);
      const list = userList(inv);
      const banmasks = parsed.targets.map((target) => {
        if (isHostmask(target)) {
          return target;
        }
        const hostmask = list.get(target);
        if (!hostmask) {
          return target;
        }
        devoiceIfVoiced(inv, target);
        return buildBanMask(hostmask, strategy);
      });
      if (banmasks.length === 0) {
        return foundNothing(inv, what);
      }
      banMasks(inv, mode, banmasks);
      return true;
    };
  };

  const unban =
    (mode: MaskMode, what: string) =>
    (inv: CommandInvocation) =>
    (): boolean => {
      const cache = masks[mode];
      const found = words(inv.args).flatMap((arg) => {
        let matches: string[] = [];
        if (isNick(arg)) {
          matches = cache.searchByNick(arg, inv.server, inv.channel);
        } else if (isHostmask(arg)) {
          matches = cache.searchByHostmask(arg, inv.server, inv.channel);
        }
        return matches.length > 0 ? matches : [arg];
      });
      if (found.length === 0) {
        return foundNothing(inv, what);
      }
      sendModeChunks(inv, "-", effectiveMode(inv, mode), unique(found));
      return true;
    };

  const kick = (inv: CommandInvocation) => (): boolean => {
    const [nick, reason] = splitFirst(inv.args);
    kickOne(inv, nick, kickReason(inv, reason));
    return true;
  };

  const multiKick = (inv: CommandInvocation) => (): boolean => {
    const { nicks, reason } = splitNicksAndReason(inv, words(inv.args));
    if (nicks.length === 0) {
      return foundNothing(inv, "kick");
    }
    for (const nick of nicks) {
      kickOne(inv, nick, kickReason(inv, reason));
    }
    return true;
  };

  const banKickOne = (
    inv: CommandInvocation,
    nick: string,
    reason: string,
    strategy: BanMaskStrategy[],
  ) => {
    const hostmask = userList(inv).get(nick);
    if (!hostmask) {
      return false;
    }
    banMasks(inv, "b", [buildBanMask(hostmask, strategy)]);
    kickOne(inv, nick, kickReason(inv, reason));
    return true;
  };

  const bankick = (inv: CommandInvocation) => {
    const parsed = parseBanArguments(inv.args, "bankick");
    const [nick = "", ...rest] = parsed.targets;
    return (): boolean => {
      if (!banKickOne(inv, nick, rest.join(" "), strategyFor(inv, parsed.strategy))) {
        return foundNothing(inv, "bankick");
      }
      return true;
    };
  };

  const multiBankick = (inv: CommandInvocation) => {
    const parsed = parseBanArguments(inv.args, "bankick");
    return (): boolean => {
      const { nicks, reason } = splitNicksAndReason(inv, parsed.targets);
      if (nicks.length === 0) {
        return foundNothing(inv, "bankick");
      }
      const strategy = strategyFor(inv, parsed.strategy);
      for (const nick of nicks) {
        banKickOne(inv, nick, reason, strategy);
      }
      return true;
    };
  };

  const list: CommandHandler = (inv) => {
    const [kind, target] = splitFirst(inv.args);
    const selected = LIST_KINDS[kind];
    if (!selected) {
      throw new ChanopArgumentError(`Argument error, expected 'bans' or 'mutes', got '${kind}'`);
    }
    const channel = target || inv.channel;
    const masklist = masks[selected.mode].get(inv.server, channel);
    if (!masklist && !host.state.isChannel(channel)) {
      throw new ChanopArgumentError(`${channel} isn't an IRC channel.`);
    }
    const records = masklist?.values() ?? [];
    const where = `${inv.server}.${channel}`;
    const lines = [`List of ${selected.label} in ${where} (total: ${records.length})`];
    if (records.length === 0) {
      lines.push(`No known ${selected.label} for ${where}.`);
    }
    const nowSeconds = Math.floor(deps.now() / 1000);
    for (const record of [...records].sort((a, b) => a.date - b.date)) {
      const setter = record.operator
        ? parseHostmask(record.operator).nick || record.operator
        : inv.server;
      lines.push(`${record.mask} set by ${setter} ${formatElapsed(nowSeconds - record.date)} ago`);
      if (record.hostmask) {
        lines.push(`  ${record.hostmask}`);
      }
    }
    for (const message of lines) {
      host.notify({ server: inv.server, channel, level: "info", message });
    }
    return lines;
  };

  const multiKickEnabled = settings.boolean("enable_multi_kick");
  log.debug(`building command table (multi kick ${multiKickEnabled ? "on" : "off"})`);

  return {
    op: (inv) => {
      if (privilege.requestOp(inv.server, inv.channel) === undefined) {
        notOnChannel(inv);
      }
      return [];
    },
    deop: (inv) => {
      privilege.release(inv.server, inv.channel);
      return [];
    },
    kick: needsOp(multiKickEnabled ? multiKick : kick),
    ban: needsOp(ban("b", "ban")),
    mute: needsOp(ban("q", "mute")),
    unban: needsOp(unban("b", "unban")),
    unmute: needsOp(unban("q", "unmute")),
    bankick: needsOp(multiKickEnabled ? multiBankick : bankick),
    topic: needsOp((inv) => () => {
      const text = inv.args.trim();
      send(inv, `TOPIC ${inv.channel} :${text === "-delete" ? "" : text}`);
      return true;
    }),
    voice: needsOp((inv) => () => {
      sendModeChunks(inv, "+", "v", words(inv.args));
      return true;
    }),
    devoice: needsOp((inv) => () => {
      sendModeChunks(inv, "-", "v", words(inv.args));
      return true;
    }),
    mode: needsOp((inv) => () => {
      send(inv, `MODE ${inv.channel} ${inv.args.trim()}`);
      return true;
    }),
    list,
    sync: (inv) => {
      users.snapshot(inv.server, inv.channel);
      for (const mode of capabilities.supportedMaskModes(inv.server)) {
        masks[mode].fetch(inv.server, inv.channel);
      }
      return [];
    },
  };
}
