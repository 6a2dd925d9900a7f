import type { SettingsReader } from "../config/settings.js";
import type { SubsystemLogger } from "../logging/subsystem.js";
import { type MaskMode, type ServerCapabilities, isMaskMode } from "./capabilities.js";
import { CaseInsensitiveSet, equalsIgnoreCase } from "./casefold.js";
import { formatAffected } from "./format.js";
import { hostmaskPatternMatch, parseHostmask } from "./hostmask.js";
import type { MaskCache } from "./mask-cache.js";
import type { TrackedChannels } from "./tracked-channels.js";
import type {
  ChanopHost,
  ConnectedEvent,
  IsupportEvent,
  JoinEvent,
  ModeEvent,
  NickEvent,
  PartEvent,
  QuitEvent,
} from "./types.js";
import type { UserCache } from "./user-cache.js";

export type ReconcileContext = {
  host: Pick<ChanopHost, "send" | "state" | "config" | "notify">;
  settings: SettingsReader;
  users: UserCache;
  masks: Readonly<Record<MaskMode, MaskCache>>;
  tracked: TrackedChannels;
  capabilities: ServerCapabilities;
  logger: SubsystemLogger;
};

export type ReconcileHandlers = {
  join: (event: JoinEvent) => void;
  part: (event: PartEvent) => void;
  quit: (event: QuitEvent) => void;
  nick: (event: NickEvent) => void;
  mode: (event: ModeEvent) => void;
  isupport: (event: IsupportEvent) => void;
  connected: (event: ConnectedEvent) => void;
};

/** Translates decoded membership and mode events into cache mutations. */
export function createReconcileHandlers(ctx: ReconcileContext): ReconcileHandlers {
  const { host, settings, users, masks, tracked, capabilities } = ctx;
  const log = ctx.logger;

  const isCached = (server: string, channel: string) =>
    Object.values(masks).some((cache) => cache.has(server, channel));

  const isUninteresting = (server: string, modes: string) => {
    const ignored = settings.string("ignore_modes", { server });
    const letters = modes.replace(/[+-]/g, "");
    return [...letters].every((letter) => ignored.includes(letter));
  };

  const onMode = (event: ModeEvent) => {
    const { server, channel } = event;
    if (event.args.length === 0) {
      return;
    }
    if (isUninteresting(server, event.modes)) {
      return;
    }
    if (!isCached(server, channel) && !tracked.has(server, channel)) {
      return;
    }
    const supported = capabilities.supportedMaskModes(server);
    const changes = capabilities
      .parseModeChanges(server, event.modes, event.args)
      .filter((change) => change.arg !== undefined);
    const affected = new CaseInsensitiveSet<string>();
    for (const change of changes) {
      const mask = change.arg;
      if (!mask || !isMaskMode(change.mode) || !supported.includes(change.mode)) {
        continue;
      }
      const cache = masks[change.mode];
      log.debug(`${change.action}${change.mode} ${mask} by ${event.actor} in ${server}.${channel}`);
      if (change.action === "-") {
        cache.remove(server, channel, mask);
        continue;
      }
      const matches = hostmaskPatternMatch(mask, users.get(server, channel).hostmasks());
      for (const hostmask of matches) {
        affected.add(hostmask);
      }
      cache.add(server, channel, mask, {
        operator: event.actor,
        hostmask: matches.join(" "),
      });
    }
    if (affected.size > 0 && settings.boolean("display_affected", { server, channel })) {
      host.notify({ server, channel, level: "info", message: formatAffected([...affected]) });
    }
  };

  const onJoin = (event: JoinEvent) => {
    const { server, channel } = event;
    const { nick } = parseHostmask(event.hostmask);
    if (!nick) {
      return;
    }
    const own = host.state.ownNick(server);
    if (own && equalsIgnoreCase(nick, own)) {
      if (tracked.has(server, channel)) {
        users.snapshot(server, channel);
      }
      return;
    }
    users.onJoin(server, channel, nick, event.hostmask);
  };

  const onNick = (event: NickEvent) => {
    const { nick, user, host: hostname } = parseHostmask(event.hostmask);
    if (!nick) {
      return;
    }
    const affected = users.keysFor(event.server, nick);
    users.onNick(nick, event.newNick, `${event.newNick}!${user}@${hostname}`, affected);
  };

  const onConnected = (event: ConnectedEvent) => {
    const { server } = event;
    const channels = settings.list("watchlist", { server });
    tracked.seed(server, channels);
    for (const channel of tracked.channels(server)) {
      users.snapshot(server, channel);
    }
    if (!capabilities.has(server) && !host.config("chanmodes", { server })) {
      log.debug(`requesting VERSION from ${server}`);
      host.send({ server }, "VERSION", 0);
    }
  };

  return {
    join: onJoin,
    part: (event) => {
      const { nick } = parseHostmask(event.hostmask);
      if (nick) {
        users.onPart(event.server, event.channel, nick);
      }
    },
    quit: (event) => {
      const { nick } = parseHostmask(event.hostmask);
      if (nick) {
        users.onQuit(nick, users.keysFor(event.server, nick));
      }
    },
    nick: onNick,
    mode: onMode,
    isupport: (event) => capabilities.update(event.server, event.tokens),
    connected: onConnected,
  };
}
