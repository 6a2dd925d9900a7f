import type { ConfigLookup } from "../config/settings.js";

export type ChannelKey = readonly [server: string, channel: string];

export type JoinEvent = { kind: "join"; server: string; channel: string; hostmask: string };
export type PartEvent = { kind: "part"; server: string; channel: string; hostmask: string };
export type QuitEvent = { kind: "quit"; server: string; hostmask: string };
export type NickEvent = { kind: "nick"; server: string; hostmask: string; newNick: string };
export type ModeEvent = {
  kind: "mode";
  server: string;
  channel: string;
  /** Hostmask of the setter, or a server name. */
  actor: string;
  modes: string;
  args: string[];
};
export type MaskListEntryEvent = {
  kind: "maskListEntry";
  server: string;
  channel: string;
  mask: string;
  operator?: string;
  /** Unix seconds. */
  date?: number;
};
export type MaskListEndEvent = { kind: "maskListEnd"; server: string; channel: string };
export type IsupportEvent = { kind: "isupport"; server: string; tokens: string[] };
export type ConnectedEvent = { kind: "connected"; server: string };

export type ChanopEvent =
  | JoinEvent
  | PartEvent
  | QuitEvent
  | NickEvent
  | ModeEvent
  | MaskListEntryEvent
  | MaskListEndEvent
  | IsupportEvent
  | ConnectedEvent;

export type ChanopEventKind = ChanopEvent["kind"];

export type ChanopEventOf<K extends ChanopEventKind> = Extract<ChanopEvent, { kind: K }>;

export type ChanopEventHandler<K extends ChanopEventKind> = (event: ChanopEventOf<K>) => void;

export type SubscriptionHandle = {
  readonly id: number;
  readonly kind: ChanopEventKind;
};

export type ChanopEventSource = {
  subscribe: <K extends ChanopEventKind>(
    kind: K,
    handler: ChanopEventHandler<K>,
  ) => SubscriptionHandle;
  unsubscribe: (handle: SubscriptionHandle) => void;
};

export type SendContext = {
  server: string;
  channel?: string;
};

export type TimerHandle = {
  cancel: () => void;
};

export type MemberStatus = {
  op: boolean;
  voice: boolean;
};

export type ChannelMember = {
  nick: string;
  /** `user@host` part of the member's hostmask. */
  host: string;
};

export type ChannelStateQuery = {
  ownNick: (server: string) => string | undefined;
  /** `undefined` when either we or the nick are not on the channel. */
  member: (server: string, channel: string, nick: string) => MemberStatus | undefined;
  /** `undefined` when we are not on the channel. */
  members: (server: string, channel: string) => ChannelMember[] | undefined;
  servers: () => string[];
  isChannel: (name: string) => boolean;
};

export type ChanopNotice = {
  server?: string;
  channel?: string;
  level: "info" | "error";
  message: string;
};

export type ChanopHost = {
  /** `delay` is in seconds and is applied by the transport, not locally. */
  send: (context: SendContext, command: string, delay: number) => void;
  events: ChanopEventSource;
  after: (ms: number, callback: () => void) => TimerHandle;
  state: ChannelStateQuery;
  config: ConfigLookup;
  notify: (notice: ChanopNotice) => void;
};

export function createTimerScheduler(): ChanopHost["after"] {
  return (ms, callback) => {
    const timer = setTimeout(callback, ms);
    timer.unref?.();
    return {
      cancel: () => clearTimeout(timer),
    };
  };
}
