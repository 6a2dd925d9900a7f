import { CaseInsensitiveMap } from "../chanop/casefold.js";
import { decodeIrcLine } from "../chanop/decode.js";
import { type ChanopEventBus, createChanopEventBus } from "../chanop/event-bus.js";
import { isChannelName, parseHostmask } from "../chanop/hostmask.js";
import type {
  ChannelKey,
  ChanopEvent,
  ChanopHost,
  ChanopNotice,
  MemberStatus,
} from "../chanop/types.js";
import type { ChanopConfig } from "../config/schema.js";
import { createConfigLookup } from "../config/settings.js";

export type SentCommand = {
  server: string;
  channel?: string;
  command: string;
  delay: number;
};

type FakeMember = MemberStatus & { nick: string; user: string; host: string };

export type TestChanopHost = {
  host: ChanopHost;
  bus: ChanopEventBus;
  sent: SentCommand[];
  notices: ChanopNotice[];
  /** Sent command strings, in order. */
  commands: () => string[];
  activeTimers: () => number;
  /** Adds a member to the live channel state; no event is emitted. */
  addMember: (
    server: string,
    channel: string,
    hostmask: string,
    status?: Partial<MemberStatus>,
  ) => void;
  removeMember: (server: string, channel: string, nick: string) => void;
  setStatus: (server: string, channel: string, nick: string, status: Partial<MemberStatus>) => void;
  emit: (event: ChanopEvent) => void;
  /** Decodes and emits a raw line; returns whether it produced an event. */
  receive: (server: string, line: string) => boolean;
};

/** In-process host: recording transport, real event bus, mutable channel state. */
export function createTestChanopHost(
  params: { ownNick?: string; servers?: string[]; config?: ChanopConfig } = {},
): TestChanopHost {
  const ownNick = params.ownNick ?? "me";
  const servers = params.servers ?? ["libera"];
  const bus = createChanopEventBus();
  const sent: SentCommand[] = [];
  const notices: ChanopNotice[] = [];
  const channels = new CaseInsensitiveMap<ChannelKey, CaseInsensitiveMap<string, FakeMember>>();
  const timers = new Set<ReturnType<typeof setTimeout>>();

  const channelMembers = (server: string, channel: string) => {
    const members = channels.get([server, channel]);
    return members?.has(ownNick) ? members : undefined;
  };

  const host: ChanopHost = {
    send: (context, command, delay) => {
      sent.push({ server: context.server, channel: context.channel, command, delay });
    },
    events: bus,
    after: (ms, callback) => {
      const timer = setTimeout(() => {
        timers.delete(timer);
        callback();
      }, ms);
      timers.add(timer);
      return {
        cancel: () => {
          clearTimeout(timer);
          timers.delete(timer);
        },
      };
    },
    state: {
      ownNick: () => ownNick,
      member: (server, channel, nick) => {
        const member = channelMembers(server, channel)?.get(nick);
        return member ? { op: member.op, voice: member.voice } : undefined;
      },
      members: (server, channel) => {
        const members = channelMembers(server, channel);
        if (!members) {
          return undefined;
        }
        return [...members.values()].map((member) => ({
          nick: member.nick,
          host: `${member.user}@${member.host}`,
        }));
      },
      servers: () => [...servers],
      isChannel: isChannelName,
    },
    config: createConfigLookup(params.config),
    notify: (notice) => {
      notices.push(notice);
    },
  };

  const addMember: TestChanopHost["addMember"] = (server, channel, hostmask, status = {}) => {
    const { nick, user, host: hostname } = parseHostmask(hostmask);
    let members = channels.get([server, channel]);
    if (!members) {
      members = new CaseInsensitiveMap();
      channels.set([server, channel], members);
    }
    members.set(nick, {
      nick,
      user,
      host: hostname,
      op: status.op ?? false,
      voice: status.voice ?? false,
    });
  };

  return {
    host,
    bus,
    sent,
    notices,
    commands: () => sent.map((entry) => entry.command),
    activeTimers: () => timers.size,
    addMember,
    removeMember: (server, channel, nick) => {
      channels.get([server, channel])?.delete(nick);
    },
    setStatus: (server, channel, nick, status) => {
      const member = channels.get([server, channel])?.get(nick);
      if (member) {
        Object.assign(member, status);
      }
    },
    emit: (event) => bus.emit(event),
    receive: (server, line) => {
      const event = decodeIrcLine(server, line);
      if (!event) {
        return false;
      }
      bus.emit(event);
      return true;
    },
  };
}
