import type { SubsystemLogger } from "../logging/subsystem.js";
import { CaseInsensitiveMap, equalsIgnoreCase } from "./casefold.js";
import type { ChannelKey, ChannelStateQuery } from "./types.js";

export const USER_REMOVAL_GRACE_MS = 60 * 60 * 1000;

/**
 * Nick → hostmask for one channel. Departed nicks stay visible until purged,
 * so bans can still be built against users who just left.
 */
export class UserList {
  private readonly users = new CaseInsensitiveMap<string, string>();
  private readonly pendingRemoval = new CaseInsensitiveMap<string, number>();

  get size(): number {
    return this.users.size;
  }

  get pendingCount(): number {
    return this.pendingRemoval.size;
  }

  get(nick: string): string | undefined {
    return this.users.get(nick);
  }

  has(nick: string): boolean {
    return this.users.has(nick);
  }

  set(nick: string, hostmask: string): void {
    this.users.setWithCasing(nick, hostmask);
    // a rejoin or nick change brings the user back
    this.pendingRemoval.delete(nick);
  }

  markRemoved(nick: string, now: number): void {
    if (this.users.has(nick)) {
      this.pendingRemoval.set(nick, now);
    }
  }

  pendingSince(nick: string): number | undefined {
    return this.pendingRemoval.get(nick);
  }

  /** Deletes nicks marked longer than `graceMs` ago; returns how many went. */
  purge(now: number, graceMs = USER_REMOVAL_GRACE_MS): number {
    let removed = 0;
    for (const [nick, since] of [...this.pendingRemoval]) {
      if (now - since > graceMs) {
        this.pendingRemoval.delete(nick);
        this.users.delete(nick);
        removed += 1;
      }
    }
    return removed;
  }

  nicks(): string[] {
    return [...this.users.keys()];
  }

  hostmasks(): string[] {
    return [...this.users.values()];
  }

  entries(): Array<[string, string]> {
    return [...this.users.entries()];
  }
}

export class UserCache {
  private readonly lists = new CaseInsensitiveMap<ChannelKey, UserList>();
  private readonly state: Pick<ChannelStateQuery, "members">;
  private readonly now: () => number;
  private readonly log: SubsystemLogger;

  constructor(params: {
    state: Pick<ChannelStateQuery, "members">;
    now: () => number;
    logger: SubsystemLogger;
  }) {
    this.state = params.state;
    this.now = params.now;
    this.log = params.logger;
  }

  get size(): number {
    return this.lists.size;
  }

  /** Replaces the cached list with the live member list; not stored when we are off-channel. */
  snapshot(server: string, channel: string): UserList {
    const users = new UserList();
    const members = this.state.members(server, channel);
    if (!members) {
      return users;
    }
    for (const member of members) {
      users.set(member.nick, `${member.nick}!${member.host}`);
    }
    this.lists.set([server, channel], users);
    this.log.debug(`cached ${users.size} users for ${server}.${channel}`);
    return users;
  }

  get(server: string, channel: string): UserList {
    return this.lists.get([server, channel]) ?? this.snapshot(server, channel);
  }

  peek(server: string, channel: string): UserList | undefined {
    return this.lists.get([server, channel]);
  }

  has(server: string, channel: string): boolean {
    return this.lists.has([server, channel]);
  }

  keys(): ChannelKey[] {
    return [...this.lists.keys()];
  }

  /** Cached channels of `server`, narrowed to those that know `nick` when given. */
  keysFor(server: string, nick?: string): ChannelKey[] {
    return [...this.lists]
      .filter(([key, users]) => {
        return equalsIgnoreCase(key[0], server) && (nick === undefined || users.has(nick));
      })
      .map(([key]) => key);
  }

  hostFromNick(nick: string, server: string, channel?: string): string | undefined {
    if (channel) {
      const hostmask = this.get(server, channel).get(nick);
      if (hostmask) {
        return hostmask;
      }
    }
    for (const key of this.keysFor(server, nick)) {
      const hostmask = this.lists.get(key)?.get(nick);
      if (hostmask) {
        return hostmask;
      }
    }
    return undefined;
  }

  /** Updates an already cached channel; uncached channels are filled lazily later. */
  onJoin(server: string, channel: string, nick: string, hostmask: string): void {
    this.lists.get([server, channel])?.set(nick, hostmask);
  }

  onPart(server: string, channel: string, nick: string): void {
    this.lists.get([server, channel])?.markRemoved(nick, this.now());
  }

  onQuit(nick: string, affected: readonly ChannelKey[]): void {
    const now = this.now();
    for (const key of affected) {
      this.lists.get(key)?.markRemoved(nick, now);
    }
  }

  onNick(
    oldNick: string,
    newNick: string,
    newHostmask: string,
    affected: readonly ChannelKey[],
  ): void {
    const now = this.now();
    for (const key of affected) {
      const users = this.lists.get(key);
      if (!users) {
        continue;
      }
      users.markRemoved(oldNick, now);
      users.set(newNick, newHostmask);
    }
  }

  remove(server: string, channel: string): boolean {
    return this.lists.delete([server, channel]);
  }

  purge(graceMs = USER_REMOVAL_GRACE_MS): number {
    const now = this.now();
    let removed = 0;
    for (const users of this.lists.values()) {
      removed += users.purge(now, graceMs);
    }
    return removed;
  }

  /** Drops lists for channels `keep` rejects; returns the dropped keys. */
  retain(keep: (key: ChannelKey) => boolean): ChannelKey[] {
    const dropped: ChannelKey[] = [];
    for (const [key, users] of [...this.lists]) {
      if (!keep(key)) {
        this.log.debug(`removing ${key[0]}.${key[1]} users, not tracked (${users.size} items)`);
        this.lists.delete(key);
        dropped.push(key);
      }
    }
    return dropped;
  }

  stats(): { channels: number; users: number; pending: number } {
    let users = 0;
    let pending = 0;
    for (const list of this.lists.values()) {
      users += list.size;
      pending += list.pendingCount;
    }
    return { channels: this.lists.size, users, pending };
  }
}
