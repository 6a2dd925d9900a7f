import type { SubsystemLogger } from "../logging/subsystem.js";
import type { MaskMode, ServerCapabilities } from "./capabilities.js";
import { CaseInsensitiveMap } from "./casefold.js";
import { hostmaskPatternMatch, isHostmask, isNick, patternMatch } from "./hostmask.js";
import type { MaskFetchQueue, MaskFetchTarget } from "./mask-fetch.js";
import type { UserCache } from "./user-cache.js";
import type { ChannelKey } from "./types.js";

export const MASK_FETCH_COOLDOWN_MS = 60_000;

export type MaskRecord = {
  mask: string;
  /** Hostmasks of the cached users the mask matched when it was set. */
  hostmask?: string;
  operator?: string;
  /** Unix seconds. */
  date: number;
  expires?: number;
};

export type MaskFields = Partial<Omit<MaskRecord, "mask">>;

export class MaskList {
  /** Epoch ms of the last completed list fetch; 0 when never fetched. */
  fetchTime = 0;
  private readonly records = new CaseInsensitiveMap<string, MaskRecord>();

  get size(): number {
    return this.records.size;
  }

  get(mask: string): MaskRecord | undefined {
    return this.records.get(mask);
  }

  has(mask: string): boolean {
    return this.records.has(mask);
  }

  /** Upserts; on an existing mask only non-empty fields overwrite. */
  add(mask: string, fields: MaskFields, nowSeconds: number): MaskRecord {
    const existing = this.records.get(mask);
    if (existing) {
      if (fields.hostmask) {
        existing.hostmask = fields.hostmask;
      }
      if (fields.operator) {
        existing.operator = fields.operator;
      }
      if (fields.date) {
        existing.date = fields.date;
      }
      if (fields.expires) {
        existing.expires = fields.expires;
      }
      return existing;
    }
    const record: MaskRecord = {
      mask,
      hostmask: fields.hostmask || undefined,
      operator: fields.operator || undefined,
      date: fields.date || nowSeconds,
      expires: fields.expires || undefined,
    };
    this.records.set(mask, record);
    return record;
  }

  delete(mask: string): boolean {
    return this.records.delete(mask);
  }

  masks(): string[] {
    return [...this.records.keys()];
  }

  values(): MaskRecord[] {
    return [...this.records.values()];
  }

  searchByHostmask(hostmask: string): string[] {
    return this.masks().filter((mask) => hostmaskPatternMatch(mask, [hostmask]).length > 0);
  }

  searchByPattern(pattern: string): string[] {
    return patternMatch(pattern, this.masks());
  }

  // TODO: drop records past `expires` once expiring bans are tracked.
  purge(): number {
    return 0;
  }
}

/** Masks of one channel mode (bans or mutes) for every cached channel. */
export class MaskCache implements MaskFetchTarget {
  readonly mode: MaskMode;
  private readonly lists = new CaseInsensitiveMap<ChannelKey, MaskList>();
  private readonly users: UserCache;
  private readonly fetcher: MaskFetchQueue;
  private readonly capabilities: Pick<ServerCapabilities, "supportsMaskMode">;
  private readonly isChannel: (name: string) => boolean;
  private readonly now: () => number;
  private readonly log: SubsystemLogger;

  constructor(params: {
    mode: MaskMode;
    users: UserCache;
    fetcher: MaskFetchQueue;
    capabilities: Pick<ServerCapabilities, "supportsMaskMode">;
    isChannel: (name: string) => boolean;
    now: () => number;
    logger: SubsystemLogger;
  }) {
    this.mode = params.mode;
    this.users = params.users;
    this.fetcher = params.fetcher;
    this.capabilities = params.capabilities;
    this.isChannel = params.isChannel;
    this.now = params.now;
    this.log = params.logger;
  }

  get size(): number {
    return this.lists.size;
  }

  get(server: string, channel: string): MaskList | undefined {
    return this.lists.get([server, channel]);
  }

  has(server: string, channel: string): boolean {
    return this.lists.has([server, channel]);
  }

  keys(): ChannelKey[] {
    return [...this.lists.keys()];
  }

  private ensureList(server: string, channel: string): MaskList {
    const existing = this.lists.get([server, channel]);
    if (existing) {
      return existing;
    }
    const created = new MaskList();
    this.lists.set([server, channel], created);
    return created;
  }

  add(server: string, channel: string, mask: string, fields: MaskFields = {}): MaskRecord {
    return this.ensureList(server, channel).add(mask, fields, Math.floor(this.now() / 1000));
  }

  /** Removes one mask, or the channel's whole list when no mask is given. */
  remove(server: string, channel: string, mask?: string): boolean {
    if (mask === undefined) {
      return this.lists.delete([server, channel]);
    }
    return this.lists.get([server, channel])?.delete(mask) ?? false;
  }

  searchByHostmask(hostmask: string | undefined, server: string, channel: string): string[] {
    if (!hostmask) {
      return [];
    }
    return this.get(server, channel)?.searchByHostmask(hostmask) ?? [];
  }

  searchByPattern(pattern: string, server: string, channel: string): string[] {
    if (!pattern) {
      return [];
    }
    return this.get(server, channel)?.searchByPattern(pattern) ?? [];
  }

  searchByNick(nick: string, server: string, channel: string): string[] {
    return this.searchByHostmask(this.users.hostFromNick(nick, server, channel), server, channel);
  }

  search(value: string, server: string, channel: string): string[] {
    if (isNick(value)) {
      return this.searchByNick(value, server, channel);
    }
    if (isHostmask(value)) {
      return this.searchByHostmask(value, server, channel);
    }
    return this.searchByPattern(value, server, channel);
  }

  /** Requests the channel's list from the server; `false` when skipped. */
  fetch(server: string, channel: string): boolean {
    if (!this.capabilities.supportsMaskMode(server, this.mode)) {
      this.log.debug(`${server} does not support +${this.mode}, not fetching ${channel}`);
      return false;
    }
    const list = this.get(server, channel);
    if (list && this.now() - list.fetchTime < MASK_FETCH_COOLDOWN_MS) {
      return false;
    }
    if (!this.isChannel(channel)) {
      return false;
    }
    return this.fetcher.request({ server, channel, mode: this.mode, target: this });
  }

  completeFetch(server: string, channel: string): number {
    const list = this.ensureList(server, channel);
    list.fetchTime = this.now();
    return list.size;
  }

  purge(): number {
    let removed = 0;
    for (const list of this.lists.values()) {
      removed += list.purge();
    }
    return removed;
  }

  retain(keep: (key: ChannelKey) => boolean): ChannelKey[] {
    const dropped: ChannelKey[] = [];
    for (const [key, list] of [...this.lists]) {
      if (!keep(key)) {
        this.log.debug(
          `removing ${key[0]}.${key[1]} +${this.mode} list, not tracked (${list.size} items)`,
        );
        this.lists.delete(key);
        dropped.push(key);
      }
    }
    return dropped;
  }

  countMasks(): number {
    let total = 0;
    for (const list of this.lists.values()) {
      total += list.size;
    }
    return total;
  }
}
