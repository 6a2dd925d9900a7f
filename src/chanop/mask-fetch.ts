import type { SubsystemLogger } from "../logging/subsystem.js";
import type { MaskMode } from "./capabilities.js";
import { equalsIgnoreCase } from "./casefold.js";
import type {
  ChanopHost,
  MaskListEndEvent,
  MaskListEntryEvent,
  SubscriptionHandle,
} from "./types.js";

export type MaskFetchTarget = {
  readonly mode: MaskMode;
  add: (
    server: string,
    channel: string,
    mask: string,
    fields: { operator?: string; date?: number },
  ) => void;
  /** Marks the list fetched and returns how many masks it now holds. */
  completeFetch: (server: string, channel: string) => number;
};

export type PendingMaskFetch = {
  server: string;
  channel: string;
  mode: MaskMode;
  target: MaskFetchTarget;
};

type ChannelRef = { server: string; channel: string };

function sameChannel(a: ChannelRef, b: ChannelRef): boolean {
  return equalsIgnoreCase(a.server, b.server) && equalsIgnoreCase(a.channel, b.channel);
}

/**
 * FIFO of in-flight mask list requests shared by every mask cache.
 *
 * List replies carry no request tag, so each entry reply is credited to the
 * head of the queue and each end-of-list reply pops it.
 */
export class MaskFetchQueue {
  private readonly pending: PendingMaskFetch[] = [];
  private subscriptions: SubscriptionHandle[] = [];
  private readonly host: Pick<ChanopHost, "send" | "events">;
  private readonly log: SubsystemLogger;

  constructor(params: { host: Pick<ChanopHost, "send" | "events">; logger: SubsystemLogger }) {
    this.host = params.host;
    this.log = params.logger;
  }

  get depth(): number {
    return this.pending.length;
  }

  get subscribed(): boolean {
    return this.subscriptions.length > 0;
  }

  entries(): ReadonlyArray<Omit<PendingMaskFetch, "target">> {
    return this.pending.map(({ server, channel, mode }) => ({ server, channel, mode }));
  }

  private isQueued(server: string, channel: string, mode: MaskMode): boolean {
    return this.pending.some((entry) => {
      return entry.mode === mode && sameChannel(entry, { server, channel });
    });
  }

  request(entry: PendingMaskFetch): boolean {
    if (this.isQueued(entry.server, entry.channel, entry.mode)) {
      return false;
    }
    this.pending.push(entry);
    if (!this.subscribed) {
      this.subscriptions = [
        this.host.events.subscribe("maskListEntry", (event) => this.handleEntry(event)),
        this.host.events.subscribe("maskListEnd", (event) => this.handleEnd(event)),
      ];
    }
    this.log.info(`Fetching ${entry.channel} masks (+${entry.mode} channelmode).`);
    // space out concurrent list requests
    this.host.send(
      { server: entry.server, channel: entry.channel },
      `MODE ${entry.channel} ${entry.mode}`,
      this.pending.length,
    );
    return true;
  }

  handleEntry(event: MaskListEntryEvent): void {
    const head = this.pending[0];
    if (!head) {
      this.log.debug(`ignoring mask ${event.mask} for ${event.server}.${event.channel}, no fetch`);
      return;
    }
    if (!sameChannel(head, event)) {
      this.log.warn("got mask from unexpected server/channel", {
        expected: `${head.server}.${head.channel}`,
        got: `${event.server}.${event.channel}`,
      });
    }
    head.target.add(head.server, head.channel, event.mask, {
      operator: event.operator,
      date: event.date,
    });
  }

  handleEnd(event: MaskListEndEvent): void {
    const head = this.pending.shift();
    if (!head) {
      this.log.debug(`ignoring end of list for ${event.server}.${event.channel}, no fetch`);
      return;
    }
    if (!sameChannel(head, event)) {
      this.log.warn("end of mask list from unexpected server/channel", {
        expected: `${head.server}.${head.channel}`,
        got: `${event.server}.${event.channel}`,
      });
    }
    const count = head.target.completeFetch(head.server, head.channel);
    this.log.info(`Got ${head.channel} +${head.mode} masks (${count} masks).`);
    if (this.pending.length === 0) {
      this.unsubscribe();
    }
  }

  clear(): void {
    this.pending.length = 0;
    this.unsubscribe();
  }

  private unsubscribe(): void {
    for (const handle of this.subscriptions) {
      this.host.events.unsubscribe(handle);
    }
    this.subscriptions = [];
  }
}
