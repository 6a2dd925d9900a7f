import { CaseInsensitiveMap, CaseInsensitiveSet } from "./casefold.js";
import type { ChannelKey } from "./types.js";

export type TrackedChannelsChange = (server: string, channels: string[]) => void;

/** Channels whose caches are kept, per server. */
export class TrackedChannels {
  private readonly byServer = new CaseInsensitiveMap<string, CaseInsensitiveSet<string>>();
  private readonly isChannel: (name: string) => boolean;
  private readonly onChange?: TrackedChannelsChange;

  constructor(params: { isChannel: (name: string) => boolean; onChange?: TrackedChannelsChange }) {
    this.isChannel = params.isChannel;
    this.onChange = params.onChange;
  }

  /** Adds the configured channels without reporting a change; runtime additions stay. */
  seed(server: string, channels: readonly string[]): void {
    const existing = this.byServer.get(server);
    const seeded = channels.filter(this.isChannel);
    if (!existing) {
      this.byServer.set(server, new CaseInsensitiveSet(seeded));
      return;
    }
    for (const channel of seeded) {
      existing.add(channel);
    }
  }

  add(server: string, channel: string): boolean {
    if (!channel || !this.isChannel(channel)) {
      return false;
    }
    let channels = this.byServer.get(server);
    if (!channels) {
      channels = new CaseInsensitiveSet();
      this.byServer.set(server, channels);
    }
    if (channels.has(channel)) {
      return false;
    }
    channels.add(channel);
    this.onChange?.(server, [...channels]);
    return true;
  }

  has(server: string, channel: string): boolean {
    return this.byServer.get(server)?.has(channel) ?? false;
  }

  hasKey(key: ChannelKey): boolean {
    return this.has(key[0], key[1]);
  }

  channels(server: string): string[] {
    return [...(this.byServer.get(server) ?? [])];
  }
}
