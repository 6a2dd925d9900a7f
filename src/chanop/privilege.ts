import type { SettingsReader } from "../config/settings.js";
import type { SubsystemLogger } from "../logging/subsystem.js";
import { CaseInsensitiveMap } from "./casefold.js";
import type { CommandQueue } from "./command-queue.js";
import { ChanopConfigError } from "./errors.js";
import type { ChannelKey, ChanopHost, TimerHandle } from "./types.js";

export const RELEASE_RECHECK_MS = 5_000;

export type CommandVariables = {
  server: string;
  channel: string;
  nick?: string;
};

/** Expands `$server`, `$channel` and `$nick` in a configured command. */
export function expandCommandVariables(command: string, vars: CommandVariables): string {
  return command.replace(/\$(server|channel|nick)\b/g, (match, name: string) => {
    if (name === "server") {
      return vars.server;
    }
    if (name === "channel") {
      return vars.channel;
    }
    return vars.nick ?? match;
  });
}

/**
 * Acquires channel operator status around privileged actions and drops it
 * again after `autodeop_delay`.
 */
export class PrivilegeCoordinator {
  private readonly releaseTimers = new CaseInsensitiveMap<ChannelKey, TimerHandle>();
  private readonly host: Pick<ChanopHost, "after" | "state">;
  private readonly queue: CommandQueue;
  private readonly settings: SettingsReader;
  private readonly log: SubsystemLogger;

  constructor(params: {
    host: Pick<ChanopHost, "after" | "state">;
    queue: CommandQueue;
    settings: SettingsReader;
    logger: SubsystemLogger;
  }) {
    this.host = params.host;
    this.queue = params.queue;
    this.settings = params.settings;
    this.log = params.logger;
  }

  /** `undefined` when we are not on the channel. */
  hasPrivilege(server: string, channel: string): boolean | undefined {
    const nick = this.host.state.ownNick(server);
    if (!nick) {
      return undefined;
    }
    return this.host.state.member(server, channel, nick)?.op;
  }

  hasPendingRelease(server: string, channel: string): boolean {
    return this.releaseTimers.has([server, channel]);
  }

  get pendingReleases(): number {
    return this.releaseTimers.size;
  }

  /**
   * Queues the op request when not opped, then marks the channel tracked.
   * Returns the privilege state seen before queuing.
   */
  acquire(server: string, channel: string): boolean | undefined {
    const op = this.hasPrivilege(server, channel);
    if (op === undefined) {
      return undefined;
    }
    if (!op) {
      const command = this.settings.string("op_command", { server, channel }).trim();
      if (!command) {
        throw new ChanopConfigError("No command defined for get op.", "op_command");
      }
      const nick = this.host.state.ownNick(server) ?? "";
      this.queue.enqueue({
        type: "suspendUntilConfirmed",
        server,
        channel,
        nick,
        command: expandCommandVariables(command, { server, channel, nick }),
      });
    }
    this.queue.enqueue({ type: "markChannelTracked", server, channel });
    return op;
  }

  /** `op` command: acquire, and stay opped when a release was pending. */
  requestOp(server: string, channel: string): boolean | undefined {
    const op = this.acquire(server, channel);
    if (op === true && this.cancelRelease(server, channel)) {
      this.log.debug(`keeping op in ${server}.${channel}`);
    }
    return op;
  }

  /** Queues the deop command when we hold op; returns whether it was queued. */
  release(server: string, channel: string): boolean {
    this.cancelRelease(server, channel);
    if (this.hasPrivilege(server, channel) !== true) {
      return false;
    }
    this.queueRelease(server, channel);
    return true;
  }

  /**
   * Runs `action` with op. `action` returns `false` when it found nothing to
   * do; the queue is then cleared and no release is scheduled.
   */
  runPrivileged(server: string, channel: string, action: () => boolean): boolean {
    const op = this.acquire(server, channel);
    if (op === undefined) {
      return false;
    }
    // Op we did not request ourselves is left alone.
    const manual = op && !this.releaseTimers.has([server, channel]);
    if (!action()) {
      this.queue.clear();
      return false;
    }
    const scope = { server, channel };
    if (manual || !this.settings.boolean("autodeop", scope)) {
      return true;
    }
    const delay = this.settings.integer("autodeop_delay", scope);
    if (delay > 0) {
      this.scheduleRelease(server, channel, delay * 1000);
    } else {
      this.cancelRelease(server, channel);
      this.queueRelease(server, channel);
    }
    return true;
  }

  cancelRelease(server: string, channel: string): boolean {
    const timer = this.releaseTimers.get([server, channel]);
    if (!timer) {
      return false;
    }
    timer.cancel();
    this.releaseTimers.delete([server, channel]);
    return true;
  }

  stop(): void {
    for (const timer of this.releaseTimers.values()) {
      timer.cancel();
    }
    this.releaseTimers.clear();
  }

  private scheduleRelease(server: string, channel: string, ms: number): void {
    this.cancelRelease(server, channel);
    this.releaseTimers.set(
      [server, channel],
      this.host.after(ms, () => this.onReleaseDue(server, channel)),
    );
  }

  private onReleaseDue(server: string, channel: string): void {
    if (this.queue.isBusy) {
      this.log.debug(`queue busy, delaying deop in ${server}.${channel}`);
      this.scheduleRelease(server, channel, RELEASE_RECHECK_MS);
      return;
    }
    this.releaseTimers.delete([server, channel]);
    if (this.release(server, channel)) {
      this.queue.run();
    }
  }

  private queueRelease(server: string, channel: string): void {
    const scope = { server, channel };
    const command =
      this.settings.string("deop_command", scope).trim() || "MODE $channel -o $nick";
    const nick = this.host.state.ownNick(server);
    this.queue.enqueue({
      type: "normal",
      context: scope,
      command: expandCommandVariables(command, { server, channel, nick }),
    });
  }
}
