import { createSettingsReader } from "../config/settings.js";
import { type SubsystemLogger, createSubsystemLogger } from "../logging/subsystem.js";
import {
  type MaskMode,
  type ServerCapabilities,
  createServerCapabilities,
} from "./capabilities.js";
import { CommandQueue } from "./command-queue.js";
import {
  type CommandInvocation,
  type CommandTable,
  createCommandTable,
  isChanopCommandName,
} from "./commands.js";
import { ChanopArgumentError, ChanopError } from "./errors.js";
import {
  type GarbageCollectionReport,
  collectGarbage,
  scheduleGarbageCollector,
} from "./garbage-collector.js";
import { MaskCache } from "./mask-cache.js";
import { MaskFetchQueue } from "./mask-fetch.js";
import { PrivilegeCoordinator } from "./privilege.js";
import { createReconcileHandlers } from "./reconcile.js";
import { TrackedChannels, type TrackedChannelsChange } from "./tracked-channels.js";
import type { ChanopHost, SubscriptionHandle, TimerHandle } from "./types.js";
import { UserCache } from "./user-cache.js";

export type ChanopServiceOptions = {
  host: ChanopHost;
  logger?: SubsystemLogger;
  now?: () => number;
  /** Called with the full channel list whenever a channel becomes tracked. */
  onWatchlistChange?: TrackedChannelsChange;
  gcIntervalMs?: number;
};

export type ChanopService = {
  readonly running: boolean;
  readonly users: UserCache;
  readonly masks: Readonly<Record<MaskMode, MaskCache>>;
  readonly queue: CommandQueue;
  readonly privilege: PrivilegeCoordinator;
  readonly tracked: TrackedChannels;
  readonly capabilities: ServerCapabilities;
  readonly fetcher: MaskFetchQueue;
  readonly commands: CommandTable;
  start: () => void;
  stop: () => void;
  /** Runs an operator command and then the queue; returns lines to show. */
  execute: (name: string, invocation: CommandInvocation) => string[];
  collectGarbage: () => GarbageCollectionReport;
};

export function createChanopService(options: ChanopServiceOptions): ChanopService {
  const { host } = options;
  const log = options.logger ?? createSubsystemLogger("chanop");
  const now = options.now ?? Date.now;
  const settings = createSettingsReader(host.config, log.child("config"));
  const capabilities = createServerCapabilities(settings);
  const isChannel = (name: string) => host.state.isChannel(name);

  const tracked = new TrackedChannels({ isChannel, onChange: options.onWatchlistChange });
  const users = new UserCache({ state: host.state, now, logger: log.child("users") });
  const fetcher = new MaskFetchQueue({ host, logger: log.child("fetch") });
  const createMaskCache = (mode: MaskMode) =>
    new MaskCache({
      mode,
      users,
      fetcher,
      capabilities,
      isChannel,
      now,
      logger: log.child(`masks/${mode}`),
    });
  const masks: Readonly<Record<MaskMode, MaskCache>> = {
    b: createMaskCache("b"),
    q: createMaskCache("q"),
  };
  const queue = new CommandQueue({
    host,
    parseModeChanges: capabilities.parseModeChanges,
    markTracked: (server, channel) => {
      if (tracked.add(server, channel)) {
        log.debug(`adding ${channel} to the watchlist of ${server}`);
      }
    },
    logger: log.child("queue"),
  });
  const privilege = new PrivilegeCoordinator({
    host,
    queue,
    settings,
    logger: log.child("privilege"),
  });
  const commands = createCommandTable({
    host,
    settings,
    queue,
    privilege,
    users,
    masks,
    capabilities,
    now,
    logger: log.child("commands"),
  });
  const handlers = createReconcileHandlers({
    host,
    settings,
    users,
    masks,
    tracked,
    capabilities,
    logger: log.child("reconcile"),
  });

  let subscriptions: SubscriptionHandle[] = [];
  let collector: TimerHandle | undefined;

  const runCollector = () =>
    collectGarbage({ users, masks, tracked, logger: log.child("gc") });

  const start = () => {
    if (collector) {
      return;
    }
    subscriptions = [
      host.events.subscribe("join", handlers.join),
      host.events.subscribe("part", handlers.part),
      host.events.subscribe("quit", handlers.quit),
      host.events.subscribe("nick", handlers.nick),
      host.events.subscribe("mode", handlers.mode),
      host.events.subscribe("isupport", handlers.isupport),
      host.events.subscribe("connected", handlers.connected),
    ];
    for (const server of host.state.servers()) {
      handlers.connected({ kind: "connected", server });
    }
    collector = scheduleGarbageCollector({
      after: host.after,
      collect: () => {
        runCollector();
      },
      logger: log.child("gc"),
      intervalMs: options.gcIntervalMs,
    });
    log.info(`started for ${host.state.servers().length} connected servers`);
  };

  const stop = () => {
    for (const handle of subscriptions) {
      host.events.unsubscribe(handle);
    }
    subscriptions = [];
    collector?.cancel();
    collector = undefined;
    privilege.stop();
    queue.clear();
    fetcher.clear();
  };

  const execute = (name: string, invocation: CommandInvocation): string[] => {
    try {
      if (!isChanopCommandName(name)) {
        throw new ChanopArgumentError(`Unknown command '${name}'.`);
      }
      const lines = commands[name](invocation);
      queue.run();
      return lines;
    } catch (err) {
      if (!(err instanceof ChanopError)) {
        throw err;
      }
      log.warn(`${name} failed: ${err.message}`, { server: invocation.server });
      host.notify({
        server: invocation.server,
        channel: invocation.channel,
        level: "error",
        message: err.message,
      });
      return [];
    }
  };

  return {
    get running() {
      return collector !== undefined;
    },
    users,
    masks,
    queue,
    privilege,
    tracked,
    capabilities,
    fetcher,
    commands,
    start,
    stop,
    execute,
    collectGarbage: runCollector,
  };
}
