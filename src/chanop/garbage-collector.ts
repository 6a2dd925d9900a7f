import type { SubsystemLogger } from "../logging/subsystem.js";
import type { MaskMode } from "./capabilities.js";
import { patternCacheSize } from "./hostmask.js";
import type { MaskCache } from "./mask-cache.js";
import type { TrackedChannels } from "./tracked-channels.js";
import type { ChanopHost, TimerHandle } from "./types.js";
import type { UserCache } from "./user-cache.js";

export const GARBAGE_COLLECT_INTERVAL_MS = 30 * 60 * 1000;

export type GarbageCollectionReport = {
  purgedUsers: number;
  purgedMasks: number;
  droppedUserLists: number;
  droppedMaskLists: number;
};

export function collectGarbage(params: {
  users: UserCache;
  masks: Readonly<Record<MaskMode, MaskCache>>;
  tracked: TrackedChannels;
  logger: SubsystemLogger;
}): GarbageCollectionReport {
  const { users, tracked, logger: log } = params;
  const caches = Object.values(params.masks);
  const keep = (key: readonly [string, string]) => tracked.hasKey(key);

  let purgedMasks = 0;
  let droppedMaskLists = 0;
  for (const cache of caches) {
    purgedMasks += cache.purge();
    droppedMaskLists += cache.retain(keep).length;
  }
  const purgedUsers = users.purge();
  const droppedUserLists = users.retain(keep).length;

  const stats = users.stats();
  for (const cache of caches) {
    const count = cache.countMasks();
    log.debug(`collector: ${count} '${cache.mode}' cached masks in ${cache.size} channels`);
  }
  log.debug(`collector: ${stats.users} cached users in ${stats.channels} channels`);
  log.debug(`collector: ${stats.pending} users about to be purged`);
  log.debug(`collector: ${patternCacheSize()} cached regexps`);
  return { purgedUsers, purgedMasks, droppedUserLists, droppedMaskLists };
}

/** Runs `collect` every `intervalMs` until cancelled. A failed run is logged and retried. */
export function scheduleGarbageCollector(params: {
  after: ChanopHost["after"];
  collect: () => void;
  logger: SubsystemLogger;
  intervalMs?: number;
}): TimerHandle {
  const intervalMs = params.intervalMs ?? GARBAGE_COLLECT_INTERVAL_MS;
  let timer: TimerHandle | undefined;
  let stopped = false;
  const arm = () => {
    timer = params.after(intervalMs, () => {
      if (stopped) {
        return;
      }
      arm();
      try {
        params.collect();
      } catch (err) {
        params.logger.error(`garbage collection failed: ${String(err)}`);
      }
    });
  };
  arm();
  return {
    cancel: () => {
      stopped = true;
      timer?.cancel();
    },
  };
}
