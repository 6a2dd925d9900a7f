import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSettingsReader } from "../config/settings.js";
import { createTestChanopHost } from "../test-utils/chanop-host.js";
import { createRecordingLogger } from "../test-utils/recording-logger.js";
import { type MaskMode, createServerCapabilities } from "./capabilities.js";
import { collectGarbage, scheduleGarbageCollector } from "./garbage-collector.js";
import { isChannelName } from "./hostmask.js";
import { MaskCache } from "./mask-cache.js";
import { MaskFetchQueue } from "./mask-fetch.js";
import { TrackedChannels } from "./tracked-channels.js";
import { USER_REMOVAL_GRACE_MS, UserCache } from "./user-cache.js";

describe("collectGarbage", () => {
  it("purges departed users and drops untracked channels", () => {
    const testHost = createTestChanopHost();
    testHost.addMember("libera", "#ops", "me!m@self.example");
    testHost.addMember("libera", "#ops", "bob!b@h2.example");
    testHost.addMember("libera", "#old", "me!m@self.example");
    const logger = createRecordingLogger();
    const clock = { now: 0 };
    const now = () => clock.now;
    const users = new UserCache({ state: testHost.host.state, now, logger });
    const fetcher = new MaskFetchQueue({ host: testHost.host, logger });
    const capabilities = createServerCapabilities(
      createSettingsReader(testHost.host.config, logger),
    );
    const makeCache = (mode: MaskMode) =>
      new MaskCache({ mode, users, fetcher, capabilities, isChannel: isChannelName, now, logger });
    const masks = { b: makeCache("b"), q: makeCache("q") };
    const tracked = new TrackedChannels({ isChannel: isChannelName });
    tracked.add("libera", "#ops");

    users.snapshot("libera", "#ops");
    users.snapshot("libera", "#old");
    masks.b.add("libera", "#ops", "*!*@kept");
    masks.b.add("libera", "#old", "*!*@gone");
    masks.q.add("libera", "#old", "*!*@quiet");
    users.onPart("libera", "#ops", "bob");
    clock.now = USER_REMOVAL_GRACE_MS + 1;

    const report = collectGarbage({ users, masks, tracked, logger });

    expect(report).toEqual({
      purgedUsers: 1,
      purgedMasks: 0,
      droppedUserLists: 1,
      droppedMaskLists: 2,
    });
    expect(users.keys()).toEqual([["libera", "#ops"]]);
    expect(masks.b.keys()).toEqual([["libera", "#ops"]]);
    expect(logger.messages("debug").filter((line) => line.startsWith("collector:"))).toEqual([
      "collector: 1 'b' cached masks in 1 channels",
      "collector: 0 'q' cached masks in 0 channels",
      "collector: 1 cached users in 1 channels",
      "collector: 0 users about to be purged",
      expect.stringMatching(/^collector: \d+ cached regexps$/),
    ]);
  });
});

describe("scheduleGarbageCollector", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs on every interval until cancelled", () => {
    const testHost = createTestChanopHost();
    const collect = vi.fn();
    const handle = scheduleGarbageCollector({
      after: testHost.host.after,
      collect,
      logger: createRecordingLogger(),
      intervalMs: 1_000,
    });

    vi.advanceTimersByTime(3_500);
    expect(collect).toHaveBeenCalledTimes(3);

    handle.cancel();
    vi.advanceTimersByTime(5_000);
    expect(collect).toHaveBeenCalledTimes(3);
    expect(testHost.activeTimers()).toBe(0);
  });

  it("keeps running after a failed collection", () => {
    const testHost = createTestChanopHost();
    const logger = createRecordingLogger();
    const collect = vi
      .fn<() => void>()
      .mockImplementationOnce(() => {
        throw new Error("boom");
      });
    const handle = scheduleGarbageCollector({
      after: testHost.host.after,
      collect,
      logger,
      intervalMs: 1_000,
    });

    vi.advanceTimersByTime(2_500);
    expect(collect).toHaveBeenCalledTimes(2);
    expect(logger.messages("error")).toEqual(["garbage collection failed: Error: boom"]);

    handle.cancel();
    expect(testHost.activeTimers()).toBe(0);
  });
});
