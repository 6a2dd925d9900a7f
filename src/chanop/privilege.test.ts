import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ChanopConfig } from "../config/schema.js";
import { createSettingsReader } from "../config/settings.js";
import { createTestChanopHost } from "../test-utils/chanop-host.js";
import { createRecordingLogger } from "../test-utils/recording-logger.js";
import { createServerCapabilities } from "./capabilities.js";
import { CommandQueue } from "./command-queue.js";
import { ChanopConfigError } from "./errors.js";
import { PrivilegeCoordinator, RELEASE_RECHECK_MS, expandCommandVariables } from "./privilege.js";

function setup(params: { op?: boolean; config?: ChanopConfig } = {}) {
  const testHost = createTestChanopHost({ config: params.config });
  testHost.addMember("libera", "#ops", "me!m@self.example", { op: params.op ?? false });
  testHost.addMember("libera", "#ops", "bob!b@h2.example");
  const logger = createRecordingLogger();
  const settings = createSettingsReader(testHost.host.config, logger);
  const capabilities = createServerCapabilities(settings);
  const queue = new CommandQueue({
    host: testHost.host,
    parseModeChanges: capabilities.parseModeChanges,
    markTracked: () => {},
    logger,
  });
  const privilege = new PrivilegeCoordinator({ host: testHost.host, queue, settings, logger });
  const kickBob = (reason = "bye") => () => {
    queue.enqueue({
      type: "normal",
      context: { server: "libera", channel: "#ops" },
      command: `KICK #ops bob :${reason}`,
    });
    return true;
  };
  const grantOp = () => {
    testHost.setStatus("libera", "#ops", "me", { op: true });
    testHost.receive("libera", ":ChanServ!s@services MODE #ops +o me");
  };
  return { testHost, logger, queue, privilege, kickBob, grantOp };
}

describe("expandCommandVariables", () => {
  it("substitutes server, channel and nick", () => {
    expect(
      expandCommandVariables("$server $channel $nick", {
        server: "libera",
        channel: "#ops",
        nick: "me",
      }),
    ).toBe("libera #ops me");
  });

  it("leaves unknown variables and a missing nick alone", () => {
    expect(expandCommandVariables("$servers $nick", { server: "libera", channel: "#ops" })).toBe(
      "$servers $nick",
    );
  });
});

describe("PrivilegeCoordinator", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("reports privilege only for joined channels", () => {
    const { privilege } = setup({ op: true });
    expect(privilege.hasPrivilege("libera", "#ops")).toBe(true);
    expect(privilege.hasPrivilege("libera", "#elsewhere")).toBeUndefined();
  });

  it("requests op before the action and releases after the delay", () => {
    const { testHost, queue, privilege, kickBob, grantOp } = setup();

    expect(privilege.runPrivileged("libera", "#ops", kickBob())).toBe(true);
    expect(queue.snapshot().map((step) => step.type)).toEqual([
      "suspendUntilConfirmed",
      "markChannelTracked",
      "normal",
    ]);
    expect(privilege.hasPendingRelease("libera", "#ops")).toBe(true);
    expect(testHost.activeTimers()).toBe(1);

    queue.run();
    expect(testHost.activeTimers()).toBe(2);
    grantOp();
    expect(testHost.commands()).toEqual(["PRIVMSG ChanServ :OP #ops me", "KICK #ops bob :bye"]);
    expect(testHost.activeTimers()).toBe(1);

    vi.advanceTimersByTime(100_000);
    privilege.runPrivileged("libera", "#ops", kickBob("again"));
    expect(queue.snapshot().map((step) => step.type)).toEqual(["markChannelTracked", "normal"]);
    expect(testHost.activeTimers()).toBe(1);
    queue.run();

    vi.advanceTimersByTime(179_999);
    expect(testHost.commands().at(-1)).toBe("KICK #ops bob :again");
    vi.advanceTimersByTime(1);
    expect(testHost.sent.at(-1)).toEqual({
      server: "libera",
      channel: "#ops",
      command: "MODE #ops -o me",
      delay: 0,
    });
    expect(privilege.pendingReleases).toBe(0);
  });

  it("waits for a busy queue before releasing", () => {
    const { testHost, logger, queue, privilege, kickBob } = setup();
    privilege.runPrivileged("libera", "#ops", kickBob());

    vi.advanceTimersByTime(180_000);
    expect(privilege.hasPendingRelease("libera", "#ops")).toBe(true);
    expect(logger.messages("debug")).toContain("queue busy, delaying deop in libera.#ops");

    queue.clear();
    vi.advanceTimersByTime(RELEASE_RECHECK_MS);
    expect(privilege.pendingReleases).toBe(0);
    // never got op, so there is nothing to drop
    expect(testHost.sent).toEqual([]);
  });

  it("queues the release right away with a zero delay", () => {
    const { queue, privilege, kickBob } = setup({
      config: {
        settings: { autodeop_delay: "0" },
        servers: {
          libera: { channels: { "#ops": { deop_command: "PRIVMSG ChanServ :DEOP $channel" } } },
        },
      },
    });

    privilege.runPrivileged("libera", "#ops", kickBob());

    const last = queue.snapshot().at(-1);
    expect(last?.type === "normal" ? last.command : undefined).toBe(
      "PRIVMSG ChanServ :DEOP #ops",
    );
    expect(privilege.pendingReleases).toBe(0);
  });

  it("fails before queuing when no op command is configured", () => {
    const { queue, privilege, kickBob } = setup({ config: { settings: { op_command: " " } } });

    expect(() => privilege.runPrivileged("libera", "#ops", kickBob())).toThrow(
      ChanopConfigError,
    );
    expect(queue.length).toBe(0);
  });

  it("leaves op it did not request alone", () => {
    const { queue, privilege, kickBob } = setup({ op: true });

    privilege.runPrivileged("libera", "#ops", kickBob());

    expect(queue.snapshot().map((step) => step.type)).toEqual(["markChannelTracked", "normal"]);
    expect(privilege.pendingReleases).toBe(0);
  });

  it("does nothing off-channel", () => {
    const { queue, privilege } = setup();
    const action = vi.fn(() => true);

    expect(privilege.runPrivileged("libera", "#elsewhere", action)).toBe(false);
    expect(action).not.toHaveBeenCalled();
    expect(queue.length).toBe(0);
  });

  it("clears the queue when the action finds nothing", () => {
    const { queue, privilege } = setup();

    expect(privilege.runPrivileged("libera", "#ops", () => false)).toBe(false);
    expect(queue.length).toBe(0);
    expect(privilege.pendingReleases).toBe(0);
  });

  it("skips the release when autodeop is off", () => {
    const { privilege, kickBob } = setup({ config: { settings: { autodeop: "off" } } });
    privilege.runPrivileged("libera", "#ops", kickBob());
    expect(privilege.pendingReleases).toBe(0);
  });

  it("keeps op on an explicit request", () => {
    const { logger, queue, privilege, kickBob, grantOp } = setup();
    privilege.runPrivileged("libera", "#ops", kickBob());
    queue.run();
    grantOp();

    expect(privilege.requestOp("libera", "#ops")).toBe(true);
    expect(privilege.hasPendingRelease("libera", "#ops")).toBe(false);
    expect(logger.messages("debug")).toContain("keeping op in libera.#ops");
  });

  it("releases only held op", () => {
    const opped = setup({ op: true });
    expect(opped.privilege.release("libera", "#ops")).toBe(true);
    expect(opped.queue.snapshot()).toEqual([
      {
        type: "normal",
        context: { server: "libera", channel: "#ops" },
        command: "MODE #ops -o me",
        delay: 0,
      },
    ]);

    const plain = setup();
    expect(plain.privilege.release("libera", "#ops")).toBe(false);
    expect(plain.queue.length).toBe(0);
  });
});
