import type { SubsystemLogger } from "../logging/subsystem.js";
import type { ModeChange } from "./capabilities.js";
import { equalsIgnoreCase } from "./casefold.js";
import type {
  ChanopHost,
  ModeEvent,
  SendContext,
  SubscriptionHandle,
  TimerHandle,
} from "./types.js";

export const MAX_QUEUED_STEPS = 20;
export const CONFIRMATION_TIMEOUT_MS = 60_000;

/**
 * One queued step. `delay` is the transport delay in seconds, fixed when the
 * step is enqueued.
 */
export type QueuedAction =
  | { type: "normal"; context: SendContext; command: string; delay: number }
  | {
      type: "suspendUntilConfirmed";
      server: string;
      channel: string;
      /** Nick expected to receive `+o`. */
      nick: string;
      command: string;
      delay: number;
    }
  | { type: "markChannelTracked"; server: string; channel: string; delay: number };

type WithoutDelay<T> = T extends unknown ? Omit<T, "delay"> : never;

export type QueueStep = WithoutDelay<QueuedAction>;

export type CommandQueueState = "idle" | "running" | "suspended" | "aborted";

type StepResult = "continue" | "halt";

type PendingConfirmation = {
  subscription: SubscriptionHandle;
  timer: TimerHandle;
};

export type CommandQueueParams = {
  host: Pick<ChanopHost, "send" | "events" | "after" | "state" | "notify">;
  parseModeChanges: (server: string, modes: string, args: readonly string[]) => ModeChange[];
  markTracked: (server: string, channel: string) => void;
  logger: SubsystemLogger;
};

function defaultSpacing(step: QueueStep): number {
  return step.type === "markChannelTracked" ? 0 : 1;
}

/**
 * Ordered, resumable sequence of outgoing commands.
 *
 * A suspend step sends its request and halts the queue until a mode event
 * grants `+o` to the expected nick, or until the confirmation times out.
 */
export class CommandQueue {
  private readonly steps: QueuedAction[] = [];
  private offset = 0;
  private current: CommandQueueState = "idle";
  private overflowed = false;
  private pending?: PendingConfirmation;
  private readonly host: CommandQueueParams["host"];
  private readonly parseModeChanges: CommandQueueParams["parseModeChanges"];
  private readonly markTracked: CommandQueueParams["markTracked"];
  private readonly log: SubsystemLogger;

  constructor(params: CommandQueueParams) {
    this.host = params.host;
    this.parseModeChanges = params.parseModeChanges;
    this.markTracked = params.markTracked;
    this.log = params.logger;
  }

  get state(): CommandQueueState {
    return this.current;
  }

  get length(): number {
    return this.steps.length;
  }

  /** Delay the next enqueued step will get. */
  get delayOffset(): number {
    return this.offset;
  }

  get isBusy(): boolean {
    return this.steps.length > 0 || this.current === "suspended";
  }

  snapshot(): readonly QueuedAction[] {
    return this.steps.map((step) => ({ ...step }));
  }

  /**
   * Appends a step; `spacing` is how far the following step is pushed back.
   * Returns `false` when the step was dropped by an overflow.
   */
  enqueue(step: QueueStep, spacing = defaultSpacing(step)): boolean {
    if (this.overflowed) {
      this.log.debug(`dropping ${step.type} step after overflow`);
      return false;
    }
    if (this.current === "aborted") {
      this.current = "idle";
    }
    this.steps.push({ ...step, delay: this.offset });
    this.offset += spacing;
    if (this.steps.length > MAX_QUEUED_STEPS) {
      this.abort(`Limit of ${MAX_QUEUED_STEPS} commands in queue reached, aborting.`, step);
      this.overflowed = true;
      return false;
    }
    return true;
  }

  run(): void {
    if (this.overflowed) {
      this.overflowed = false;
      return;
    }
    if (this.current === "running" || this.current === "suspended") {
      return;
    }
    this.current = "running";
    for (let step = this.steps.shift(); step; step = this.steps.shift()) {
      if (this.execute(step) === "halt") {
        this.current = "suspended";
        return;
      }
    }
    this.offset = 0;
    this.current = "idle";
  }

  clear(): void {
    this.reset();
    this.overflowed = false;
    this.current = "idle";
  }

  private reset(): void {
    this.steps.length = 0;
    this.offset = 0;
    this.cancelConfirmation();
  }

  private abort(message: string, step: QueueStep): void {
    this.log.error(message);
    this.reset();
    this.current = "aborted";
    this.host.notify({ ...stepContext(step), level: "error", message });
  }

  private execute(step: QueuedAction): StepResult {
    switch (step.type) {
      case "normal":
        this.host.send(step.context, step.command, step.delay);
        return "continue";
      case "markChannelTracked":
        this.markTracked(step.server, step.channel);
        return "continue";
      case "suspendUntilConfirmed":
        return this.suspend(step);
    }
  }

  private suspend(step: Extract<QueuedAction, { type: "suspendUntilConfirmed" }>): StepResult {
    const { server, channel, nick } = step;
    if (this.host.state.member(server, channel, nick)?.op) {
      this.log.debug(`already op in ${server}.${channel}, not requesting`);
      return "continue";
    }
    this.cancelConfirmation();
    const subscription = this.host.events.subscribe("mode", (event) => {
      if (this.confirms(event, step)) {
        this.log.debug(`got op in ${server}.${channel}`);
        this.cancelConfirmation();
        this.current = "idle";
        this.run();
      }
    });
    const timer = this.host.after(CONFIRMATION_TIMEOUT_MS, () => {
      this.abort(`Couldn't get op in '${server}.${channel}', purging command queue...`, step);
    });
    this.pending = { subscription, timer };
    this.host.send({ server, channel }, step.command, step.delay);
    return "halt";
  }

  private confirms(
    event: ModeEvent,
    step: { server: string; channel: string; nick: string },
  ): boolean {
    if (!equalsIgnoreCase(event.server, step.server)) {
      return false;
    }
    if (!equalsIgnoreCase(event.channel, step.channel)) {
      return false;
    }
    return this.parseModeChanges(event.server, event.modes, event.args).some(
      (change) =>
        change.action === "+" &&
        change.mode === "o" &&
        change.arg !== undefined &&
        equalsIgnoreCase(change.arg, step.nick),
    );
  }

  private cancelConfirmation(): void {
    if (!this.pending) {
      return;
    }
    this.host.events.unsubscribe(this.pending.subscription);
    this.pending.timer.cancel();
    this.pending = undefined;
  }
}

function stepContext(step: QueueStep): SendContext {
  if (step.type === "normal") {
    return step.context;
  }
  return { server: step.server, channel: step.channel };
}
