import { createLogger } from "../logger";
import type { Scheduler } from "../scheduler";
import type { TransportWorker } from "../transport/types";
import type { ProgressMode } from "../types/types";
import { drainWorker } from "./drain";
import { CompletionNotifier } from "./notifier";

const logger = createLogger("progress");

/** One drain strategy bound to one scheduler. */
export interface ProgressEngine {
  readonly mode: ProgressMode;
  readonly scheduler: Scheduler;
  readonly running: boolean;
  stop(): Promise<void>;
}

export interface ProgressEngineOptions {
  /** Bound on each blocking wait of the notifier thread. */
  periodMs: number;
  /**
   * Watch the doorbell from a notifier thread. When false, the worker's
   * in-thread doorbell listener wakes the scheduler instead. Defaults to true.
   */
  notifier?: boolean;
}

/**
 * Every doorbell ring is handed to the scheduler, which runs submissions and
 * settles completions on its own turn. With the notifier, a background thread
 * watches the doorbell (blocking or spinning per mode) and posts the rings
 * back; without it, the worker reports them on this thread.
 */
export class ThreadProgressEngine implements ProgressEngine {
  private readonly notifier: CompletionNotifier | null;
  private readonly unsubscribe: (() => void) | null;
  private tickScheduled = false;
  private active = true;

  constructor(
    readonly mode: "thread" | "thread-polling",
    private readonly worker: TransportWorker,
    readonly scheduler: Scheduler,
    options: ProgressEngineOptions,
  ) {
    if (options.notifier ?? true) {
      this.notifier = new CompletionNotifier({
        doorbell: worker.doorbell,
        periodMs: options.periodMs,
        polling: mode === "thread-polling",
        onTick: () => this.scheduleTick(),
      });
      this.unsubscribe = null;
    } else {
      this.notifier = null;
      this.unsubscribe = worker.onDoorbell(() => this.scheduleTick());
    }
    // Work queued before this engine existed.
    this.scheduleTick();
  }

  get usesNotifierThread(): boolean {
    return this.notifier !== null;
  }

  get running(): boolean {
    return this.active;
  }

  async stop(): Promise<void> {
    if (!this.active) return;
    this.active = false;
    this.unsubscribe?.();
    await this.notifier?.stop();
    drainWorker(this.worker);
  }

  private scheduleTick(): void {
    if (this.tickScheduled || !this.active) return;
    this.tickScheduled = true;
    this.scheduler.schedule(() => {
      this.tickScheduled = false;
      if (!this.active) return;
      if (drainWorker(this.worker)) this.scheduleTick();
    });
  }
}

/** No thread: a task that drains, yields to the scheduler and drains again. */
export class PollingProgressEngine implements ProgressEngine {
  readonly mode = "polling" as const;
  private active = true;
  private readonly loop: Promise<void>;

  constructor(
    private readonly worker: TransportWorker,
    readonly scheduler: Scheduler,
  ) {
    this.loop = this.run().catch(err => {
      this.active = false;
      logger.error(`polling loop on "${scheduler.name}" stopped`, err);
    });
  }

  get running(): boolean {
    return this.active;
  }

  async stop(): Promise<void> {
    this.active = false;
    await this.loop;
  }

  private async run(): Promise<void> {
    while (this.active) {
      drainWorker(this.worker);
      await this.scheduler.yield();
    }
  }
}

export function createProgressEngine(
  mode: ProgressMode,
  worker: TransportWorker,
  scheduler: Scheduler,
  options: ProgressEngineOptions,
): ProgressEngine {
  logger.debug(`starting ${mode} progress on scheduler "${scheduler.name}"`);
  if (mode === "polling") return new PollingProgressEngine(worker, scheduler);
  return new ThreadProgressEngine(mode, worker, scheduler, options);
}

export { drainWorker, MAX_DRAIN_ROUNDS } from "./drain";
export { CompletionNotifier, type NotifierOptions } from "./notifier";
