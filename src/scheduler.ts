import { createLogger } from "./logger";

const logger = createLogger("scheduler");

/**
 * A cooperative scheduler instance. Progress bindings are keyed by it, and
 * completions signalled from the notifier thread are run through it.
 */
export interface Scheduler {
  readonly name: string;
  schedule(task: () => void): void;
  /** Resolve after other queued work has had a turn. */
  yield(): Promise<void>;
}

const runTask = (scheduler: Scheduler, task: () => void): void => {
  try {
    task();
  } catch (err) {
    logger.error(`task on scheduler "${scheduler.name}" threw`, err);
  }
};

class ImmediateScheduler implements Scheduler {
  constructor(readonly name: string) {}

  schedule(task: () => void): void {
    setImmediate(() => runTask(this, task));
  }

  yield(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
  }
}

/**
 * Batches tasks into a private run queue that is flushed once per event loop
 * turn.
 */
export class RunQueueScheduler implements Scheduler {
  private queue: Array<() => void> = [];
  private armed = false;

  constructor(readonly name: string) {}

  get pending(): number {
    return this.queue.length;
  }

  schedule(task: () => void): void {
    this.queue.push(task);
    if (this.armed) return;
    this.armed = true;
    setImmediate(() => this.flush());
  }

  yield(): Promise<void> {
    return new Promise(resolve => this.schedule(resolve));
  }

  private flush(): void {
    this.armed = false;
    const batch = this.queue;
    this.queue = [];
    for (const task of batch) {
      runTask(this, task);
    }
  }
}

export const eventLoopScheduler: Scheduler = new ImmediateScheduler("event-loop");

let schedulerCount = 0;

export const createScheduler = (name?: string): RunQueueScheduler => {
  schedulerCount += 1;
  return new RunQueueScheduler(name ?? `scheduler-${schedulerCount}`);
};
