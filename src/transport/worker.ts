import { randomBytes } from "node:crypto";
import { TagwireError } from "../errors";
import { createLogger, hex } from "../logger";
import { Request, type Settleable } from "../request";
import type { Tag, WorkerStatistics } from "../types/types";
import type { TransportWorker, WorkerOptions } from "./types";

const logger = createLogger("worker");

export const DOORBELL_SEQ = 0;

interface UnexpectedMessage {
  owner: bigint;
  data: Uint8Array;
}

interface PostedRecv {
  request: Request<Uint8Array>;
  into: Uint8Array;
}

/**
 * Tag-matching worker shared by the in-process fabrics.
 *
 * Receives are matched per tag in FIFO order against either already-arrived
 * (unexpected) messages or later deliveries. Outcomes are only staged here;
 * they reach callers when a progress engine calls `drainCompletions()`.
 */
export class TagWorker implements TransportWorker {
  readonly handle: bigint;
  readonly doorbell = new Int32Array(
    new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT * 2),
  );
  private readonly delayedSubmission: boolean;
  private readonly unexpected = new Map<Tag, UnexpectedMessage[]>();
  private readonly posted = new Map<Tag, PostedRecv[]>();
  private readonly inflight = new Map<bigint, Set<Settleable>>();
  private completionQueue: Settleable[] = [];
  private submissions: Array<() => void> = [];
  private readonly doorbellListeners = new Set<() => void>();
  private readonly stats = {
    submitted: 0,
    completed: 0,
    failed: 0,
    drained: 0,
    canceled: 0,
  };

  constructor(options: WorkerOptions) {
    this.handle = randomBytes(8).readBigUInt64LE(0);
    this.delayedSubmission = options.delayedSubmission;
  }

  get pendingCompletions(): number {
    return this.completionQueue.length;
  }

  get pendingSubmissions(): number {
    return this.submissions.length;
  }

  onDoorbell(listener: () => void): () => void {
    this.doorbellListeners.add(listener);
    return () => {
      this.doorbellListeners.delete(listener);
    };
  }

  submit(task: () => void): void {
    this.stats.submitted += 1;
    if (!this.delayedSubmission) {
      task();
      return;
    }
    this.submissions.push(task);
    this.ring();
  }

  progress(): boolean {
    if (this.submissions.length === 0) return false;
    const batch = this.submissions;
    this.submissions = [];
    for (const task of batch) {
      task();
    }
    return true;
  }

  drainCompletions(): number {
    if (this.completionQueue.length === 0) return 0;
    const batch = this.completionQueue;
    this.completionQueue = [];
    for (const request of batch) {
      request.settle();
    }
    this.stats.drained += batch.length;
    return batch.length;
  }

  tagProbe(tag: Tag): boolean {
    return (this.unexpected.get(tag)?.length ?? 0) > 0;
  }

  track(request: Settleable): void {
    let owned = this.inflight.get(request.owner);
    if (!owned) {
      owned = new Set();
      this.inflight.set(request.owner, owned);
    }
    owned.add(request);
  }

  complete<T>(request: Request<T>, value: T): void {
    if (!request.complete(value)) return;
    this.stats.completed += 1;
    this.enqueue(request);
  }

  fail(request: Settleable, error: Error): void {
    if (!request.fail(error)) return;
    this.stats.failed += 1;
    this.enqueue(request);
  }

  /**
   * Post a tagged receive for `owner`. When `unmatched` is given and no message
   * is already waiting, the receive fails with it instead of being posted.
   */
  postTagRecv(
    owner: bigint,
    into: Uint8Array,
    tag: Tag,
    unmatched?: Error,
  ): Request<Uint8Array> {
    const request = new Request<Uint8Array>("tag-recv", owner);
    this.track(request);
    this.submit(() => {
      if (request.status !== "pending") return;
      const queued = this.unexpected.get(tag);
      const message = queued?.shift();
      if (queued && queued.length === 0) this.unexpected.delete(tag);
      if (message) {
        this.fill({ request, into }, message.data);
        return;
      }
      if (unmatched) {
        this.fail(request, unmatched);
        return;
      }
      const waiting = this.posted.get(tag) ?? [];
      waiting.push({ request, into });
      this.posted.set(tag, waiting);
    });
    return request;
  }

  /** Hand a tagged message that arrived on `owner` to the matching engine. */
  deliverTagged(owner: bigint, tag: Tag, data: Uint8Array): void {
    const waiting = this.posted.get(tag);
    while (waiting && waiting.length > 0) {
      const next = waiting.shift();
      if (waiting.length === 0) this.posted.delete(tag);
      if (next && next.request.status === "pending") {
        this.fill(next, data);
        return;
      }
    }
    const queued = this.unexpected.get(tag) ?? [];
    queued.push({ owner, data });
    this.unexpected.set(tag, queued);
  }

  /** Forget unreceived messages that arrived on `owner`. Returns how many. */
  dropUnexpected(owner: bigint): number {
    let dropped = 0;
    for (const [tag, queued] of this.unexpected) {
      const remaining = queued.filter(message => message.owner !== owner);
      dropped += queued.length - remaining.length;
      if (remaining.length === 0) {
        this.unexpected.delete(tag);
      } else if (remaining.length !== queued.length) {
        this.unexpected.set(tag, remaining);
      }
    }
    if (dropped > 0) {
      logger.debug(`dropped ${dropped} unreceived message(s) of ${hex(owner)}`);
    }
    return dropped;
  }

  /** Fail every in-flight operation owned by `owner`. */
  cancelInflight(owner: bigint, error: Error): number {
    const owned = this.inflight.get(owner);
    this.inflight.delete(owner);
    if (!owned) return 0;
    let canceled = 0;
    for (const request of owned) {
      if (request.status !== "pending") continue;
      this.fail(request, error);
      canceled += 1;
    }
    for (const [tag, waiting] of this.posted) {
      const remaining = waiting.filter(entry => entry.request.status === "pending");
      if (remaining.length === 0) {
        this.posted.delete(tag);
      } else {
        this.posted.set(tag, remaining);
      }
    }
    this.stats.canceled += canceled;
    if (canceled > 0) {
      logger.debug(`canceled ${canceled} in-flight request(s) of ${hex(owner)}`);
    }
    return canceled;
  }

  statistics(): WorkerStatistics {
    let unexpectedQueued = 0;
    for (const queued of this.unexpected.values()) unexpectedQueued += queued.length;
    let postedRecvs = 0;
    for (const waiting of this.posted.values()) postedRecvs += waiting.length;
    return { ...this.stats, unexpectedQueued, postedRecvs };
  }

  private fill(entry: PostedRecv, data: Uint8Array): void {
    if (data.byteLength > entry.into.byteLength) {
      this.fail(
        entry.request,
        new TagwireError(
          "E_MESSAGE_TRUNCATED",
          `message of ${data.byteLength} bytes does not fit a ${entry.into.byteLength}-byte buffer`,
        ),
      );
      return;
    }
    entry.into.set(data);
    this.complete(entry.request, entry.into.subarray(0, data.byteLength));
  }

  private enqueue(request: Settleable): void {
    this.inflight.get(request.owner)?.delete(request);
    this.completionQueue.push(request);
    this.ring();
  }

  private ring(): void {
    Atomics.add(this.doorbell, DOORBELL_SEQ, 1);
    Atomics.notify(this.doorbell, DOORBELL_SEQ);
    for (const listener of this.doorbellListeners) listener();
  }
}

/** Narrow a worker handed back by the core to the in-process implementation. */
export function assertTagWorker(worker: TransportWorker): TagWorker {
  if (worker instanceof TagWorker) return worker;
  throw new TagwireError(
    "E_CONFIGURATION",
    "this fabric only drives workers it created itself",
  );
}
