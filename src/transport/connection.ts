import { randomBytes } from "node:crypto";
import { CanceledError, ConnectionError, toError } from "../errors";
import { createLogger, hex } from "../logger";
import { Request, type PendingOperation } from "../request";
import type { Tag } from "../types/types";
import type { TransportConnection } from "./types";
import type { TagWorker } from "./worker";

const logger = createLogger("connection");

export type OutboundFrame =
  | { kind: "stream"; data: Uint8Array }
  | { kind: "tag"; tag: Tag; data: Uint8Array };

interface StreamWaiter {
  request: Request<Uint8Array>;
  into: Uint8Array;
  filled: number;
}

/**
 * Shared connection behaviour for the in-process fabrics. Subclasses only move
 * frames: `transmit` sends one, `receiveFrame` is fed with every inbound one.
 */
export abstract class BaseConnection implements TransportConnection {
  readonly handle = randomBytes(8).readBigUInt64LE(0);
  private error?: Error;
  private released = false;
  private peerClosed = false;
  private streamChunks: Uint8Array[] = [];
  private streamWaiters: StreamWaiter[] = [];
  private closeCallback?: () => void;
  private closeCallbackFired = false;

  protected constructor(
    readonly worker: TagWorker,
    readonly errorHandling: boolean,
  ) {}

  protected abstract transmit(
    frame: OutboundFrame,
    done: (err?: Error) => void,
  ): void;

  /** Tear down the link. Called once, from `release()`. */
  protected abstract shutdown(): void;

  isAlive(): boolean {
    return !this.released && !this.peerClosed && !this.error;
  }

  raiseOnError(): void {
    if (this.error) throw this.error;
  }

  setCloseCallback(callback: () => void): void {
    this.closeCallback = callback;
  }

  streamSend(data: Uint8Array): PendingOperation<void> {
    return this.post("stream-send", { kind: "stream", data: data.slice() });
  }

  tagSend(data: Uint8Array, tag: Tag): PendingOperation<void> {
    return this.post("tag-send", { kind: "tag", tag, data: data.slice() });
  }

  streamRecv(into: Uint8Array): PendingOperation<Uint8Array> {
    const request = new Request<Uint8Array>("stream-recv", this.handle);
    this.worker.track(request);
    this.worker.submit(() => {
      if (request.status !== "pending") return;
      this.streamWaiters.push({ request, into, filled: 0 });
      this.pumpStream();
    });
    return request;
  }

  tagRecv(into: Uint8Array, tag: Tag): PendingOperation<Uint8Array> {
    if (this.released) {
      const request = new Request<Uint8Array>("tag-recv", this.handle);
      this.worker.fail(request, new CanceledError());
      return request;
    }
    return this.worker.postTagRecv(this.handle, into, tag, this.error);
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.worker.cancelInflight(this.handle, new CanceledError());
    this.worker.dropUnexpected(this.handle);
    this.streamWaiters = [];
    this.streamChunks = [];
    try {
      this.shutdown();
    } catch (err) {
      logger.warn(`shutdown of ${hex(this.handle)} failed: ${toError(err).message}`);
    }
    this.fireCloseCallback();
  }

  protected receiveFrame(frame: OutboundFrame): void {
    if (this.released) return;
    if (frame.kind === "tag") {
      this.worker.deliverTagged(this.handle, frame.tag, frame.data);
      return;
    }
    this.streamChunks.push(frame.data);
    this.pumpStream();
  }

  protected handlePeerClosed(): void {
    if (this.released || this.peerClosed) return;
    this.peerClosed = true;
    logger.debug(`peer of ${hex(this.handle)} closed`);
    if (this.errorHandling) {
      this.error = new ConnectionError("connection reset by peer");
      this.worker.cancelInflight(this.handle, this.error);
      this.streamWaiters = [];
      this.fireCloseCallback();
      return;
    }
    this.pumpStream();
  }

  private post(
    kind: "stream-send" | "tag-send",
    frame: OutboundFrame,
  ): PendingOperation<void> {
    const request = new Request<void>(kind, this.handle);
    if (this.error) {
      this.worker.fail(request, this.error);
      return request;
    }
    if (this.released) {
      this.worker.fail(request, new CanceledError());
      return request;
    }
    this.worker.track(request);
    this.worker.submit(() => {
      if (request.status !== "pending") return;
      this.transmit(frame, err => {
        if (err) {
          this.worker.fail(request, err);
        } else {
          this.worker.complete(request, undefined);
        }
      });
    });
    return request;
  }

  private pumpStream(): void {
    while (this.streamWaiters.length > 0) {
      const waiter = this.streamWaiters[0];
      if (waiter.request.status !== "pending") {
        this.streamWaiters.shift();
        continue;
      }
      const chunk = this.streamChunks[0];
      if (!chunk) break;
      const wanted = waiter.into.byteLength - waiter.filled;
      const take = Math.min(wanted, chunk.byteLength);
      waiter.into.set(chunk.subarray(0, take), waiter.filled);
      waiter.filled += take;
      if (take === chunk.byteLength) {
        this.streamChunks.shift();
      } else {
        this.streamChunks[0] = chunk.subarray(take);
      }
      if (waiter.filled === waiter.into.byteLength) {
        this.streamWaiters.shift();
        this.worker.complete(waiter.request, waiter.into);
      }
    }
    if (!this.peerClosed) return;
    // The byte stream has ended: nothing queued can satisfy the rest.
    const stranded = this.streamWaiters;
    this.streamWaiters = [];
    for (const waiter of stranded) {
      this.worker.fail(
        waiter.request,
        this.error ?? new ConnectionError("stream closed by peer"),
      );
    }
  }

  private fireCloseCallback(): void {
    if (this.closeCallbackFired || !this.closeCallback) return;
    this.closeCallbackFired = true;
    const callback = this.closeCallback;
    this.closeCallback = undefined;
    try {
      callback();
    } catch (err) {
      logger.error(`close callback of ${hex(this.handle)} threw`, err);
    }
  }
}
