import { randomBytes } from "node:crypto";
import type { ApplicationContext } from "./context";
import {
  CanceledError,
  ClosedError,
  ConfigurationError,
  ConnectionError,
} from "./errors";
import { negotiateTags } from "./handshake";
import { createLogger, hex } from "./logger";
import { resolveTag } from "./tags";
import { tagRecvMulti, tagSendMulti } from "./transport/tag-multi";
import type { TransportConnection, TransportWorker } from "./transport/types";
import type {
  Allocator,
  BufferLike,
  Deserializer,
  EndpointState,
  HandshakeRole,
  Payload,
  RecvObjectOptions,
  TagOptions,
  TagSet,
} from "./types/types";
import { readU64, toBytes, u64Bytes } from "./utils/bytes";

const logger = createLogger("endpoint");

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 5_000;

const LENGTH_PREFIX_BYTES = 8;

const defaultAllocator: Allocator = nbytes => new Uint8Array(nbytes);

const seq = (n: number) => String(n).padStart(3, "0");

interface EndpointCleanup {
  conn: TransportConnection;
  ctx: ApplicationContext;
  referrer: number;
}

// Backstop for endpoints dropped without close()/abort(). Holds only what
// teardown needs, never the Endpoint itself.
const finalizer = new FinalizationRegistry<EndpointCleanup>(held => {
  logger.warn(`endpoint ${hex(held.conn.handle)} was collected while open; aborting it`);
  held.conn.release();
  held.ctx.releaseReferrer(held.referrer);
});

export interface EndpointCreateOptions {
  /** Fail the handshake if the peer has not answered in time. */
  handshakeTimeoutMs?: number;
}

/** A live, bidirectional connection to one peer, created by a handshake. */
export class Endpoint {
  readonly uid = randomBytes(8).toString("hex");
  private conn: TransportConnection | null;
  private ctx: ApplicationContext | null;
  private readonly worker: TransportWorker;
  private readonly referrer: number;
  private currentState: EndpointState = "active";
  private sendCounter = 0;
  private recvCounter = 0;
  private finishedRecvCounter = 0;
  private closeAfter?: number;
  private closing?: Promise<void>;
  private readonly inflightSends = new Set<Promise<unknown>>();

  /**
   * Run the tag handshake over `conn` and wrap the result. The connection is
   * released if the handshake fails; no endpoint exists until it succeeds.
   */
  static async create(
    ctx: ApplicationContext,
    conn: TransportConnection,
    role: HandshakeRole,
    options: EndpointCreateOptions = {},
  ): Promise<Endpoint> {
    const timeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    let timer: NodeJS.Timeout | undefined;
    try {
      const tags = await Promise.race([
        negotiateTags(conn, role),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new ConnectionError(`handshake timed out after ${timeoutMs}ms`)),
            timeoutMs,
          );
        }),
      ]);
      return new Endpoint(ctx, conn, tags);
    } catch (err) {
      conn.release();
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private constructor(
    ctx: ApplicationContext,
    conn: TransportConnection,
    readonly tags: Readonly<TagSet>,
  ) {
    this.ctx = ctx;
    this.conn = conn;
    this.worker = conn.worker;
    this.referrer = ctx.addReferrer("endpoint", `Endpoint(${hex(conn.handle)})`);
    finalizer.register(this, { conn, ctx, referrer: this.referrer }, this);
  }

  get state(): EndpointState {
    return this.currentState;
  }

  get sendCount(): number {
    return this.sendCounter;
  }

  get recvCount(): number {
    return this.recvCounter;
  }

  get finishedRecvCount(): number {
    return this.finishedRecvCounter;
  }

  /** True once torn down locally, or once the transport reports the link dead. */
  closed(): boolean {
    return this.conn === null || !this.conn.isAlive();
  }

  isAlive(): boolean {
    return this.conn?.isAlive() ?? false;
  }

  getWorkerHandle(): bigint {
    return this.worker.handle;
  }

  getEndpointHandle(): bigint {
    return this.requireConnection().handle;
  }

  async send(buffer: BufferLike, options: TagOptions = {}): Promise<void> {
    const conn = this.requireConnection();
    const tag = resolveTag(this.tags.msgSend, options);
    const bytes = toBytes(buffer);
    this.sendCounter += 1;
    if (logger.debugEnabled) {
      logger.debug(
        `[Send #${seq(this.sendCounter)}] ep: ${hex(conn.handle)}, tag: ${hex(tag)}, nbytes: ${bytes.byteLength}`,
      );
    }
    await this.trackSend(conn.tagSend(bytes, tag).wait());
  }

  async sendMulti(buffers: readonly BufferLike[], options: TagOptions = {}): Promise<void> {
    const conn = this.requireConnection();
    const tag = resolveTag(this.tags.msgSend, options);
    const frames = buffers.map(toBytes);
    this.sendCounter += 1;
    if (logger.debugEnabled) {
      logger.debug(
        `[Send Multi #${seq(this.sendCounter)}] ep: ${hex(conn.handle)}, tag: ${hex(tag)}, frames: ${frames.length}`,
      );
    }
    await this.trackSend(tagSendMulti(conn, frames, tag));
  }

  /** Send a u64 LE byte count, then the serialized payload, on one tag. */
  async sendObject(obj: Payload, options: TagOptions = {}): Promise<void> {
    const serializer = this.requireContext().serializer;
    const payload = serializer(obj);
    await this.send(u64Bytes(BigInt(payload.byteLength)), options);
    await this.send(payload, options);
  }

  async recv(buffer: BufferLike, options: TagOptions = {}): Promise<Uint8Array> {
    const tag = resolveTag(this.tags.msgRecv, options);
    const conn = this.prepareRecv(tag);
    const bytes = toBytes(buffer);
    this.recvCounter += 1;
    if (logger.debugEnabled) {
      logger.debug(
        `[Recv #${seq(this.recvCounter)}] ep: ${hex(conn.handle)}, tag: ${hex(tag)}, nbytes: ${bytes.byteLength}`,
      );
    }
    const received = await this.awaitRecv(conn.tagRecv(bytes, tag).wait());
    this.finishRecv();
    return received;
  }

  async recvMulti(options: TagOptions & { allocator?: Allocator } = {}): Promise<Uint8Array[]> {
    const tag = resolveTag(this.tags.msgRecv, options);
    const conn = this.prepareRecv(tag);
    this.recvCounter += 1;
    if (logger.debugEnabled) {
      logger.debug(`[Recv Multi #${seq(this.recvCounter)}] ep: ${hex(conn.handle)}, tag: ${hex(tag)}`);
    }
    const frames = await this.awaitRecv(tagRecvMulti(conn, tag, options.allocator));
    this.finishRecv();
    return frames;
  }

  /** Receive a u64 LE byte count, allocate, then receive the payload. */
  async recvObject(options: RecvObjectOptions & Pick<TagOptions, "forceTag"> = {}): Promise<Uint8Array> {
    const tagOptions: TagOptions = { tag: options.tag, forceTag: options.forceTag };
    const prefix = await this.recv(new Uint8Array(LENGTH_PREFIX_BYTES), tagOptions);
    const nbytes = Number(readU64(prefix, 0));
    const allocate = options.allocator ?? defaultAllocator;
    return this.recv(allocate(nbytes), tagOptions);
  }

  /**
   * `recvObject`, then decode the payload with `options.deserializer` or the
   * context's deserializer, the counterpart of the serializer `sendObject` uses.
   */
  recvMessage(options?: RecvObjectOptions & Pick<TagOptions, "forceTag">): Promise<unknown>;
  recvMessage<T>(
    options: RecvObjectOptions & Pick<TagOptions, "forceTag"> & { deserializer: Deserializer<T> },
  ): Promise<T>;
  async recvMessage(
    options: RecvObjectOptions &
      Pick<TagOptions, "forceTag"> & { deserializer?: Deserializer } = {},
  ): Promise<unknown> {
    const deserialize = options.deserializer ?? this.requireContext().deserializer;
    return deserialize(await this.recvObject(options));
  }

  /**
   * Abort once `n` more receives have finished, or once `n` receives have
   * finished in total when `countFromCreation` is set.
   */
  closeAfterNReceives(n: number, countFromCreation = false): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new ConfigurationError(`n must be a non-negative integer, got ${n}`);
    }
    if (this.closeAfter !== undefined) {
      throw new ConfigurationError(
        `closeAfterNReceives has already been set to ${this.closeAfter} (absolute)`,
      );
    }
    const target = countFromCreation ? n : this.finishedRecvCounter + n;
    if (target === this.finishedRecvCounter) {
      this.abort();
    } else if (target > this.finishedRecvCounter) {
      this.closeAfter = target;
    } else {
      throw new ConfigurationError(
        `n cannot be less than the current finished receive count (${this.finishedRecvCounter})`,
      );
    }
  }

  /**
   * Register `fn(...args)` to run when the transport reports the connection
   * closed, or at final teardown when it never does.
   */
  setCloseCallback<TArgs extends unknown[]>(
    fn: (...args: TArgs) => unknown,
    ...args: TArgs
  ): void {
    const conn = this.requireConnection();
    conn.setCloseCallback(() => {
      const result = fn(...args);
      if (result instanceof Promise) {
        result.catch(err => logger.error("async close callback failed", err));
      }
    });
  }

  /** Immediate local teardown. Idempotent; the peer is not told. */
  abort(): void {
    const conn = this.conn;
    if (!conn) return;
    this.conn = null;
    this.currentState = this.currentState === "shutting-down" ? "closed" : "aborted";
    finalizer.unregister(this);
    logger.debug(`${this.currentState} endpoint ${hex(conn.handle)}`);
    try {
      conn.release();
    } finally {
      const ctx = this.ctx;
      this.ctx = null;
      ctx?.releaseReferrer(this.referrer);
    }
  }

  /**
   * Best-effort graceful close: wait for in-flight sends (bounded by the
   * context's `closeFlushTimeoutMs`), then abort. The peer is notified once.
   */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    if (this.closed()) {
      // Nothing can be flushed to a dead link; just release it.
      this.abort();
      return Promise.resolve();
    }
    this.closing = this.flushAndAbort();
    return this.closing;
  }

  private async flushAndAbort(): Promise<void> {
    this.currentState = "shutting-down";
    const timeoutMs = this.ctx?.getConfig().closeFlushTimeoutMs ?? 0;
    try {
      this.worker.progress();
      if (timeoutMs === 0 || this.inflightSends.size === 0) {
        await new Promise(resolve => setImmediate(resolve));
      } else {
        let timer: NodeJS.Timeout | undefined;
        await Promise.race([
          Promise.allSettled([...this.inflightSends]),
          new Promise(resolve => {
            timer = setTimeout(resolve, timeoutMs);
          }),
        ]);
        clearTimeout(timer);
      }
    } finally {
      this.abort();
    }
  }

  private requireConnection(): TransportConnection {
    if (!this.conn) throw new ClosedError();
    return this.conn;
  }

  private requireContext(): ApplicationContext {
    if (!this.ctx) throw new ClosedError();
    return this.ctx;
  }

  // A message that already arrived is still received after the peer closed.
  private prepareRecv(tag: bigint): TransportConnection {
    if (!this.worker.tagProbe(tag)) {
      this.conn?.raiseOnError();
    }
    return this.requireConnection();
  }

  private async trackSend(operation: Promise<unknown>): Promise<void> {
    this.inflightSends.add(operation);
    try {
      await operation;
    } catch (err) {
      // Local teardown already explains a cancellation.
      if (err instanceof CanceledError && this.conn === null) return;
      throw err;
    } finally {
      this.inflightSends.delete(operation);
    }
  }

  private async awaitRecv<T>(operation: Promise<T>): Promise<T> {
    try {
      return await operation;
    } catch (err) {
      if (err instanceof CanceledError && this.conn === null) {
        throw new ClosedError("Endpoint closed", { cause: err });
      }
      throw err;
    }
  }

  private finishRecv(): void {
    this.finishedRecvCounter += 1;
    if (this.closeAfter !== undefined && this.finishedRecvCounter >= this.closeAfter) {
      this.abort();
    }
  }
}
