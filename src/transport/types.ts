import type { PendingOperation } from "../request";
import type { FabricKind, Tag, WorkerStatistics } from "../types/types";

export interface WorkerOptions {
  /** Queue submissions until the next `progress()` call. */
  delayedSubmission: boolean;
}

export interface TransportWorker {
  readonly handle: bigint;
  /**
   * Shared counter bumped (and `Atomics.notify`-ed) whenever a completion is
   * staged or a submission is queued.
   */
  readonly doorbell: Int32Array;
  readonly pendingCompletions: number;
  /**
   * Call `listener` on this thread whenever the doorbell rings. Returns the
   * unsubscribe function.
   */
  onDoorbell(listener: () => void): () => void;
  tagProbe(tag: Tag): boolean;
  /** Run queued submissions. Returns true when anything ran. */
  progress(): boolean;
  /** Settle every staged completion. Returns how many were settled. */
  drainCompletions(): number;
  statistics(): WorkerStatistics;
}

export interface TransportConnection {
  readonly handle: bigint;
  readonly worker: TransportWorker;
  isAlive(): boolean;
  /** Throws the connection's error state, if any. */
  raiseOnError(): void;
  streamSend(data: Uint8Array): PendingOperation<void>;
  streamRecv(into: Uint8Array): PendingOperation<Uint8Array>;
  tagSend(data: Uint8Array, tag: Tag): PendingOperation<void>;
  tagRecv(into: Uint8Array, tag: Tag): PendingOperation<Uint8Array>;
  setCloseCallback(callback: () => void): void;
  release(): void;
}

export interface TransportListener {
  readonly ip: string;
  readonly port: number;
  readonly listening: boolean;
  close(): void;
}

export interface ConnectOptions {
  errorHandling: boolean;
  connectTimeoutMs?: number;
}

export interface ListenOptions {
  errorHandling: boolean;
  host?: string;
}

/** Transport context: owns workers, connections and passive handles. */
export interface Fabric {
  readonly kind: FabricKind;
  createWorker(options: WorkerOptions): TransportWorker;
  connect(
    worker: TransportWorker,
    host: string,
    port: number,
    options: ConnectOptions,
  ): Promise<TransportConnection>;
  listen(
    worker: TransportWorker,
    port: number,
    onConnection: (connection: TransportConnection) => void,
    options: ListenOptions,
  ): Promise<TransportListener>;
}
