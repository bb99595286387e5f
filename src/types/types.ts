/** 64-bit unsigned matching tag, `[0, 2^64)`. */
export type Tag = bigint;

/**
 * Application-level tag. Hashed under the connection's negotiated tag unless
 * `forceTag` is set.
 */
export type UserTag = bigint | Uint8Array;

export interface TagSet {
  msgSend: Tag;
  msgRecv: Tag;
  ctrlSend: Tag;
  ctrlRecv: Tag;
}

export type TagRole = "msg_tag" | "ctrl_tag";

export type ProgressMode = "thread" | "thread-polling" | "polling";
export type FabricKind = "tcp" | "loopback";
export type HandshakeRole = "connector" | "acceptor";

export type EndpointState = "active" | "shutting-down" | "closed" | "aborted";

/** Any contiguous memory region; only its byte length is inspected. */
export type BufferLike = ArrayBufferView;

export interface TagOptions {
  tag?: UserTag;
  /** Use `tag` verbatim on the wire instead of namespacing it. */
  forceTag?: boolean;
}

export type Payload = string | Uint8Array | Record<string, unknown>;

export type Serializer = (payload: Payload) => Uint8Array;
export type Deserializer<TMessage = unknown> = (data: Uint8Array) => TMessage;
export type Allocator = (nbytes: number) => Uint8Array;

export interface RecvObjectOptions {
  tag?: UserTag;
  allocator?: Allocator;
}

export interface WorkerStatistics {
  submitted: number;
  completed: number;
  failed: number;
  drained: number;
  canceled: number;
  unexpectedQueued: number;
  postedRecvs: number;
}

export interface ContextTelemetry {
  endpoints: number;
  listeners: number;
  progressBindings: number;
  worker: WorkerStatistics;
}
