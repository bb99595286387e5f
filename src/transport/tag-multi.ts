import { TagwireError } from "../errors";
import type { Allocator, Tag } from "../types/types";
import type { TransportConnection } from "./types";

/** Frame sizes carried by one header. */
export const HEADER_FRAMES = 100;
/** `u8 next`, `u64 frame count`, then `HEADER_FRAMES` u64 sizes, all LE. */
export const HEADER_SIZE = 1 + 8 + 8 * HEADER_FRAMES;

export interface MultiHeader {
  next: boolean;
  sizes: number[];
}

export function encodeMultiHeaders(sizes: readonly number[]): Uint8Array[] {
  const headers: Uint8Array[] = [];
  let offset = 0;
  do {
    const chunk = sizes.slice(offset, offset + HEADER_FRAMES);
    offset += chunk.length;
    const header = new Uint8Array(HEADER_SIZE);
    const view = new DataView(header.buffer);
    view.setUint8(0, offset < sizes.length ? 1 : 0);
    view.setBigUint64(1, BigInt(chunk.length), true);
    chunk.forEach((size, i) => view.setBigUint64(9 + i * 8, BigInt(size), true));
    headers.push(header);
  } while (offset < sizes.length);
  return headers;
}

export function decodeMultiHeader(bytes: Uint8Array): MultiHeader {
  if (bytes.byteLength !== HEADER_SIZE) {
    throw new TagwireError(
      "E_PROTOCOL",
      `multi-buffer header must be ${HEADER_SIZE} bytes, got ${bytes.byteLength}`,
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const count = Number(view.getBigUint64(1, true));
  if (count > HEADER_FRAMES) {
    throw new TagwireError("E_PROTOCOL", `multi-buffer header claims ${count} frames`);
  }
  const sizes: number[] = [];
  for (let i = 0; i < count; i += 1) {
    sizes.push(Number(view.getBigUint64(9 + i * 8, true)));
  }
  return { next: view.getUint8(0) !== 0, sizes };
}

/**
 * Scatter-gather send on a single tag: every header first, then every frame.
 * All transfers are posted before any is awaited.
 */
export async function tagSendMulti(
  conn: TransportConnection,
  buffers: readonly Uint8Array[],
  tag: Tag,
): Promise<void> {
  const headers = encodeMultiHeaders(buffers.map(buffer => buffer.byteLength));
  const operations = [
    ...headers.map(header => conn.tagSend(header, tag)),
    ...buffers.map(buffer => conn.tagSend(buffer, tag)),
  ];
  await settleAll(operations.map(op => op.wait()));
}

export async function tagRecvMulti(
  conn: TransportConnection,
  tag: Tag,
  allocator: Allocator = size => new Uint8Array(size),
): Promise<Uint8Array[]> {
  const sizes: number[] = [];
  for (;;) {
    const header = await conn.tagRecv(new Uint8Array(HEADER_SIZE), tag).wait();
    const decoded = decodeMultiHeader(header);
    sizes.push(...decoded.sizes);
    if (!decoded.next) break;
  }
  const frames = sizes.map(size => conn.tagRecv(allocator(size), tag));
  return settleAll(frames.map(op => op.wait()));
}

// Wait for every component, then surface the first failure.
async function settleAll<T>(waits: Promise<T>[]): Promise<T[]> {
  const results = await Promise.allSettled(waits);
  const values: T[] = [];
  for (const result of results) {
    if (result.status === "rejected") throw result.reason;
    values.push(result.value);
  }
  return values;
}
