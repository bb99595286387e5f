import type { BufferLike } from "../types/types";

export const U64_MAX = (1n << 64n) - 1n;

export const isU64 = (value: bigint): boolean => value >= 0n && value <= U64_MAX;

/** View the caller's memory as bytes without copying. */
export const toBytes = (buffer: BufferLike): Uint8Array =>
  buffer instanceof Uint8Array
    ? buffer
    : new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);

export const writeU64 = (target: Uint8Array, offset: number, value: bigint): void => {
  new DataView(target.buffer, target.byteOffset, target.byteLength).setBigUint64(
    offset,
    value,
    true,
  );
};

export const readU64 = (source: Uint8Array, offset = 0): bigint =>
  new DataView(source.buffer, source.byteOffset, source.byteLength).getBigUint64(
    offset,
    true,
  );

export const u64Bytes = (value: bigint): Uint8Array => {
  const out = new Uint8Array(8);
  writeU64(out, 0, value);
  return out;
};

export const concatBytes = (parts: readonly Uint8Array[]): Uint8Array => {
  const total = parts.reduce((sum, part) => sum + part.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.byteLength;
  }
  return out;
};
