import cbor from "cbor";
import util from "tweetnacl-util";
import { ProtocolError } from "./errors";
import type { Deserializer, Payload, Serializer } from "./types/types";

const { decodeUTF8, encodeUTF8 } = util;

/** Bytes pass through, strings are UTF-8, anything else is JSON. */
export const defaultSerializer: Serializer = payload => {
  if (payload instanceof Uint8Array) return payload;
  if (typeof payload === "string") return decodeUTF8(payload);
  return decodeUTF8(JSON.stringify(payload, bigint2Str));
};

export const bytesDeserializer: Deserializer<Uint8Array> = data => data;

export const textDeserializer: Deserializer<string> = data => encodeUTF8(data);

export const bigint2Str = (_key: string, value: unknown): unknown =>
  typeof value === "bigint" ? value.toString() : value;

export const jsonSerializer: Serializer = payload => {
  if (typeof payload === "string") return decodeUTF8(payload);
  if (payload instanceof Uint8Array) {
    return decodeUTF8(JSON.stringify(Array.from(payload)));
  }
  return decodeUTF8(JSON.stringify(payload, bigint2Str));
};

export const jsonDeserializer: Deserializer<unknown> = data => {
  const text = encodeUTF8(data);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ProtocolError(`payload of ${data.byteLength} bytes is not JSON`, {
      cause: err,
    });
  }
};

export const createCborSerializer = (): Serializer => payload => {
  const encoded: Uint8Array = cbor.encode(payload);
  return encoded;
};

export const createCborDeserializer =
  <T = unknown>(): Deserializer<T> =>
  data => {
    const decoded: T = cbor.decode(data);
    return decoded;
  };
