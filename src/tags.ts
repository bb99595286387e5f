import nacl from "tweetnacl";
import util from "tweetnacl-util";
import { TagwireError } from "./errors";
import { concatBytes, isU64, readU64, u64Bytes } from "./utils/bytes";
import type { Tag, TagRole, UserTag } from "./types/types";

const { decodeUTF8 } = util;

export type HashInput = string | bigint | Uint8Array;

export const SEED_LENGTH = 16;

const PART_STRING = 0x01;
const PART_U64 = 0x02;
const PART_BYTES = 0x03;

const encodePart = (part: HashInput): Uint8Array => {
  let kind: number;
  let body: Uint8Array;
  if (typeof part === "string") {
    kind = PART_STRING;
    body = decodeUTF8(part);
  } else if (typeof part === "bigint") {
    if (!isU64(part)) {
      throw new TagwireError("E_INVALID_TAG", `${part} does not fit in 64 bits`);
    }
    kind = PART_U64;
    body = u64Bytes(part);
  } else {
    kind = PART_BYTES;
    body = part;
  }
  const header = new Uint8Array(5);
  header[0] = kind;
  new DataView(header.buffer).setUint32(1, body.byteLength, true);
  return concatBytes([header, body]);
};

/**
 * 64-bit digest of an ordered list of parts: SHA-512 over length-delimited
 * encodings, first eight bytes read little-endian.
 */
export function hash64(...parts: HashInput[]): bigint {
  const digest = nacl.hash(concatBytes(parts.map(encodePart)));
  return readU64(digest, 0);
}

export const generateSeed = (): Uint8Array => nacl.randomBytes(SEED_LENGTH);

/**
 * Derive one of a connection's local tags. The seed is the collision breaker
 * when transport handles get reused.
 */
export function allocateTag(role: TagRole, seed: Uint8Array, handle: bigint): Tag {
  if (seed.byteLength < SEED_LENGTH) {
    throw new TagwireError(
      "E_INVALID_TAG",
      `tag seed must be at least ${SEED_LENGTH} bytes, got ${seed.byteLength}`,
    );
  }
  return hash64(role, seed, handle);
}

/** Namespace a user tag under a negotiated connection tag. */
export const deriveUserTag = (base: Tag, tag: UserTag): Tag =>
  hash64(base, hash64(tag));

/** Interpret a user tag verbatim (forceTag). */
export function toWireTag(tag: UserTag): Tag {
  if (typeof tag === "bigint") {
    if (!isU64(tag)) {
      throw new TagwireError("E_INVALID_TAG", `${tag} does not fit in 64 bits`);
    }
    return tag;
  }
  if (tag.byteLength !== 8) {
    throw new TagwireError(
      "E_INVALID_TAG",
      `forced byte tags must be exactly 8 bytes, got ${tag.byteLength}`,
    );
  }
  return readU64(tag, 0);
}

export function resolveTag(
  base: Tag,
  options: { tag?: UserTag; forceTag?: boolean },
): Tag {
  if (options.tag === undefined) return base;
  return options.forceTag ? toWireTag(options.tag) : deriveUserTag(base, options.tag);
}
