import { ProtocolError } from "../errors";
import { hex } from "../logger";
import { hash64 } from "../tags";
import { readU64, writeU64 } from "../utils/bytes";
import type { Tag } from "../types/types";

/** `msg_tag`, `ctrl_tag`, `checksum`, each a u64 LE. */
export const PEER_INFO_SIZE = 24;

export interface PeerInfo {
  msgTag: Tag;
  ctrlTag: Tag;
  checksum: bigint;
}

export const peerInfoChecksum = (msgTag: Tag, ctrlTag: Tag): bigint =>
  hash64(msgTag, ctrlTag);

export function packPeerInfo(msgTag: Tag, ctrlTag: Tag): Uint8Array {
  const out = new Uint8Array(PEER_INFO_SIZE);
  writeU64(out, 0, msgTag);
  writeU64(out, 8, ctrlTag);
  writeU64(out, 16, peerInfoChecksum(msgTag, ctrlTag));
  return out;
}

/**
 * Parse and verify a peer's tag announcement. A bad checksum is a protocol
 * desync and is never retried.
 */
export function unpackPeerInfo(bytes: Uint8Array): PeerInfo {
  if (bytes.byteLength !== PEER_INFO_SIZE) {
    throw new ProtocolError(
      `peer info must be ${PEER_INFO_SIZE} bytes, got ${bytes.byteLength}`,
    );
  }
  const msgTag = readU64(bytes, 0);
  const ctrlTag = readU64(bytes, 8);
  const checksum = readU64(bytes, 16);
  const expected = peerInfoChecksum(msgTag, ctrlTag);
  if (checksum !== expected) {
    throw new ProtocolError(
      `Checksum invalid! ${hex(checksum)} != ${hex(expected)}`,
    );
  }
  return { msgTag, ctrlTag, checksum };
}
