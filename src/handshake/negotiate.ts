import { ConnectionError, TagwireError } from "../errors";
import { createLogger, hex } from "../logger";
import { allocateTag, generateSeed } from "../tags";
import type { TransportConnection } from "../transport/types";
import type { HandshakeRole, Tag, TagSet } from "../types/types";
import { PEER_INFO_SIZE, packPeerInfo, unpackPeerInfo, type PeerInfo } from "./peer-info";

const logger = createLogger("handshake");

const wrapTransportError = (err: unknown, step: string): Error => {
  if (err instanceof TagwireError && err.code !== "E_CANCELED") return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new ConnectionError(`handshake ${step} failed: ${reason}`, { cause: err });
};

/**
 * Swap tag announcements over the connection's byte stream. The order is fixed
 * by role and each transfer completes before the next one is posted.
 */
export async function exchangePeerInfo(
  conn: TransportConnection,
  msgTag: Tag,
  ctrlTag: Tag,
  role: HandshakeRole,
): Promise<PeerInfo> {
  const outbound = packPeerInfo(msgTag, ctrlTag);
  const inbound = new Uint8Array(PEER_INFO_SIZE);

  const send = async () => {
    try {
      await conn.streamSend(outbound).wait();
    } catch (err) {
      throw wrapTransportError(err, "send");
    }
  };
  const recv = async () => {
    try {
      await conn.streamRecv(inbound).wait();
    } catch (err) {
      throw wrapTransportError(err, "recv");
    }
  };

  if (role === "acceptor") {
    await recv();
    await send();
  } else {
    await send();
    await recv();
  }
  return unpackPeerInfo(inbound);
}

export async function negotiateTags(
  conn: TransportConnection,
  role: HandshakeRole,
): Promise<TagSet> {
  const seed = generateSeed();
  const msgTag = allocateTag("msg_tag", seed, conn.handle);
  const ctrlTag = allocateTag("ctrl_tag", seed, conn.handle);
  const peer = await exchangePeerInfo(conn, msgTag, ctrlTag, role);
  const tags: TagSet = {
    msgSend: peer.msgTag,
    msgRecv: msgTag,
    ctrlSend: peer.ctrlTag,
    ctrlRecv: ctrlTag,
  };
  if (logger.debugEnabled) {
    logger.debug(
      `${role} ${hex(conn.handle)} msg send/recv ${hex(tags.msgSend)}/${hex(tags.msgRecv)}, ctrl ${hex(tags.ctrlSend)}/${hex(tags.ctrlRecv)}`,
    );
  }
  return tags;
}
