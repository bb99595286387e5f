export { exchangePeerInfo, negotiateTags } from "./negotiate";
export {
  PEER_INFO_SIZE,
  packPeerInfo,
  peerInfoChecksum,
  unpackPeerInfo,
  type PeerInfo,
} from "./peer-info";
