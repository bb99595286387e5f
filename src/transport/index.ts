import { ConfigurationError } from "../errors";
import type { FabricKind } from "../types/types";
import { LoopbackFabric } from "./loopback";
import { TcpFabric } from "./tcp";
import type { Fabric } from "./types";

export function createFabric(kind: FabricKind): Fabric {
  switch (kind) {
    case "tcp":
      return new TcpFabric();
    case "loopback":
      return new LoopbackFabric();
    default: {
      const unknown: never = kind;
      throw new ConfigurationError(`unknown fabric "${String(unknown)}"`);
    }
  }
}

export { LoopbackFabric, LoopbackNetwork, defaultLoopbackNetwork } from "./loopback";
export { TcpFabric } from "./tcp";
export { TagWorker } from "./worker";
export { tagRecvMulti, tagSendMulti } from "./tag-multi";
export type {
  ConnectOptions,
  Fabric,
  ListenOptions,
  TransportConnection,
  TransportListener,
  TransportWorker,
  WorkerOptions,
} from "./types";
