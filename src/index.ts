export { ApplicationContext } from "./context";
export type {
  ApplicationContextOptions,
  CreateEndpointOptions,
  ReferrerKind,
} from "./context";
export { Endpoint, DEFAULT_HANDSHAKE_TIMEOUT_MS } from "./endpoint";
export type { EndpointCreateOptions } from "./endpoint";
export { Listener } from "./listener";
export type {
  ConnectionListenerOptions,
  EndpointListenerOptions,
  ListenerOptions,
} from "./listener";
export {
  init,
  getContext,
  setDefaultOptions,
  reset,
  stopProgress,
  progress,
  continuousProgress,
  createEndpoint,
  createListener,
  getWorkerHandle,
  getConfig,
} from "./factory";
export { withEndpoint, withListener } from "./scope";
export {
  resolveConfig,
  contextOptionsSchema,
  progressModeSchema,
  fabricKindSchema,
  ENV,
} from "./config";
export type { ContextConfig, ContextConfigInput, ResolveConfigOptions } from "./config";
export {
  TagwireError,
  ClosedError,
  CanceledError,
  ConnectionError,
  ProtocolError,
  ConfigurationError,
} from "./errors";
export type { TagwireErrorCode } from "./errors";
export {
  hash64,
  generateSeed,
  allocateTag,
  deriveUserTag,
  toWireTag,
  resolveTag,
  SEED_LENGTH,
} from "./tags";
export {
  exchangePeerInfo,
  negotiateTags,
  packPeerInfo,
  unpackPeerInfo,
  peerInfoChecksum,
  PEER_INFO_SIZE,
} from "./handshake";
export type { PeerInfo } from "./handshake";
export {
  createProgressEngine,
  ThreadProgressEngine,
  PollingProgressEngine,
} from "./progress";
export type { ProgressEngine, ProgressEngineOptions } from "./progress";
export { createScheduler, eventLoopScheduler, RunQueueScheduler } from "./scheduler";
export type { Scheduler } from "./scheduler";
export {
  createFabric,
  LoopbackFabric,
  LoopbackNetwork,
  defaultLoopbackNetwork,
  TcpFabric,
  TagWorker,
  tagSendMulti,
  tagRecvMulti,
} from "./transport";
export type {
  ConnectOptions,
  Fabric,
  ListenOptions,
  TransportConnection,
  TransportListener,
  TransportWorker,
  WorkerOptions,
} from "./transport";
export type { PendingOperation, RequestKind, RequestStatus } from "./request";
export {
  defaultSerializer,
  bytesDeserializer,
  textDeserializer,
  jsonDeserializer,
  jsonSerializer,
  createCborSerializer,
  createCborDeserializer,
} from "./codecs";
export { createConsoleTelemetryLogger } from "./telemetry-logger";
export { createLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export type * from "./types/types";
