import { ConnectionError, TagwireError } from "../errors";
import { createLogger } from "../logger";
import { BaseConnection, type OutboundFrame } from "./connection";
import type {
  ConnectOptions,
  Fabric,
  ListenOptions,
  TransportConnection,
  TransportListener,
  TransportWorker,
  WorkerOptions,
} from "./types";
import { TagWorker, assertTagWorker } from "./worker";

const logger = createLogger("loopback");

const FIRST_EPHEMERAL_PORT = 49152;
const LAST_PORT = 65535;

export class LoopbackConnection extends BaseConnection {
  private peer?: LoopbackConnection;

  constructor(worker: TagWorker, errorHandling: boolean) {
    super(worker, errorHandling);
  }

  static pair(
    left: { worker: TagWorker; errorHandling: boolean },
    right: { worker: TagWorker; errorHandling: boolean },
  ): [LoopbackConnection, LoopbackConnection] {
    const a = new LoopbackConnection(left.worker, left.errorHandling);
    const b = new LoopbackConnection(right.worker, right.errorHandling);
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  protected transmit(frame: OutboundFrame, done: (err?: Error) => void): void {
    const peer = this.peer;
    if (!peer) {
      done(new ConnectionError("connection reset by peer"));
      return;
    }
    peer.receiveFrame(frame);
    done();
  }

  protected shutdown(): void {
    const peer = this.peer;
    this.peer = undefined;
    if (!peer) return;
    peer.peer = undefined;
    setImmediate(() => peer.handlePeerClosed());
  }
}

class LoopbackListener implements TransportListener {
  readonly ip = "127.0.0.1";
  private open = true;

  constructor(
    private readonly network: LoopbackNetwork,
    readonly port: number,
    readonly worker: TagWorker,
    readonly errorHandling: boolean,
    readonly onConnection: (connection: TransportConnection) => void,
  ) {}

  get listening(): boolean {
    return this.open;
  }

  close(): void {
    if (!this.open) return;
    this.open = false;
    this.network.unbind(this.port, this);
  }
}

/** Port registry shared by every loopback fabric that should see each other. */
export class LoopbackNetwork {
  private readonly bound = new Map<number, LoopbackListener>();
  private nextPort = FIRST_EPHEMERAL_PORT;

  get size(): number {
    return this.bound.size;
  }

  bind(listener: LoopbackListener): void {
    if (this.bound.has(listener.port)) {
      throw new ConnectionError(`address already in use: port ${listener.port}`);
    }
    this.bound.set(listener.port, listener);
  }

  unbind(port: number, listener: LoopbackListener): void {
    if (this.bound.get(port) === listener) this.bound.delete(port);
  }

  lookup(port: number): LoopbackListener | undefined {
    return this.bound.get(port);
  }

  allocatePort(): number {
    for (let i = FIRST_EPHEMERAL_PORT; i <= LAST_PORT; i += 1) {
      const port = this.nextPort;
      this.nextPort = port >= LAST_PORT ? FIRST_EPHEMERAL_PORT : port + 1;
      if (!this.bound.has(port)) return port;
    }
    throw new ConnectionError("no free loopback ports");
  }
}

export const defaultLoopbackNetwork = new LoopbackNetwork();

/** In-process fabric; connections only reach listeners on the same network. */
export class LoopbackFabric implements Fabric {
  readonly kind = "loopback" as const;

  constructor(readonly network: LoopbackNetwork = defaultLoopbackNetwork) {}

  createWorker(options: WorkerOptions): TransportWorker {
    return new TagWorker(options);
  }

  async connect(
    worker: TransportWorker,
    host: string,
    port: number,
    options: ConnectOptions,
  ): Promise<TransportConnection> {
    const listener = this.network.lookup(port);
    if (!listener?.listening) {
      throw new ConnectionError(`connection refused: ${host}:${port}`);
    }
    const [local, remote] = LoopbackConnection.pair(
      { worker: assertTagWorker(worker), errorHandling: options.errorHandling },
      { worker: listener.worker, errorHandling: listener.errorHandling },
    );
    setImmediate(() => {
      if (!listener.listening) {
        remote.release();
        return;
      }
      try {
        listener.onConnection(remote);
      } catch (err) {
        logger.error(`accept handler on port ${port} threw`, err);
      }
    });
    return local;
  }

  async listen(
    worker: TransportWorker,
    port: number,
    onConnection: (connection: TransportConnection) => void,
    options: ListenOptions,
  ): Promise<TransportListener> {
    if (!Number.isInteger(port) || port < 0 || port > LAST_PORT) {
      throw new TagwireError("E_CONFIGURATION", `invalid port ${port}`);
    }
    const listener = new LoopbackListener(
      this.network,
      port === 0 ? this.network.allocatePort() : port,
      assertTagWorker(worker),
      options.errorHandling,
      onConnection,
    );
    this.network.bind(listener);
    return listener;
  }
}
