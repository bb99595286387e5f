import net from "node:net";
import { ConnectionError, toError } from "../errors";
import { encodeFrame, FrameDecoder } from "../framing";
import { createLogger, hex } from "../logger";
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

const logger = createLogger("tcp");

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export class TcpConnection extends BaseConnection {
  private readonly decoder = new FrameDecoder();

  constructor(
    worker: TagWorker,
    private readonly socket: net.Socket,
    errorHandling: boolean,
  ) {
    super(worker, errorHandling);
    socket.setNoDelay(true);
    this.decoder.on("frame", frame => this.receiveFrame(frame));
    this.decoder.on("error", err => {
      logger.warn(`dropping ${hex(this.handle)} on bad frame: ${err.message}`);
      socket.destroy(err);
    });
    socket.on("data", chunk => this.decoder.push(chunk));
    socket.on("error", err => logger.debug(`socket error on ${hex(this.handle)}: ${err.message}`));
    socket.on("close", () => this.handlePeerClosed());
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  protected transmit(frame: OutboundFrame, done: (err?: Error) => void): void {
    if (this.socket.destroyed || !this.socket.writable) {
      done(new ConnectionError("connection reset by peer"));
      return;
    }
    this.socket.write(encodeFrame(frame), err => {
      done(err ? new ConnectionError(`write failed: ${err.message}`, { cause: err }) : undefined);
    });
  }

  protected shutdown(): void {
    this.decoder.reset();
    this.socket.end();
  }
}

class TcpListener implements TransportListener {
  constructor(private readonly server: net.Server) {}

  get ip(): string {
    const address = this.server.address();
    return address && typeof address === "object" ? address.address : "";
  }

  get port(): number {
    const address = this.server.address();
    return address && typeof address === "object" ? address.port : 0;
  }

  get listening(): boolean {
    return this.server.listening;
  }

  close(): void {
    if (!this.server.listening) return;
    this.server.close(err => {
      if (err) logger.debug(`listener close: ${err.message}`);
    });
  }
}

/** Framed TCP between processes; every tagged frame carries its 64-bit tag. */
export class TcpFabric implements Fabric {
  readonly kind = "tcp" as const;

  createWorker(options: WorkerOptions): TransportWorker {
    return new TagWorker(options);
  }

  async connect(
    worker: TransportWorker,
    host: string,
    port: number,
    options: ConnectOptions,
  ): Promise<TransportConnection> {
    const tagWorker = assertTagWorker(worker);
    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const timeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
      const attempt = net.createConnection({ host, port }, () => {
        clearTimeout(timer);
        attempt.off("error", onError);
        resolve(attempt);
      });
      const onError = (err: Error) => {
        clearTimeout(timer);
        reject(new ConnectionError(`connect to ${host}:${port} failed: ${err.message}`, { cause: err }));
      };
      const timer = setTimeout(() => {
        attempt.destroy();
        reject(new ConnectionError(`connect to ${host}:${port} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      attempt.once("error", onError);
    });
    return new TcpConnection(tagWorker, socket, options.errorHandling);
  }

  async listen(
    worker: TransportWorker,
    port: number,
    onConnection: (connection: TransportConnection) => void,
    options: ListenOptions,
  ): Promise<TransportListener> {
    const tagWorker = assertTagWorker(worker);
    const server = net.createServer(socket => {
      try {
        onConnection(new TcpConnection(tagWorker, socket, options.errorHandling));
      } catch (err) {
        logger.error("accept handler threw", err);
        socket.destroy(toError(err));
      }
    });
    await new Promise<void>((resolve, reject) => {
      server.once("error", err =>
        reject(new ConnectionError(`listen on port ${port} failed: ${err.message}`, { cause: err })),
      );
      server.listen(port, options.host ?? "0.0.0.0", () => resolve());
    });
    return new TcpListener(server);
  }
}
