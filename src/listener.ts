import type { ApplicationContext } from "./context";
import { Endpoint, type EndpointCreateOptions } from "./endpoint";
import { toError } from "./errors";
import { createLogger } from "./logger";
import { eventLoopScheduler, type Scheduler } from "./scheduler";
import type { TransportConnection, TransportListener } from "./transport/types";

const logger = createLogger("listener");

interface ListenerCleanup {
  handle: TransportListener;
  ctx: ApplicationContext;
  referrer: number;
}

// Dropping the last reference to a Listener stops listening.
const finalizer = new FinalizationRegistry<ListenerCleanup>(held => {
  logger.warn(`listener on port ${held.handle.port} was collected while open; closing it`);
  held.handle.close();
  held.ctx.releaseReferrer(held.referrer);
});

interface ListenerOptionsBase extends EndpointCreateOptions {
  /** 0 picks a free port. */
  port?: number;
  host?: string;
  /** Error handling for accepted connections. Defaults to true. */
  errorHandling?: boolean;
  /** Scheduler that runs the accept callback. */
  scheduler?: Scheduler;
  /** Receives acceptor handshake failures; they are logged otherwise. */
  onError?: (err: Error) => void;
}

export interface EndpointListenerOptions extends ListenerOptionsBase {
  deliverEndpoint?: true;
  onAccept: (endpoint: Endpoint) => unknown;
}

export interface ConnectionListenerOptions extends ListenerOptionsBase {
  deliverEndpoint: false;
  onAccept: (connection: TransportConnection) => unknown;
}

export type ListenerOptions = EndpointListenerOptions | ConnectionListenerOptions;

/** Passive handle; each inbound connection is handshaken and handed over. */
export class Listener {
  private handle: TransportListener | null = null;
  private ctx: ApplicationContext | null;
  private readonly referrer: number;
  private readonly scheduler: Scheduler;

  static async create(ctx: ApplicationContext, options: ListenerOptions): Promise<Listener> {
    const listener = new Listener(ctx, options);
    const ref = new WeakRef(listener);
    try {
      const handle = await ctx.fabric.listen(
        ctx.worker,
        options.port ?? 0,
        conn => {
          const target = ref.deref();
          if (target) {
            target.handleConnection(conn);
          } else {
            conn.release();
          }
        },
        { errorHandling: options.errorHandling ?? true, host: options.host },
      );
      listener.attach(handle);
    } catch (err) {
      listener.detach();
      throw err;
    }
    logger.info(`listening on ${listener.ip}:${listener.port}`);
    return listener;
  }

  private constructor(
    ctx: ApplicationContext,
    private readonly options: ListenerOptions,
  ) {
    this.ctx = ctx;
    this.scheduler = options.scheduler ?? eventLoopScheduler;
    this.referrer = ctx.addReferrer("listener", `Listener(port ${options.port ?? 0})`);
  }

  get ip(): string {
    return this.handle?.ip ?? "";
  }

  get port(): number {
    return this.handle?.port ?? 0;
  }

  closed(): boolean {
    return this.handle === null || !this.handle.listening;
  }

  close(): void {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      finalizer.unregister(this);
      handle.close();
    }
    this.detach();
  }

  private attach(handle: TransportListener): void {
    this.handle = handle;
    if (this.ctx) {
      finalizer.register(this, { handle, ctx: this.ctx, referrer: this.referrer }, this);
    }
  }

  private detach(): void {
    const ctx = this.ctx;
    this.ctx = null;
    ctx?.releaseReferrer(this.referrer);
  }

  private handleConnection(conn: TransportConnection): void {
    this.scheduler.schedule(() => {
      this.accept(conn).catch(err => this.reportError(toError(err)));
    });
  }

  private async accept(conn: TransportConnection): Promise<void> {
    const ctx = this.ctx;
    if (!ctx) {
      conn.release();
      return;
    }
    const options = this.options;
    if (options.deliverEndpoint === false) {
      await this.invoke(() => options.onAccept(conn));
      return;
    }
    const endpoint = await Endpoint.create(ctx, conn, "acceptor", options);
    await this.invoke(() => options.onAccept(endpoint));
  }

  private async invoke(callback: () => unknown): Promise<void> {
    try {
      await callback();
    } catch (err) {
      logger.error("accept callback failed", err);
    }
  }

  private reportError(err: Error): void {
    if (this.options.onError) {
      this.options.onError(err);
    } else {
      logger.error("acceptor handshake failed", err);
    }
  }
}
