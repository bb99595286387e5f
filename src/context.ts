import { bytesDeserializer, defaultSerializer } from "./codecs";
import {
  resolveConfig,
  type ContextConfig,
  type ContextConfigInput,
  type ResolveConfigOptions,
} from "./config";
import { Endpoint, type EndpointCreateOptions } from "./endpoint";
import { TagwireError } from "./errors";
import { Listener, type EndpointListenerOptions } from "./listener";
import { createLogger, hex } from "./logger";
import { createProgressEngine, drainWorker, type ProgressEngine } from "./progress";
import { eventLoopScheduler, type Scheduler } from "./scheduler";
import { createFabric } from "./transport";
import type { Fabric, TransportWorker } from "./transport/types";
import type { ContextTelemetry, Deserializer, Serializer } from "./types/types";

const logger = createLogger("context");

export type ReferrerKind = "endpoint" | "listener";

export interface ApplicationContextOptions
  extends ContextConfigInput,
    ResolveConfigOptions {
  /** Use this transport context instead of building one from `fabric`. */
  transport?: Fabric;
  /** Scheduler for the progress binding started at construction. */
  scheduler?: Scheduler;
  /** Start progress on construction. Defaults to true. */
  startProgress?: boolean;
  /** Encoder used by `Endpoint.sendObject`. */
  serializer?: Serializer;
  /** Decoder used by `Endpoint.recvMessage`. Defaults to the raw bytes. */
  deserializer?: Deserializer;
}

export interface CreateEndpointOptions extends EndpointCreateOptions {
  /** Let peer closure fail in-flight operations. Defaults to true. */
  errorHandling?: boolean;
  connectTimeoutMs?: number;
}

interface Referrer {
  kind: ReferrerKind;
  label: string;
}

/**
 * Composition root: one transport context, one worker and the progress
 * bindings that drain it. Endpoints and listeners hold it without owning it.
 */
export class ApplicationContext {
  readonly fabric: Fabric;
  readonly worker: TransportWorker;
  readonly serializer: Serializer;
  readonly deserializer: Deserializer;
  private readonly config: ContextConfig;
  private readonly bindings = new Map<Scheduler, ProgressEngine>();
  private readonly referrers = new Map<number, Referrer>();
  private nextReferrer = 1;
  private isReset = false;

  constructor(options: ApplicationContextOptions = {}) {
    const {
      transport,
      scheduler,
      startProgress,
      serializer,
      deserializer,
      env,
      envTakesPrecedence,
      ...configInput
    } = options;
    this.config = resolveConfig(configInput, { env, envTakesPrecedence });
    this.fabric = transport ?? createFabric(this.config.fabric);
    this.worker = this.fabric.createWorker({
      delayedSubmission: this.config.enableDelayedSubmission,
    });
    this.serializer = serializer ?? defaultSerializer;
    this.deserializer = deserializer ?? bytesDeserializer;
    logger.info(
      `worker ${hex(this.worker.handle)} on ${this.fabric.kind} fabric, progress ${this.config.progressMode}`,
    );
    if (startProgress !== false) {
      this.continuousProgress(scheduler ?? eventLoopScheduler);
    }
  }

  get resetDone(): boolean {
    return this.isReset;
  }

  get progressBindings(): readonly ProgressEngine[] {
    return [...this.bindings.values()];
  }

  /**
   * Bind progress to `scheduler` using the configured mode. A scheduler that
   * already has a binding keeps it.
   */
  continuousProgress(scheduler: Scheduler = eventLoopScheduler): ProgressEngine {
    this.assertUsable();
    const existing = this.bindings.get(scheduler);
    if (existing) return existing;
    const engine = createProgressEngine(this.config.progressMode, this.worker, scheduler, {
      periodMs: this.config.notifierPeriodMs,
      notifier: this.config.enableFutureNotifier,
    });
    this.bindings.set(scheduler, engine);
    return engine;
  }

  /** Stop the binding of `scheduler`, or every binding when omitted. */
  async stopProgress(scheduler?: Scheduler): Promise<void> {
    const targets = scheduler
      ? [...this.bindings].filter(([key]) => key === scheduler)
      : [...this.bindings];
    for (const [key] of targets) this.bindings.delete(key);
    await Promise.all(targets.map(([, engine]) => engine.stop()));
  }

  /** One manual progress round; for callers driving progress themselves. */
  progress(): boolean {
    return drainWorker(this.worker);
  }

  async createEndpoint(
    host: string,
    port: number,
    options: CreateEndpointOptions = {},
  ): Promise<Endpoint> {
    this.assertUsable();
    const conn = await this.fabric.connect(this.worker, host, port, {
      errorHandling: options.errorHandling ?? true,
      connectTimeoutMs: options.connectTimeoutMs,
    });
    return Endpoint.create(this, conn, "connector", options);
  }

  async createListener(
    onAccept: (endpoint: Endpoint) => unknown,
    options: Omit<EndpointListenerOptions, "onAccept" | "deliverEndpoint"> = {},
  ): Promise<Listener> {
    this.assertUsable();
    return Listener.create(this, { ...options, onAccept, deliverEndpoint: true });
  }

  getWorkerHandle(): bigint {
    return this.worker.handle;
  }

  getConfig(): Readonly<ContextConfig> {
    return this.config;
  }

  telemetry(): ContextTelemetry {
    let endpoints = 0;
    let listeners = 0;
    for (const { kind } of this.referrers.values()) {
      if (kind === "endpoint") endpoints += 1;
      else listeners += 1;
    }
    return {
      endpoints,
      listeners,
      progressBindings: this.bindings.size,
      worker: this.worker.statistics(),
    };
  }

  /** Labels of every live endpoint and listener holding this context. */
  liveReferrers(): string[] {
    return [...this.referrers.values()].map(({ label }) => label);
  }

  addReferrer(kind: ReferrerKind, label: string): number {
    this.assertUsable();
    const token = this.nextReferrer;
    this.nextReferrer += 1;
    this.referrers.set(token, { kind, label });
    return token;
  }

  releaseReferrer(token: number): void {
    this.referrers.delete(token);
  }

  /**
   * Stop progress and retire the context. Refused while endpoints or
   * listeners still hold it.
   */
  async reset(): Promise<void> {
    if (this.isReset) return;
    if (this.referrers.size > 0) {
      const live = this.liveReferrers();
      throw new TagwireError(
        "E_CONTEXT_IN_USE",
        `Trying to reset the context but the following objects still hold it: ${live.join(", ")}`,
      );
    }
    this.isReset = true;
    await this.stopProgress();
    drainWorker(this.worker);
    logger.info(`context with worker ${hex(this.worker.handle)} reset`);
  }

  private assertUsable(): void {
    if (this.isReset) {
      throw new TagwireError("E_CONTEXT_RESET", "context has been reset");
    }
  }
}
