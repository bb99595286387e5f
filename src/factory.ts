import {
  ApplicationContext,
  type ApplicationContextOptions,
  type CreateEndpointOptions,
} from "./context";
import type { Endpoint } from "./endpoint";
import { TagwireError } from "./errors";
import type { EndpointListenerOptions, Listener } from "./listener";
import type { ProgressEngine } from "./progress";
import type { Scheduler } from "./scheduler";

/*
 * Shared default context for applications that want one per process. Core
 * modules never reach for it; they take an ApplicationContext explicitly.
 */

let shared: ApplicationContext | null = null;
let pendingOptions: ApplicationContextOptions = {};

/** Create the shared context. Fails if one already exists. */
export function init(options: ApplicationContextOptions = {}): ApplicationContext {
  if (shared) {
    throw new TagwireError(
      "E_ALREADY_INITIALIZED",
      "shared context already initialized; call reset() first",
    );
  }
  shared = new ApplicationContext(options);
  return shared;
}

/** The shared context, created on first use from `setDefaultOptions`. */
export function getContext(): ApplicationContext {
  if (!shared) shared = new ApplicationContext(pendingOptions);
  return shared;
}

/** Options used when `getContext()` creates the shared context lazily. */
export function setDefaultOptions(options: ApplicationContextOptions): void {
  pendingOptions = options;
}

/**
 * Reset and drop the shared context. Refused while endpoints or listeners
 * still hold it, in which case it stays in place.
 */
export async function reset(): Promise<void> {
  const ctx = shared;
  if (!ctx) return;
  await ctx.reset();
  if (shared === ctx) shared = null;
}

export const stopProgress = (scheduler?: Scheduler): Promise<void> =>
  shared ? shared.stopProgress(scheduler) : Promise.resolve();

export const progress = (): boolean => getContext().progress();

export const continuousProgress = (scheduler?: Scheduler): ProgressEngine =>
  getContext().continuousProgress(scheduler);

export const createEndpoint = (
  host: string,
  port: number,
  options?: CreateEndpointOptions,
): Promise<Endpoint> => getContext().createEndpoint(host, port, options);

export const createListener = (
  onAccept: (endpoint: Endpoint) => unknown,
  options?: Omit<EndpointListenerOptions, "onAccept" | "deliverEndpoint">,
): Promise<Listener> => getContext().createListener(onAccept, options);

export const getWorkerHandle = (): bigint => getContext().getWorkerHandle();

/** Configuration of the shared context, or null before it exists. */
export const getConfig = () => shared?.getConfig() ?? null;
