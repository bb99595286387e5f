import { ApplicationContext, type ApplicationContextOptions } from "../src/context";
import type { Endpoint } from "../src/endpoint";
import type { Listener } from "../src/listener";
import { LoopbackFabric, LoopbackNetwork } from "../src/transport/loopback";

/** Context on a private loopback network with no environment overrides. */
export function createTestContext(
  options: ApplicationContextOptions = {},
): ApplicationContext {
  return new ApplicationContext({
    transport: new LoopbackFabric(new LoopbackNetwork()),
    progressMode: "thread",
    notifierPeriodMs: 50,
    env: {},
    ...options,
  });
}

export interface ConnectedPair {
  client: Endpoint;
  server: Endpoint;
  listener: Listener;
}

export async function connectPair(ctx: ApplicationContext): Promise<ConnectedPair> {
  let deliver: (endpoint: Endpoint) => void = () => undefined;
  const accepted = new Promise<Endpoint>(resolve => {
    deliver = resolve;
  });
  const listener = await ctx.createListener(endpoint => deliver(endpoint));
  const client = await ctx.createEndpoint(listener.ip, listener.port);
  const server = await accepted;
  return { client, server, listener };
}

/** Abort every endpoint, close every listener and reset the context. */
export async function teardown(
  ctx: ApplicationContext,
  ...owned: Array<Endpoint | Listener | undefined>
): Promise<void> {
  for (const item of owned) {
    if (!item) continue;
    if ("abort" in item) item.abort();
    else item.close();
  }
  await ctx.reset();
}

export const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);
