import type { Endpoint } from "./endpoint";
import type { Listener } from "./listener";

/** Run `fn` with the endpoint and close it afterwards, however `fn` ends. */
export async function withEndpoint<T>(
  endpoint: Endpoint | Promise<Endpoint>,
  fn: (endpoint: Endpoint) => T | Promise<T>,
): Promise<T> {
  const ep = await endpoint;
  try {
    return await fn(ep);
  } finally {
    await ep.close();
  }
}

export async function withListener<T>(
  listener: Listener | Promise<Listener>,
  fn: (listener: Listener) => T | Promise<T>,
): Promise<T> {
  const l = await listener;
  try {
    return await fn(l);
  } finally {
    l.close();
  }
}
