import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ApplicationContext } from "../src/context";
import type { Endpoint } from "../src/endpoint";
import {
  ClosedError,
  ConfigurationError,
  ConnectionError,
  TagwireError,
} from "../src/errors";
import {
  createCborDeserializer,
  createCborSerializer,
  textDeserializer,
} from "../src/codecs";
import type { Listener } from "../src/listener";
import { readU64 } from "../src/utils/bytes";
import { bytes, connectPair, createTestContext, teardown } from "./helpers";

describe("Endpoint", () => {
  let ctx: ApplicationContext;
  let client: Endpoint;
  let server: Endpoint;
  let listener: Listener;

  beforeEach(async () => {
    ctx = createTestContext();
    ({ client, server, listener } = await connectPair(ctx));
  });

  afterEach(async () => {
    await teardown(ctx, client, server, listener);
  });

  it("delivers a default-tagged buffer byte for byte", async () => {
    const [, received] = await Promise.all([
      client.send(bytes(1, 2, 3, 4)),
      server.recv(new Uint8Array(4)),
    ]);

    expect(Array.from(received)).toEqual([1, 2, 3, 4]);
    expect(server.finishedRecvCount).toBe(1);
    expect(server.recvCount).toBe(1);
    expect(client.sendCount).toBe(1);
  });

  it("receives a message that arrived before the receive was posted", async () => {
    await client.send(bytes(9, 8, 7));
    const received = await server.recv(new Uint8Array(16));
    expect(Array.from(received)).toEqual([9, 8, 7]);
  });

  it("writes into the caller's buffer", async () => {
    const target = new Uint8Array(4);
    await Promise.all([client.send(bytes(5, 6, 7, 8)), server.recv(target)]);
    expect(Array.from(target)).toEqual([5, 6, 7, 8]);
  });

  it("matches by user tag, not by submission order", async () => {
    const first = server.recv(new Uint8Array(1), { tag: 1n });
    const second = server.recv(new Uint8Array(1), { tag: 2n });
    await client.send(bytes(22), { tag: 2n });
    await client.send(bytes(11), { tag: 1n });

    expect(Array.from(await first)).toEqual([11]);
    expect(Array.from(await second)).toEqual([22]);
  });

  it("pairs forced tags verbatim on both sides", async () => {
    const tag = Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8]);
    const [, received] = await Promise.all([
      client.send(bytes(3), { tag, forceTag: true }),
      server.recv(new Uint8Array(1), { tag, forceTag: true }),
    ]);
    expect(Array.from(received)).toEqual([3]);
  });

  it("sends objects as a length prefix followed by the payload", async () => {
    const hello = new TextEncoder().encode("hello");
    const sending = client.sendObject(hello);

    const prefix = await server.recv(new Uint8Array(8));
    expect(readU64(prefix, 0)).toBe(5n);
    const payload = await server.recv(new Uint8Array(5));
    await sending;

    expect(new TextDecoder().decode(payload)).toBe("hello");
    expect(server.finishedRecvCount).toBe(2);
  });

  it("round-trips objects through recvObject", async () => {
    const sending = client.sendObject(new TextEncoder().encode("hello"));
    const received = await server.recvObject();
    await sending;
    expect(new TextDecoder().decode(received)).toBe("hello");
  });

  it("serializes structured objects with the context serializer", async () => {
    await client.sendObject({ op: "ping", seq: 1 });
    const received = await server.recvObject({ allocator: n => new Uint8Array(n) });
    expect(JSON.parse(new TextDecoder().decode(received))).toEqual({ op: "ping", seq: 1 });
  });

  it("fails a receive whose buffer is too small", async () => {
    await client.send(bytes(1, 2, 3));
    await expect(server.recv(new Uint8Array(2))).rejects.toMatchObject({
      code: "E_MESSAGE_TRUNCATED",
    });
  });

  it("rejects sends and receives after abort", async () => {
    client.abort();
    await expect(client.send(bytes(1))).rejects.toBeInstanceOf(ClosedError);
    await expect(client.recv(new Uint8Array(1))).rejects.toBeInstanceOf(ClosedError);
    expect(client.state).toBe("aborted");
    expect(client.closed()).toBe(true);
    expect(client.isAlive()).toBe(false);
    expect(() => client.getEndpointHandle()).toThrow(ClosedError);
  });

  it("makes abort and close idempotent and releases once", async () => {
    const onClose = vi.fn();
    client.setCloseCallback(onClose, "client");

    client.abort();
    client.abort();
    await client.close();

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith("client");
    expect(ctx.telemetry().endpoints).toBe(1);
  });

  it("closes gracefully after in-flight sends settle", async () => {
    const sending = client.send(bytes(4, 4));
    const closing = client.close();
    expect(client.state).toBe("shutting-down");
    await Promise.all([sending, closing, client.close()]);

    expect(client.state).toBe("closed");
    expect(Array.from(await server.recv(new Uint8Array(2)))).toEqual([4, 4]);
  });

  it("swallows the cancellation of a send torn down locally", async () => {
    const sending = client.send(bytes(1));
    client.abort();
    await expect(sending).resolves.toBeUndefined();
  });

  it("turns a receive canceled by local teardown into a closed error", async () => {
    const receiving = server.recv(new Uint8Array(1));
    server.abort();
    await expect(receiving).rejects.toBeInstanceOf(ClosedError);
  });

  it("fails sends once the peer has gone away", async () => {
    const closed = new Promise<void>(resolve => client.setCloseCallback(() => resolve()));
    server.abort();
    await closed;

    expect(client.isAlive()).toBe(false);
    expect(client.closed()).toBe(true);
    await expect(client.send(bytes(1))).rejects.toBeInstanceOf(ConnectionError);
  });

  it("releases an endpoint whose peer is gone on close", async () => {
    const closed = new Promise<void>(resolve => client.setCloseCallback(() => resolve()));
    server.abort();
    await closed;
    expect(ctx.telemetry().endpoints).toBe(1);

    await client.close();
    expect(client.state).toBe("aborted");
    expect(ctx.telemetry().endpoints).toBe(0);
  });

  it("forgets unreceived messages when aborted", async () => {
    for (let i = 0; i < 5; i += 1) {
      await client.send(bytes(i), { tag: 100n });
    }
    expect(ctx.telemetry().worker.unexpectedQueued).toBe(5);

    server.abort();
    expect(ctx.telemetry().worker.unexpectedQueued).toBe(0);
  });

  it("still receives a message that arrived before the peer closed", async () => {
    await server.send(bytes(42));
    const closed = new Promise<void>(resolve => client.setCloseCallback(() => resolve()));
    server.abort();
    await closed;

    expect(Array.from(await client.recv(new Uint8Array(1)))).toEqual([42]);
    await expect(client.recv(new Uint8Array(1))).rejects.toThrow("connection reset by peer");
  });

  it("reports the worker and endpoint handles", () => {
    expect(client.getWorkerHandle()).toBe(ctx.getWorkerHandle());
    expect(typeof client.getEndpointHandle()).toBe("bigint");
    expect(client.uid).toMatch(/^[0-9a-f]{16}$/);
  });
});

describe("Endpoint message codecs", () => {
  let ctx: ApplicationContext | undefined;
  const owned: Array<Endpoint | Listener> = [];

  afterEach(async () => {
    if (ctx) await teardown(ctx, ...owned.splice(0));
    ctx = undefined;
  });

  it("decodes with the context deserializer", async () => {
    const context = createTestContext({
      serializer: createCborSerializer(),
      deserializer: createCborDeserializer(),
    });
    ctx = context;
    const { client, server, listener } = await connectPair(context);
    owned.push(client, server, listener);

    await client.sendObject({ op: "put", key: "a", size: 3 });
    expect(await server.recvMessage()).toEqual({ op: "put", key: "a", size: 3 });
  });

  it("returns the payload bytes by default", async () => {
    const context = createTestContext();
    ctx = context;
    const { client, server, listener } = await connectPair(context);
    owned.push(client, server, listener);

    await client.sendObject(bytes(4, 5));
    const received = await server.recvMessage();
    expect(received).toBeInstanceOf(Uint8Array);
    expect(received).toEqual(bytes(4, 5));
  });

  it("takes a per-call deserializer", async () => {
    const context = createTestContext();
    ctx = context;
    const { client, server, listener } = await connectPair(context);
    owned.push(client, server, listener);

    await client.sendObject("hello");
    const text: string = await server.recvMessage({ deserializer: textDeserializer });
    expect(text).toBe("hello");
    expect(server.finishedRecvCount).toBe(2);
  });
});

describe("closeAfterNReceives", () => {
  let ctx: ApplicationContext;
  let client: Endpoint;
  let server: Endpoint;
  let listener: Listener;

  beforeEach(async () => {
    ctx = createTestContext();
    ({ client, server, listener } = await connectPair(ctx));
    for (let i = 0; i < 3; i += 1) {
      await client.send(bytes(i));
      await server.recv(new Uint8Array(1));
    }
  });

  afterEach(async () => {
    await teardown(ctx, client, server, listener);
  });

  it("aborts immediately when the count has been reached", () => {
    expect(server.finishedRecvCount).toBe(3);
    server.closeAfterNReceives(3, true);
    expect(server.closed()).toBe(true);
    expect(server.state).toBe("aborted");
  });

  it("refuses a threshold already in the past", () => {
    expect(() => server.closeAfterNReceives(2, true)).toThrow(ConfigurationError);
    expect(server.closed()).toBe(false);
  });

  it("aborts after the triggering receive has returned its data", async () => {
    server.closeAfterNReceives(1);
    await client.send(bytes(99));
    const received = await server.recv(new Uint8Array(1));

    expect(Array.from(received)).toEqual([99]);
    expect(server.closed()).toBe(true);
  });

  it("counts relative to the current receives by default", async () => {
    server.closeAfterNReceives(2);
    await client.send(bytes(1));
    await server.recv(new Uint8Array(1));
    expect(server.closed()).toBe(false);
    await client.send(bytes(2));
    await server.recv(new Uint8Array(1));
    expect(server.closed()).toBe(true);
  });

  it("can only be armed once", () => {
    server.closeAfterNReceives(5);
    expect(() => server.closeAfterNReceives(6)).toThrow(TagwireError);
    expect(() => server.closeAfterNReceives(6)).toThrow(/already been set to 8/);
  });
});
