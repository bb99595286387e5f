import { afterEach, describe, expect, it } from "vitest";
import type { ApplicationContext } from "../src/context";
import { PollingProgressEngine, ThreadProgressEngine, drainWorker } from "../src/progress";
import { createScheduler } from "../src/scheduler";
import { TagWorker } from "../src/transport/worker";
import type { ProgressMode } from "../src/types/types";
import { bytes, connectPair, createTestContext, teardown } from "./helpers";

describe("progress modes", () => {
  let ctx: ApplicationContext | undefined;

  afterEach(async () => {
    await ctx?.reset();
    ctx = undefined;
  });

  it.each<ProgressMode>(["thread", "thread-polling", "polling"])(
    "exchanges messages under %s progress",
    async mode => {
      const context = createTestContext({ progressMode: mode });
      ctx = context;
      const { client, server, listener } = await connectPair(context);

      const [, received] = await Promise.all([
        client.send(bytes(1, 2)),
        server.recv(new Uint8Array(2)),
      ]);
      expect(Array.from(received)).toEqual([1, 2]);
      expect(context.getConfig().enableFutureNotifier).toBe(mode !== "polling");

      await teardown(context, client, server, listener);
    },
  );

  it.each<ProgressMode>(["thread", "thread-polling"])(
    "connects straight after constructing a %s context",
    async mode => {
      // A long period: only doorbell rings can drive the handshake.
      const context = createTestContext({ progressMode: mode, notifierPeriodMs: 60_000 });
      ctx = context;
      const { client, server, listener } = await connectPair(context);

      await client.send(bytes(5));
      expect(Array.from(await server.recv(new Uint8Array(1)))).toEqual([5]);

      await teardown(context, client, server, listener);
    },
  );

  it.each<ProgressMode>(["thread", "thread-polling"])(
    "runs %s progress without the notifier thread",
    async mode => {
      const context = createTestContext({ progressMode: mode, enableFutureNotifier: false });
      ctx = context;
      const engine = context.progressBindings[0];
      expect(engine).toBeInstanceOf(ThreadProgressEngine);
      expect(engine instanceof ThreadProgressEngine && engine.usesNotifierThread).toBe(false);
      const { client, server, listener } = await connectPair(context);

      const [, received] = await Promise.all([
        client.send(bytes(6, 7)),
        server.recv(new Uint8Array(2)),
      ]);
      expect(Array.from(received)).toEqual([6, 7]);

      await teardown(context, client, server, listener);
    },
  );

  it("exchanges messages without delayed submission", async () => {
    const context = createTestContext({ enableDelayedSubmission: false });
    ctx = context;
    const { client, server, listener } = await connectPair(context);

    await client.send(bytes(7));
    expect(Array.from(await server.recv(new Uint8Array(1)))).toEqual([7]);

    await teardown(context, client, server, listener);
  });

  it("resolves 1,000 concurrent send/recv pairs under thread progress", async () => {
    const context = createTestContext({ progressMode: "thread" });
    ctx = context;
    const { client, server, listener } = await connectPair(context);
    const count = 1000;
    let resolutions = 0;

    const receives = Array.from({ length: count }, async (_, i) => {
      const data = await server.recv(new Uint8Array(4), { tag: BigInt(i) });
      resolutions += 1;
      return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(0, true);
    });
    const sends = Array.from({ length: count }, async (_, i) => {
      const payload = new Uint8Array(4);
      new DataView(payload.buffer).setUint32(0, i, true);
      await client.send(payload, { tag: BigInt(i) });
      resolutions += 1;
    });

    const [values] = await Promise.all([Promise.all(receives), Promise.all(sends)]);

    expect(values).toEqual(Array.from({ length: count }, (_, i) => i));
    expect(resolutions).toBe(2 * count);
    expect(server.finishedRecvCount).toBe(count);
    const stats = context.telemetry().worker;
    expect(stats.failed).toBe(0);
    expect(stats.drained).toBe(stats.completed);

    await teardown(context, client, server, listener);
  }, 20_000);

  it("binds each scheduler at most once", async () => {
    const context = createTestContext({ progressMode: "polling" });
    ctx = context;
    const scheduler = createScheduler("worker-a");

    const first = context.continuousProgress(scheduler);
    const second = context.continuousProgress(scheduler);

    expect(second).toBe(first);
    expect(context.progressBindings).toHaveLength(2);
    expect(context.telemetry().progressBindings).toBe(2);

    await context.stopProgress(scheduler);
    expect(first.running).toBe(false);
    expect(context.progressBindings).toHaveLength(1);
  });

  it("keeps progressing through an extra scheduler after the default stops", async () => {
    const context = createTestContext({ progressMode: "polling" });
    ctx = context;
    const scheduler = createScheduler("worker-b");
    context.continuousProgress(scheduler);
    const { client, server, listener } = await connectPair(context);

    await context.stopProgress(context.progressBindings[0].scheduler);
    expect(context.progressBindings.map(binding => binding.scheduler)).toEqual([scheduler]);
    await client.send(bytes(3));
    expect(Array.from(await server.recv(new Uint8Array(1)))).toEqual([3]);

    await teardown(context, client, server, listener);
  });
});

describe("progress engines", () => {
  it("settles requests only when drained", async () => {
    const worker = new TagWorker({ delayedSubmission: true });
    const request = worker.postTagRecv(1n, new Uint8Array(1), 5n);
    worker.progress();
    worker.deliverTagged(1n, 5n, bytes(8));
    expect(request.status).toBe("staged");

    expect(drainWorker(worker)).toBe(false);
    expect(request.status).toBe("settled");
    expect(Array.from(await request.wait())).toEqual([8]);
  });

  it("wakes the thread engine through the doorbell", async () => {
    const worker = new TagWorker({ delayedSubmission: true });
    const scheduler = createScheduler("doorbell");
    const engine = new ThreadProgressEngine("thread", worker, scheduler, { periodMs: 1000 });
    try {
      const request = worker.postTagRecv(1n, new Uint8Array(1), 9n);
      worker.deliverTagged(1n, 9n, bytes(1));
      expect(Array.from(await request.wait())).toEqual([1]);
    } finally {
      await engine.stop();
    }
    expect(engine.running).toBe(false);
  });

  it("ticks for rings made before the notifier thread started", async () => {
    const worker = new TagWorker({ delayedSubmission: true });
    const scheduler = createScheduler("early-ring");
    const engine = new ThreadProgressEngine("thread", worker, scheduler, { periodMs: 60_000 });
    expect(engine.usesNotifierThread).toBe(true);
    try {
      // Let the start-up tick run first, so only the rings below can wake it.
      await scheduler.yield();
      const request = worker.postTagRecv(1n, new Uint8Array(1), 3n);
      worker.deliverTagged(1n, 3n, bytes(4));
      expect(Array.from(await request.wait())).toEqual([4]);
    } finally {
      await engine.stop();
    }
  });

  it("follows the worker doorbell on this thread without the notifier", async () => {
    const worker = new TagWorker({ delayedSubmission: true });
    const scheduler = createScheduler("in-thread");
    const engine = new ThreadProgressEngine("thread", worker, scheduler, {
      periodMs: 1000,
      notifier: false,
    });
    try {
      await scheduler.yield();
      const request = worker.postTagRecv(1n, new Uint8Array(1), 2n);
      expect(scheduler.pending).toBe(1);
      worker.deliverTagged(1n, 2n, bytes(9));
      expect(Array.from(await request.wait())).toEqual([9]);
    } finally {
      await engine.stop();
    }
    const pending = scheduler.pending;
    worker.postTagRecv(1n, new Uint8Array(1), 2n);
    expect(scheduler.pending).toBe(pending);
  });

  it("stops the polling loop", async () => {
    const worker = new TagWorker({ delayedSubmission: true });
    const engine = new PollingProgressEngine(worker, createScheduler("poll"));
    expect(engine.running).toBe(true);
    await engine.stop();
    expect(engine.running).toBe(false);
  });
});
