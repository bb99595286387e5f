import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveConfig } from "../src/config";
import { ConfigurationError } from "../src/errors";

describe("resolveConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies defaults", () => {
    expect(resolveConfig({}, { env: {} })).toEqual({
      progressMode: "thread",
      enableDelayedSubmission: true,
      enableFutureNotifier: true,
      fabric: "tcp",
      closeFlushTimeoutMs: 1000,
      notifierPeriodMs: 1000,
    });
  });

  it("reads the environment only for options left unset", () => {
    const env = {
      TAGWIRE_PROGRESS_MODE: "polling",
      TAGWIRE_ENABLE_DELAYED_SUBMISSION: "0",
      TAGWIRE_FABRIC: "loopback",
    };
    expect(resolveConfig({ progressMode: "thread-polling" }, { env })).toMatchObject({
      progressMode: "thread-polling",
      enableDelayedSubmission: false,
      fabric: "loopback",
    });
  });

  it("lets the environment win when asked", () => {
    const config = resolveConfig(
      { progressMode: "thread" },
      { env: { TAGWIRE_PROGRESS_MODE: " Polling " }, envTakesPrecedence: true },
    );
    expect(config.progressMode).toBe("polling");
    expect(config.enableFutureNotifier).toBe(false);
  });

  it("ignores empty environment values", () => {
    expect(resolveConfig({}, { env: { TAGWIRE_PROGRESS_MODE: "" } }).progressMode).toBe(
      "thread",
    );
  });

  it("rejects unknown modes from either source", () => {
    expect(() => resolveConfig({}, { env: { TAGWIRE_PROGRESS_MODE: "blocking" } })).toThrow(
      ConfigurationError,
    );
    expect(() =>
      resolveConfig({ fabric: "ib" } as unknown as Parameters<typeof resolveConfig>[0], {
        env: {},
      }),
    ).toThrow(/options\.fabric/);
    expect(() => resolveConfig({}, { env: { TAGWIRE_FABRIC: "native" } })).toThrow(
      /env\.fabric/,
    );
  });

  it("rejects unknown option keys", () => {
    expect(() =>
      resolveConfig({ blockingMode: true } as unknown as Parameters<typeof resolveConfig>[0], {
        env: {},
      }),
    ).toThrow(ConfigurationError);
  });

  it("lets a thread mode run without the notifier", () => {
    expect(
      resolveConfig({}, { env: { TAGWIRE_ENABLE_FUTURE_NOTIFIER: "0" } }),
    ).toMatchObject({ progressMode: "thread", enableFutureNotifier: false });
    expect(
      resolveConfig({ progressMode: "thread-polling", enableFutureNotifier: false }, { env: {} })
        .enableFutureNotifier,
    ).toBe(false);
  });

  it("disables the notifier with a warning under polling", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const config = resolveConfig(
      { progressMode: "polling" },
      { env: { TAGWIRE_ENABLE_FUTURE_NOTIFIER: "1" } },
    );
    expect(config.enableFutureNotifier).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      "[tagwire][config] future notifier requires a thread progress mode; disabling it",
    );
  });

  it("rejects malformed flags", () => {
    expect(() =>
      resolveConfig({}, { env: { TAGWIRE_ENABLE_DELAYED_SUBMISSION: "maybe" } }),
    ).toThrow(/env\.enableDelayedSubmission/);
  });
});
