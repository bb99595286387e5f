export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && value in LEVEL_ORDER;

// Read on every call so tests and long-running processes can flip it.
const currentLevel = (): LogLevel => {
  if (process.env.TAGWIRE_DEBUG === "1") return "debug";
  const configured = process.env.TAGWIRE_LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : "warn";
};

const enabled = (level: LogLevel): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];

export interface Logger {
  readonly debugEnabled: boolean;
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
}

/**
 * Console logger scoped as `[tagwire][scope]`.
 */
export const createLogger = (scope: string): Logger => {
  const prefix = `[tagwire][${scope}]`;
  return {
    get debugEnabled() {
      return enabled("debug");
    },
    debug(msg) {
      if (enabled("debug")) console.log(`${prefix} ${msg}`);
    },
    info(msg) {
      if (enabled("info")) console.info(`${prefix} ${msg}`);
    },
    warn(msg) {
      if (enabled("warn")) console.warn(`${prefix} ${msg}`);
    },
    error(msg, err) {
      if (!enabled("error")) return;
      if (err === undefined) {
        console.error(`${prefix} ${msg}`);
      } else {
        console.error(`${prefix} ${msg}`, err);
      }
    },
  };
};

export const hex = (value: bigint): string => `0x${value.toString(16)}`;
