import { z } from "zod";
import { ConfigurationError } from "./errors";
import { createLogger } from "./logger";
import type { FabricKind, ProgressMode } from "./types/types";

const logger = createLogger("config");

export const progressModeSchema = z.enum(["thread", "thread-polling", "polling"]);
export const fabricKindSchema = z.enum(["tcp", "loopback"]);

export const contextOptionsSchema = z
  .object({
    progressMode: progressModeSchema.optional(),
    enableDelayedSubmission: z.boolean().optional(),
    enableFutureNotifier: z.boolean().optional(),
    fabric: fabricKindSchema.optional(),
    closeFlushTimeoutMs: z.number().int().nonnegative().optional(),
    notifierPeriodMs: z.number().int().positive().optional(),
  })
  .strict();

export type ContextConfigInput = z.input<typeof contextOptionsSchema>;

export interface ContextConfig {
  progressMode: ProgressMode;
  enableDelayedSubmission: boolean;
  enableFutureNotifier: boolean;
  fabric: FabricKind;
  closeFlushTimeoutMs: number;
  notifierPeriodMs: number;
}

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Let environment variables override explicit options. */
  envTakesPrecedence?: boolean;
}

export const ENV = {
  progressMode: "TAGWIRE_PROGRESS_MODE",
  enableDelayedSubmission: "TAGWIRE_ENABLE_DELAYED_SUBMISSION",
  enableFutureNotifier: "TAGWIRE_ENABLE_FUTURE_NOTIFIER",
  fabric: "TAGWIRE_FABRIC",
} as const;

const FALSE_FLAGS = ["0", "false", "no", "off"];

const envFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["0", "1", "true", "false", "yes", "no", "on", "off"]))
  .transform(value => !FALSE_FLAGS.includes(value));

const envSchema = z.object({
  progressMode: z.string().trim().toLowerCase().pipe(progressModeSchema).optional(),
  enableDelayedSubmission: envFlagSchema.optional(),
  enableFutureNotifier: envFlagSchema.optional(),
  fabric: z.string().trim().toLowerCase().pipe(fabricKindSchema).optional(),
});

const describeIssues = (error: z.ZodError, source: string): string =>
  error.issues
    .map(issue => `${source}${issue.path.length ? `.${issue.path.join(".")}` : ""}: ${issue.message}`)
    .join("; ");

function readEnv(env: NodeJS.ProcessEnv): z.output<typeof envSchema> {
  const raw = {
    progressMode: env[ENV.progressMode] || undefined,
    enableDelayedSubmission: env[ENV.enableDelayedSubmission] || undefined,
    enableFutureNotifier: env[ENV.enableFutureNotifier] || undefined,
    fabric: env[ENV.fabric] || undefined,
  };
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(describeIssues(parsed.error, "env"));
  }
  return parsed.data;
}

/**
 * Merge explicit options with the environment. The environment is only
 * consulted for options left unset, unless `envTakesPrecedence` is given.
 */
export function resolveConfig(
  input: ContextConfigInput = {},
  options: ResolveConfigOptions = {},
): ContextConfig {
  const parsed = contextOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(describeIssues(parsed.error, "options"));
  }
  const explicit = parsed.data;
  const fromEnv = readEnv(options.env ?? process.env);
  const pick = <K extends keyof typeof fromEnv & keyof typeof explicit>(key: K) =>
    options.envTakesPrecedence
      ? fromEnv[key] ?? explicit[key]
      : explicit[key] ?? fromEnv[key];

  const progressMode = pick("progressMode") ?? "thread";
  let enableFutureNotifier = pick("enableFutureNotifier");
  if (progressMode === "polling") {
    if (enableFutureNotifier) {
      logger.warn("future notifier requires a thread progress mode; disabling it");
    }
    enableFutureNotifier = false;
  }

  return {
    progressMode,
    enableDelayedSubmission: pick("enableDelayedSubmission") ?? true,
    enableFutureNotifier: enableFutureNotifier ?? true,
    fabric: pick("fabric") ?? "tcp",
    closeFlushTimeoutMs: explicit.closeFlushTimeoutMs ?? 1000,
    notifierPeriodMs: explicit.notifierPeriodMs ?? 1000,
  };
}
