import type { ContextTelemetry } from "./types/types";

/**
 * Console telemetry logger; pass `ctx.telemetry()` snapshots to it.
 */
export const createConsoleTelemetryLogger = (prefix = "tagwire") => {
  return (metrics: ContextTelemetry) => {
    const msg = [
      `[${prefix}]`,
      `ep=${metrics.endpoints}`,
      `listen=${metrics.listeners}`,
      `bind=${metrics.progressBindings}`,
      `sub=${metrics.worker.submitted}`,
      `done=${metrics.worker.completed}`,
      `fail=${metrics.worker.failed}`,
      `drain=${metrics.worker.drained}`,
      `cancel=${metrics.worker.canceled}`,
      `unexp=${metrics.worker.unexpectedQueued}`,
    ].join(" ");
    console.log(msg);
  };
};
