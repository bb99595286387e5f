import type { TransportWorker } from "../transport/types";

/** Upper bound on progress/drain rounds per tick before yielding. */
export const MAX_DRAIN_ROUNDS = 64;

/**
 * Run submissions and settle completions until the worker is idle or the round
 * budget is spent. Returns true when work may remain.
 */
export function drainWorker(worker: TransportWorker): boolean {
  for (let round = 0; round < MAX_DRAIN_ROUNDS; round += 1) {
    const progressed = worker.progress();
    const drained = worker.drainCompletions();
    if (!progressed && drained === 0) return false;
  }
  return true;
}
