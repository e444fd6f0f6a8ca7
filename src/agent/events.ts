import { getErrorMessage } from "../lib/errors.js";

/**
 * What changed in the runner: its run status, its log, or its configured clients.
 * Subscribers that only render the whole state can ignore it.
 */
export type RunnerUpdate = "status" | "log" | "config";

export type RunnerListener = (update: RunnerUpdate) => void;

const listeners = new Set<RunnerListener>();

export function subscribeRunnerUpdates(listener: RunnerListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

/** A throwing listener is reported and does not stop the others. */
export function notifyRunnerUpdate(update: RunnerUpdate): void {
  for (const listener of [...listeners]) {
    try {
      listener(update);
    } catch (err) {
      console.error(`Runner ${update} listener failed: ${getErrorMessage(err)}`);
    }
  }
}
