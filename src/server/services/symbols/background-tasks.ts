/**
 * background-tasks.ts — Fire-and-forget work with nobody to report to.
 *
 * A task's failure is logged here and goes no further. `drain()` lets
 * shutdown (and tests) wait for whatever is still running.
 */

import { log } from "../../logger.js";

export interface BackgroundTasks {
  /** Start `task` on a later microtask; returns immediately. */
  run(label: string, task: () => Promise<unknown>): void;
  /** Resolves once no task is pending, including tasks started while draining. */
  drain(): Promise<void>;
  pending(): number;
}

export function createBackgroundTasks(): BackgroundTasks {
  const inFlight = new Set<Promise<void>>();

  return {
    run(label, task) {
      const tracked: Promise<void> = Promise.resolve()
        .then(task)
        .then(
          () => undefined,
          (err: unknown) => {
            log.cache.error({ task: label, err: err instanceof Error ? err.message : String(err) }, "background task failed");
          },
        )
        .finally(() => {
          inFlight.delete(tracked);
        });
      inFlight.add(tracked);
    },

    async drain() {
      while (inFlight.size > 0) {
        await Promise.all([...inFlight]);
      }
    },

    pending() {
      return inFlight.size;
    },
  };
}
