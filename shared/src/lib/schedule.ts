/**
 * Completion-relative periodic execution.
 *
 * The delay starts counting once a run has finished, so runs of the same
 * task never overlap. Stopping prevents further runs; a run already in
 * flight is not interrupted and must be bounded by its own timeouts.
 */

import { errorMessage } from './errors';

export interface ScheduleHandle {
  /** Stops future runs. Resolves once the run in flight, if any, completes. */
  stop(): Promise<void>;
  readonly stopped: boolean;
}

export function schedule(task: () => Promise<unknown>, delayMs: number, name: string = 'task'): ScheduleHandle {
  let stopped = false;
  let timer: NodeJS.Timeout | undefined;
  let current: Promise<void> = Promise.resolve();

  const run = async (): Promise<void> => {
    try {
      await task();
    } catch (error) {
      console.error(`[SCHEDULER] ${name} failed:`, errorMessage(error));
    }
    if (!stopped) {
      timer = setTimeout(() => {
        current = run();
      }, delayMs);
    }
  };

  current = run();

  return {
    stop() {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      return current;
    },
    get stopped() {
      return stopped;
    }
  };
}
