/**
 * packages/core/src/runtime/timers.ts — Timer service used for hover timeouts.
 *
 * There is no cancel operation. A scheduled callback always runs; whoever
 * scheduled it re-checks its triggering condition when it fires.
 */

export interface TimerService {
  schedule(delayMs: number, callback: () => void): void;
}

/** Timer service backed by the Node event loop. Timers never keep the process alive. */
export function createNodeTimerService(): TimerService {
  return Object.freeze({
    schedule: (delayMs: number, callback: () => void) => {
      const handle = setTimeout(callback, Math.max(0, delayMs));
      handle.unref();
    },
  });
}
