/**
 * packages/testkit/src/timers.ts — Deterministic timer service for tests.
 *
 * Callbacks run only when the test advances the clock. Callbacks due at the
 * same time run in scheduling order; a callback scheduled while advancing
 * runs in the same advance if it falls due inside the window.
 */

export type ManualTimers = Readonly<{
  schedule(delayMs: number, callback: () => void): void;
  /** Move the clock forward by `ms`, running every callback that falls due. */
  advance(ms: number): void;
  /** Number of callbacks not yet run. */
  pending(): number;
  now(): number;
}>;

type Scheduled = { dueAt: number; seq: number; callback: () => void };

export function createManualTimers(): ManualTimers {
  let clock = 0;
  let seq = 0;
  let queue: Scheduled[] = [];

  function nextDue(limit: number): Scheduled | null {
    let best: Scheduled | null = null;
    for (const item of queue) {
      if (item.dueAt > limit) continue;
      if (best === null || item.dueAt < best.dueAt || (item.dueAt === best.dueAt && item.seq < best.seq)) {
        best = item;
      }
    }
    return best;
  }

  return Object.freeze({
    schedule: (delayMs: number, callback: () => void) => {
      queue.push({ dueAt: clock + Math.max(0, delayMs), seq: seq++, callback });
    },
    advance: (ms: number) => {
      const target = clock + ms;
      for (let item = nextDue(target); item !== null; item = nextDue(target)) {
        const current = item;
        queue = queue.filter((q) => q !== current);
        clock = current.dueAt;
        current.callback();
      }
      clock = target;
    },
    pending: () => queue.length,
    now: () => clock,
  });
}
