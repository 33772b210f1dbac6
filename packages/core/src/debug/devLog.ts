/**
 * packages/core/src/debug/devLog.ts — Deduplicated development warnings.
 *
 * Why: Some conditions are legal but usually unintended (an overlay too large
 * for its window, an action callback that produced nothing). In dev mode they
 * are reported once per key through an injectable sink so tests and hosts can
 * capture them; outside dev mode nothing is emitted.
 */

export type WarnSink = (message: string) => void;

export type DevLogArea = "overlay" | "action" | "view";

export interface DevLog {
  /** Emit `detail` once per `key` (dev mode only). */
  warn(area: DevLogArea, key: string, detail: string): void;
}

export function defaultWarnSink(message: string): void {
  console.warn(message);
}

export function createDevLog(opts: Readonly<{ devMode: boolean; warn: WarnSink }>): DevLog {
  const warned = new Set<string>();
  return Object.freeze({
    warn: (area: DevLogArea, key: string, detail: string) => {
      if (!opts.devMode) return;
      const fullKey = `${area}:${key}`;
      if (warned.has(fullKey)) return;
      warned.add(fullKey);
      opts.warn(`[vellum][${area}] ${detail}`);
    },
  });
}
