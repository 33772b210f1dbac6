/**
 * packages/core/src/config.ts — View configuration and environment defaults.
 *
 * Environment:
 *   VELLUM_DEV=1                  enable dev warnings (1|true|yes|on)
 *   VELLUM_HOVER_TIMEOUT_MS=<ms>  delay before a hover tooltip is shown
 *
 * Explicit config wins over the environment. An explicit out-of-range value is
 * a programming error (VELLUM_INVALID_CONFIG); an unusable environment value
 * falls back to the default.
 */

import { type WarnSink, defaultWarnSink } from "./debug/devLog.js";
import { VellumError } from "./errors.js";
import { type TextMeasurer, createMonospaceTextMeasurer } from "./layout/textMeasure.js";
import { type TimerService, createNodeTimerService } from "./runtime/timers.js";

export type ViewConfig = Readonly<{
  hoverTimeoutMs?: number;
  devMode?: boolean;
  warn?: WarnSink;
  textMeasurer?: TextMeasurer;
  timers?: TimerService;
}>;

export type ResolvedViewConfig = Readonly<{
  hoverTimeoutMs: number;
  devMode: boolean;
  warn: WarnSink;
  textMeasurer: TextMeasurer;
  timers: TimerService;
}>;

export type EnvMap = Readonly<Record<string, string | undefined>>;

export const DEFAULT_HOVER_TIMEOUT_MS = 500;

function readEnv(env: EnvMap, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

function envFlag(env: EnvMap, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  return norm === "1" || norm === "true" || norm === "yes" || norm === "on";
}

function envPositiveInt(env: EnvMap, name: string, fallback: number): number {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}

export function resolveViewConfig(config: ViewConfig = {}, env: EnvMap = process.env): ResolvedViewConfig {
  let hoverTimeoutMs = envPositiveInt(env, "VELLUM_HOVER_TIMEOUT_MS", DEFAULT_HOVER_TIMEOUT_MS);
  if (config.hoverTimeoutMs !== undefined) {
    const v = config.hoverTimeoutMs;
    if (!Number.isInteger(v) || v <= 0) {
      throw new VellumError(
        "VELLUM_INVALID_CONFIG",
        `hoverTimeoutMs must be a positive integer, got ${String(v)}`,
      );
    }
    hoverTimeoutMs = v;
  }

  return Object.freeze({
    hoverTimeoutMs,
    devMode: config.devMode ?? envFlag(env, "VELLUM_DEV"),
    warn: config.warn ?? defaultWarnSink,
    textMeasurer: config.textMeasurer ?? createMonospaceTextMeasurer(),
    timers: config.timers ?? createNodeTimerService(),
  });
}
