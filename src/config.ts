import { ConfigError } from "./errors";

export type MetricsConfig = {
  logLevel: string;
  /** Period between two exports. */
  exportIntervalMs: number;
  /** Delay before the first export, so the stores are populated by then. */
  initialDelayMs: number;
};

const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const DEFAULT_EXPORT_INTERVAL_MS = 10 * 60 * 1000;

// Node clamps larger setTimeout/setInterval delays to 1 ms.
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export function isTimerDelay(ms: number): boolean {
  return Number.isInteger(ms) && ms > 0 && ms <= MAX_TIMER_DELAY_MS;
}

function parseDuration(env: NodeJS.ProcessEnv, variable: string, fallback: number): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(variable, `expected a positive integer of milliseconds, got "${raw}"`);
  }
  if (!isTimerDelay(value)) {
    throw new ConfigError(variable, `must be at most ${MAX_TIMER_DELAY_MS} milliseconds, got "${raw}"`);
  }
  return value;
}

/**
 * Environment variables:
 *
 * LOG_LEVEL                  (optional) pino level; default 'info'
 * METRICS_EXPORT_INTERVAL_MS (optional) export period; default 600000 (10 minutes)
 * METRICS_INITIAL_DELAY_MS   (optional) delay before the first export; defaults to the export period
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MetricsConfig {
  const logLevel = (env.LOG_LEVEL ?? "info").trim().toLowerCase();
  if (!LOG_LEVELS.has(logLevel)) {
    throw new ConfigError("LOG_LEVEL", `unknown level "${env.LOG_LEVEL}"`);
  }

  const exportIntervalMs = parseDuration(env, "METRICS_EXPORT_INTERVAL_MS", DEFAULT_EXPORT_INTERVAL_MS);
  const initialDelayMs = parseDuration(env, "METRICS_INITIAL_DELAY_MS", exportIntervalMs);

  return { logLevel, exportIntervalMs, initialDelayMs };
}
