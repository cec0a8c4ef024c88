import pino, { type Logger } from "pino";

export type { Logger };

export const SERVICE_NAME = "ingress-usage-metrics";

/** `level` should come from loadConfig(), which validates LOG_LEVEL. */
export function createLogger(level: string = "info"): Logger {
  return pino({ name: SERVICE_NAME, level });
}

/** Shared logger for components constructed without one. */
export const logger = createLogger();
