/**
 * Raised by loadConfig() for an environment variable it cannot use.
 */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  static isConfigError(err: unknown): err is ConfigError {
    return err instanceof ConfigError;
  }
}

/**
 * Raised when a MetricsSink rejects an export. The sink's own error is kept as `cause`.
 */
export class MetricsExportError extends Error {
  constructor(cause: unknown) {
    super(`Failed to export usage metrics: ${errorMessage(cause)}`, { cause });
    this.name = "MetricsExportError";
    Object.setPrototypeOf(this, MetricsExportError.prototype);
  }

  static isMetricsExportError(err: unknown): err is MetricsExportError {
    return err instanceof MetricsExportError;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
