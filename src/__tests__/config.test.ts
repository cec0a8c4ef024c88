import { describe, expect, it } from "vitest";
import { DEFAULT_EXPORT_INTERVAL_MS, loadConfig, MAX_TIMER_DELAY_MS } from "../config";
import { ConfigError } from "../errors";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      exportIntervalMs: DEFAULT_EXPORT_INTERVAL_MS,
      initialDelayMs: DEFAULT_EXPORT_INTERVAL_MS
    });
    expect(DEFAULT_EXPORT_INTERVAL_MS).toBe(600_000);
  });

  it("reads every variable", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      METRICS_EXPORT_INTERVAL_MS: "30000",
      METRICS_INITIAL_DELAY_MS: "1000"
    });

    expect(config).toEqual({ logLevel: "debug", exportIntervalMs: 30_000, initialDelayMs: 1_000 });
  });

  it("defaults the initial delay to the export interval", () => {
    expect(loadConfig({ METRICS_EXPORT_INTERVAL_MS: "45000" }).initialDelayMs).toBe(45_000);
  });

  it("normalizes the log level and treats blank durations as unset", () => {
    const config = loadConfig({ LOG_LEVEL: " WARN ", METRICS_EXPORT_INTERVAL_MS: "  " });

    expect(config.logLevel).toBe("warn");
    expect(config.exportIntervalMs).toBe(DEFAULT_EXPORT_INTERVAL_MS);
  });

  it.each(["abc", "0", "-5", "1.5", "2147483648", "3000000000"])("rejects export interval %s", (raw) => {
    expect(() => loadConfig({ METRICS_EXPORT_INTERVAL_MS: raw })).toThrow(ConfigError);
  });

  it("accepts the longest delay a timer can hold", () => {
    const config = loadConfig({ METRICS_EXPORT_INTERVAL_MS: "2147483647" });

    expect(config.exportIntervalMs).toBe(MAX_TIMER_DELAY_MS);
    expect(config.initialDelayMs).toBe(MAX_TIMER_DELAY_MS);
  });

  it("rejects an initial delay a timer cannot hold", () => {
    expect(() => loadConfig({ METRICS_INITIAL_DELAY_MS: "3000000000" })).toThrow(
      'METRICS_INITIAL_DELAY_MS: must be at most 2147483647 milliseconds, got "3000000000"'
    );
  });

  it("names the offending variable", () => {
    let caught: unknown;
    try {
      loadConfig({ METRICS_INITIAL_DELAY_MS: "soon" });
    } catch (err) {
      caught = err;
    }

    expect(ConfigError.isConfigError(caught) && caught.variable).toBe("METRICS_INITIAL_DELAY_MS");
    expect(ConfigError.isConfigError(caught) && caught.message).toBe(
      'METRICS_INITIAL_DELAY_MS: expected a positive integer of milliseconds, got "soon"'
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow('LOG_LEVEL: unknown level "verbose"');
  });
});
