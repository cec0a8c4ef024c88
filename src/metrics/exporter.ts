import { DEFAULT_EXPORT_INTERVAL_MS, isTimerDelay, MAX_TIMER_DELAY_MS } from "../config";
import { errorMessage, MetricsExportError } from "../errors";
import { logger as defaultLogger, type Logger } from "../logger";
import type { ControllerMetrics, IngressMetrics, NegMetrics } from "./controllerMetrics";

/**
 * Receives computed usage counts. Serialization and transport belong to the sink.
 */
export type MetricsSink = {
  exportIngressMetrics(metrics: IngressMetrics): void | Promise<void>;
  exportNegMetrics(metrics: NegMetrics): void | Promise<void>;
};

export type MetricsExporterOptions = {
  intervalMs?: number;     // default 10 minutes
  initialDelayMs?: number; // default intervalMs
  logger?: Logger;
};

/**
 * Periodically computes usage metrics and hands them to a sink.
 *
 * The first export waits `initialDelayMs` so the controllers have had time
 * to report their state; after that it runs every `intervalMs`. A tick that
 * fires while the previous export is still in flight is skipped.
 */
export class MetricsExporter {
  private readonly intervalMs: number;
  private readonly initialDelayMs: number;
  private readonly logger: Logger;
  private delayTimer: ReturnType<typeof setTimeout> | null = null;
  private intervalTimer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private exporting = false;

  constructor(
    private readonly metrics: ControllerMetrics,
    private readonly sink: MetricsSink,
    opts?: MetricsExporterOptions
  ) {
    this.intervalMs = opts?.intervalMs ?? DEFAULT_EXPORT_INTERVAL_MS;
    this.initialDelayMs = opts?.initialDelayMs ?? this.intervalMs;
    this.logger = opts?.logger ?? defaultLogger;

    for (const [name, ms] of [["intervalMs", this.intervalMs], ["initialDelayMs", this.initialDelayMs]] as const) {
      if (!isTimerDelay(ms)) {
        throw new RangeError(`${name} must be a positive integer of at most ${MAX_TIMER_DELAY_MS} ms, got ${ms}`);
      }
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.logger.info(
      { intervalMs: this.intervalMs, initialDelayMs: this.initialDelayMs },
      "Usage metrics exporter started"
    );

    this.delayTimer = setTimeout(() => {
      this.delayTimer = null;
      this.tick();
      this.intervalTimer = setInterval(() => this.tick(), this.intervalMs);
    }, this.initialDelayMs);
  }

  stop() {
    if (!this.running) return;
    this.running = false;

    if (this.delayTimer !== null) {
      clearTimeout(this.delayTimer);
      this.delayTimer = null;
    }
    if (this.intervalTimer !== null) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }

    this.logger.info("Usage metrics exporter stopped");
  }

  /**
   * Computes both metric sets and exports each of them, even when the other fails.
   * Rejects with one MetricsExportError if either export fails.
   */
  async exportOnce(): Promise<void> {
    const ingressMetrics = this.metrics.computeIngressMetrics();
    const negMetrics = this.metrics.computeNegMetrics();

    this.logger.debug("Exporting usage metrics");
    const failures: unknown[] = [];
    try {
      await this.sink.exportIngressMetrics(ingressMetrics);
    } catch (err) {
      failures.push(err);
    }
    try {
      await this.sink.exportNegMetrics(negMetrics);
    } catch (err) {
      failures.push(err);
    }

    if (failures.length === 1) throw new MetricsExportError(failures[0]);
    if (failures.length > 1) {
      throw new MetricsExportError(new AggregateError(failures, failures.map(errorMessage).join("; ")));
    }
    this.logger.debug("Usage metrics exported");
  }

  private tick() {
    if (this.exporting) {
      this.logger.warn("Previous usage metrics export still running, skipping this one");
      return;
    }
    this.exporting = true;
    void this.exportOnce()
      .catch((err: unknown) => {
        const cause = MetricsExportError.isMetricsExportError(err) ? err.cause : err;
        this.logger.error({ err: errorMessage(cause) }, "Usage metrics export failed");
      })
      .finally(() => {
        this.exporting = false;
      });
  }
}

function countsToObject<F extends string>(counts: Map<F, number>): Record<string, number> {
  return Object.fromEntries(counts);
}

/** A sink that writes every count to the log, for deployments without a metrics backend. */
export function createLogSink(logger: Logger = defaultLogger): MetricsSink {
  return {
    exportIngressMetrics({ ingressCount, servicePortCount }) {
      logger.info(
        { ingressCount: countsToObject(ingressCount), servicePortCount: countsToObject(servicePortCount) },
        "Ingress usage metrics"
      );
    },
    exportNegMetrics(negCount) {
      logger.info({ negCount: countsToObject(negCount) }, "NEG usage metrics");
    }
  };
}
