/**
 * Metrics Interface
 *
 * Abstraction for application and business metrics. Services record events
 * through this interface; the factory selects the backend.
 */

/**
 * Metric metadata - labels for metric filtering and grouping
 */
export type MetricDimensions = Record<string, string | number | boolean>;

/**
 * Metrics interface for tracking application and business events
 */
export interface IMetrics {
  /**
   * Increment a counter metric
   *
   * @param name - Metric name (e.g., "auth_logins_total")
   * @param value - Amount to increment by (default: 1)
   * @param dimensions - Optional labels (e.g., {outcome: "failure"})
   *
   * @example
   * metrics.incrementCounter("transactions_total", 1, {kind: "transfer", status: "completed"});
   */
  incrementCounter(name: string, value?: number, dimensions?: MetricDimensions): void;

  /**
   * Record a gauge metric (point-in-time value)
   */
  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Record a timing metric in milliseconds
   */
  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Start a timer for automatic duration tracking
   * @returns Function to call when operation completes
   *
   * @example
   * const endTimer = metrics.startTimer("transfer_duration_ms");
   * await engine.transfer(...);
   * endTimer();
   */
  startTimer(name: string, dimensions?: MetricDimensions): () => void;

  /**
   * Render collected metrics as Prometheus text lines
   * Backends that push elsewhere return an empty list.
   */
  toPrometheus(): string[];

  /**
   * Flush metrics to backend before shutdown
   */
  flush(): Promise<void>;
}

/**
 * Metrics Factory Interface
 */
export interface IMetricsFactory {
  /**
   * Create a metrics instance
   * @param namespace - Prefix for metric names (e.g., "bank")
   */
  createMetrics(namespace?: string): IMetrics;
}
