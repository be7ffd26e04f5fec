/**
 * No-Op Metrics Adapter
 *
 * Metrics implementation that does nothing. Selected with METRICS_TYPE=noop
 * and used as the default in unit tests.
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

export class NoOpMetrics implements IMetrics {
  incrementCounter(_name: string, _value?: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordGauge(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  startTimer(_name: string, _dimensions?: MetricDimensions): () => void {
    return () => {};
  }

  toPrometheus(): string[] {
    return [];
  }

  async flush(): Promise<void> {
    // No-op
  }
}
