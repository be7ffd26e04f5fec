/**
 * Metrics Factory
 *
 * Creates metrics instances based on METRICS_TYPE:
 * - memory → InMemoryMetrics (scraped from /api/metrics)
 * - noop → NoOpMetrics
 */

import { env } from '@/config/env';
import { IMetrics, IMetricsFactory } from '@/interfaces/IMetrics';
import { NoOpMetrics } from './NoOpMetrics';
import { InMemoryMetrics } from './InMemoryMetrics';

export class MetricsFactory implements IMetricsFactory {
  createMetrics(namespace?: string): IMetrics {
    switch (env.METRICS_TYPE) {
      case 'memory':
        return new InMemoryMetrics(namespace);

      case 'noop':
      default:
        return new NoOpMetrics();
    }
  }
}

/**
 * Default metrics instance for application use
 */
const factory = new MetricsFactory();
export const metrics = factory.createMetrics('bank');
