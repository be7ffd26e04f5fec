/**
 * In-Memory Metrics Adapter
 *
 * Keeps counters, gauges and timing summaries in process memory and renders
 * them in Prometheus text format for GET /api/metrics.
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

// Keep only the last N samples per timing series to bound memory
const MAX_SAMPLES = 1000;

interface Series<T> {
  name: string;
  labels: string;
  value: T;
}

function formatLabels(dimensions?: MetricDimensions): string {
  if (!dimensions) return '';
  const entries = Object.entries(dimensions).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) return '';
  return `{${entries.map(([k, v]) => `${k}="${String(v).replace(/["\\\n]/g, '_')}"`).join(',')}}`;
}

export class InMemoryMetrics implements IMetrics {
  private counters = new Map<string, Series<number>>();
  private gauges = new Map<string, Series<number>>();
  private histograms = new Map<string, Series<number[]>>();

  constructor(private namespace: string = '') {}

  incrementCounter(name: string, value: number = 1, dimensions?: MetricDimensions): void {
    const series = this.series(this.counters, name, dimensions, () => 0);
    series.value += value;
  }

  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void {
    const series = this.series(this.gauges, name, dimensions, () => 0);
    series.value = value;
  }

  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void {
    const series = this.series(this.histograms, name, dimensions, () => []);
    series.value.push(value);
    if (series.value.length > MAX_SAMPLES) {
      series.value.shift();
    }
  }

  startTimer(name: string, dimensions?: MetricDimensions): () => void {
    const start = Date.now();
    return () => this.recordHistogram(name, Date.now() - start, dimensions);
  }

  /**
   * Current value of a counter (0 when never incremented)
   */
  getCounter(name: string, dimensions?: MetricDimensions): number {
    return this.counters.get(this.key(name, dimensions))?.value ?? 0;
  }

  toPrometheus(): string[] {
    const lines: string[] = [];

    for (const [name, series] of this.groupByName(this.counters)) {
      lines.push(`# TYPE ${name} counter`);
      for (const s of series) lines.push(`${name}${s.labels} ${s.value}`);
      lines.push('');
    }

    for (const [name, series] of this.groupByName(this.gauges)) {
      lines.push(`# TYPE ${name} gauge`);
      for (const s of series) lines.push(`${name}${s.labels} ${s.value}`);
      lines.push('');
    }

    for (const [name, series] of this.groupByName(this.histograms)) {
      lines.push(`# TYPE ${name} summary`);
      for (const s of series) {
        const sorted = [...s.value].sort((a, b) => a - b);
        const count = sorted.length;
        const sum = sorted.reduce((a, b) => a + b, 0);
        const p50 = sorted[Math.floor(count * 0.5)] ?? 0;
        const p99 = sorted[Math.floor(count * 0.99)] ?? 0;
        const base = s.labels ? s.labels.slice(0, -1) + ',' : '{';
        lines.push(`${name}${base}quantile="0.5"} ${p50}`);
        lines.push(`${name}${base}quantile="0.99"} ${p99}`);
        lines.push(`${name}_sum${s.labels} ${sum}`);
        lines.push(`${name}_count${s.labels} ${count}`);
      }
      lines.push('');
    }

    return lines;
  }

  async flush(): Promise<void> {
    // Nothing buffered: values are read on scrape
  }

  private series<T>(
    store: Map<string, Series<T>>,
    name: string,
    dimensions: MetricDimensions | undefined,
    initial: () => T
  ): Series<T> {
    const key = this.key(name, dimensions);
    let series = store.get(key);
    if (!series) {
      series = { name: this.qualify(name), labels: formatLabels(dimensions), value: initial() };
      store.set(key, series);
    }
    return series;
  }

  private key(name: string, dimensions?: MetricDimensions): string {
    return `${this.qualify(name)}${formatLabels(dimensions)}`;
  }

  private qualify(name: string): string {
    return this.namespace ? `${this.namespace}_${name}` : name;
  }

  private groupByName<T>(store: Map<string, Series<T>>): Map<string, Series<T>[]> {
    const grouped = new Map<string, Series<T>[]>();
    for (const series of store.values()) {
      const list = grouped.get(series.name) ?? [];
      list.push(series);
      grouped.set(series.name, list);
    }
    return grouped;
  }
}
