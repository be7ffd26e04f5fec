/**
 * Metrics Controller
 *
 * Exposes process, connection pool and application metrics in Prometheus
 * text format. Application series (HTTP, logins, lockouts, transfers, rate
 * limit and CSRF rejections) come from the metrics adapter.
 */

import { Request, Response } from 'express';
import { env } from '@/config/env';
import { pool } from '@/config/database';
import { metrics } from '@/adapters/metrics/MetricsFactory';

function gauge(lines: string[], name: string, help: string, value: number): void {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} gauge`);
  lines.push(`${name} ${value}`);
  lines.push('');
}

/**
 * GET /api/metrics
 * Format: https://prometheus.io/docs/instrumenting/exposition_formats/
 */
export function getMetrics(_req: Request, res: Response): void {
  const lines: string[] = [];

  lines.push(...metrics.toPrometheus());

  // Process
  const memUsage = process.memoryUsage();
  gauge(lines, 'process_uptime_seconds', 'Process uptime in seconds', process.uptime());
  gauge(lines, 'process_heap_used_bytes', 'Process heap memory used in bytes', memUsage.heapUsed);
  gauge(lines, 'process_rss_bytes', 'Process resident set size in bytes', memUsage.rss);

  const cpuUsage = process.cpuUsage();
  lines.push('# HELP process_cpu_seconds_total Total CPU time in seconds');
  lines.push('# TYPE process_cpu_seconds_total counter');
  lines.push(`process_cpu_seconds_total{mode="user"} ${cpuUsage.user / 1_000_000}`);
  lines.push(`process_cpu_seconds_total{mode="system"} ${cpuUsage.system / 1_000_000}`);
  lines.push('');

  // PostgreSQL pool
  gauge(lines, 'db_pool_total', 'Connections in the pool', pool.totalCount);
  gauge(lines, 'db_pool_idle', 'Idle connections in the pool', pool.idleCount);
  gauge(lines, 'db_pool_waiting', 'Requests waiting for a connection', pool.waitingCount);

  lines.push('# HELP app_info Application information');
  lines.push('# TYPE app_info gauge');
  lines.push(`app_info{version="1.0.0",node_version="${process.version}",env="${env.NODE_ENV}"} 1`);
  lines.push('');

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(lines.join('\n'));
}
