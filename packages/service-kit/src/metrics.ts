// SPDX-License-Identifier: Apache-2.0
import type { Handler, MiddlewareHandler } from "hono";

const MAX_LATENCY_SAMPLES = 1000;

interface EndpointMetrics {
  count: number;
  errors: number;
  latencies: number[];
}

export interface EndpointSnapshot {
  count: number;
  errors: number;
  p50_ms: number;
  p99_ms: number;
}

export interface MetricsSnapshot {
  service: string;
  uptime_s: number;
  requests: { total: number; by_endpoint: Record<string, EndpointSnapshot> };
  errors: { total: number; by_status: Record<string, number> };
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}

/**
 * Per-endpoint request counters and latency samples. One registry per app, so two
 * apps in the same process (tests, mostly) never share counts.
 */
export class MetricsRegistry {
  private readonly startedAt = Date.now();
  private readonly endpoints = new Map<string, EndpointMetrics>();
  private readonly errorsByStatus = new Map<number, number>();
  private totalRequests = 0;
  private totalErrors = 0;

  private endpoint(key: string): EndpointMetrics {
    let m = this.endpoints.get(key);
    if (!m) {
      m = { count: 0, errors: 0, latencies: [] };
      this.endpoints.set(key, m);
    }
    return m;
  }

  record(key: string, status: number, latencyMs: number): void {
    const ep = this.endpoint(key);
    ep.count++;
    this.totalRequests++;

    if (ep.latencies.length >= MAX_LATENCY_SAMPLES) {
      ep.latencies.shift();
    }
    ep.latencies.push(latencyMs);

    if (status >= 400) {
      ep.errors++;
      this.totalErrors++;
      this.errorsByStatus.set(status, (this.errorsByStatus.get(status) ?? 0) + 1);
    }
  }

  snapshot(service: string): MetricsSnapshot {
    const byEndpoint: Record<string, EndpointSnapshot> = {};
    for (const [key, ep] of this.endpoints) {
      const sorted = [...ep.latencies].sort((a, b) => a - b);
      byEndpoint[key] = {
        count: ep.count,
        errors: ep.errors,
        p50_ms: percentile(sorted, 50),
        p99_ms: percentile(sorted, 99),
      };
    }

    const byStatus: Record<string, number> = {};
    for (const [status, count] of this.errorsByStatus) {
      byStatus[String(status)] = count;
    }

    return {
      service,
      uptime_s: Math.floor((Date.now() - this.startedAt) / 1000),
      requests: { total: this.totalRequests, by_endpoint: byEndpoint },
      errors: { total: this.totalErrors, by_status: byStatus },
    };
  }
}

export function metricsMiddleware(registry: MetricsRegistry): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    await next();
    registry.record(`${c.req.method} ${c.req.routePath}`, c.res.status, Date.now() - start);
  };
}

export function metricsHandler(registry: MetricsRegistry, serviceName: string): Handler {
  return (c) => c.json(registry.snapshot(serviceName));
}
