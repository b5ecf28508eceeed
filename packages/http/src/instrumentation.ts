export interface RequestMetric {
  /** Zero-based attempt index within its retry loop. */
  attempt: number;
  durationMs: number;
  endpoint: string; // Path only, sanitized
  error?: string | undefined;
  method: string;
  /** 0 when no response was received. */
  status: number;
  streaming: boolean;
  timestamp: number;
}

export interface MetricsSummary {
  total: number;
  failures: number;
  retries: number;
  avgDuration: number;
  byStatus: Record<string, number>;
  byEndpoint: Record<string, EndpointMetrics>;
}

export interface EndpointMetrics {
  calls: number;
  avgDuration: number;
}

/**
 * In-memory sink for per-attempt request metrics.
 */
export class InstrumentationCollector {
  private metrics: RequestMetric[] = [];

  record(metric: RequestMetric): void {
    this.metrics.push(metric);
  }

  getMetrics(): readonly RequestMetric[] {
    return this.metrics;
  }

  clear(): void {
    this.metrics = [];
  }

  getSummary(): MetricsSummary {
    if (this.metrics.length === 0) {
      return {
        total: 0,
        failures: 0,
        retries: 0,
        avgDuration: 0,
        byStatus: {},
        byEndpoint: {},
      };
    }

    const byStatus: Record<string, number> = {};
    const byEndpoint: Record<string, EndpointMetrics> = {};
    let totalDuration = 0;
    let failures = 0;
    let retries = 0;

    for (const m of this.metrics) {
      const statusKey = String(m.status);
      byStatus[statusKey] = (byStatus[statusKey] ?? 0) + 1;

      const key = `${m.method} ${m.endpoint}`;
      const current = byEndpoint[key] ?? { calls: 0, avgDuration: 0 };
      current.avgDuration = (current.avgDuration * current.calls + m.durationMs) / (current.calls + 1);
      current.calls += 1;
      byEndpoint[key] = current;

      totalDuration += m.durationMs;
      if (m.error !== undefined || m.status === 0 || m.status >= 400) failures++;
      if (m.attempt > 0) retries++;
    }

    return {
      total: this.metrics.length,
      failures,
      retries,
      avgDuration: totalDuration / this.metrics.length,
      byStatus,
      byEndpoint,
    };
  }
}

/**
 * Reduce an endpoint to its path and mask segments that look like keys or ids.
 */
export function sanitizeEndpoint(endpoint: string): string {
  try {
    const url = new URL(endpoint, 'http://placeholder.com');
    const pathname = url.pathname;

    return pathname
      .replace(/\/[a-f0-9]{32,}/gi, '/{id}') // Hex keys and ids
      .replace(/\/[A-Za-z0-9_-]{40,}/g, '/{token}'); // Base64-like keys
  } catch {
    // If not a valid URL, just return the original
    return endpoint;
  }
}
