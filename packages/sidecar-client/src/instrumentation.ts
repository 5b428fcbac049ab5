import type { SidecarOperation } from './types.js';

export interface RequestMetric {
  operation: SidecarOperation;
  endpoint: string; // Path only, sanitized
  method: string;
  status: number;
  durationMs: number;
  timestamp: number;
  errorCode?: string | undefined;
}

export interface MetricsSummary {
  total: number;
  failures: number;
  avgDuration: number;
  byOperation: Partial<Record<SidecarOperation, OperationMetrics>>;
  byStatus: Record<string, number>;
}

export interface OperationMetrics {
  calls: number;
  avgDuration: number;
}

export class InstrumentationCollector {
  private metrics: RequestMetric[] = [];

  record(metric: RequestMetric): void {
    this.metrics.push(metric);
  }

  getMetrics(): RequestMetric[] {
    return this.metrics;
  }

  getSummary(): MetricsSummary {
    if (this.metrics.length === 0) {
      return {
        total: 0,
        failures: 0,
        avgDuration: 0,
        byOperation: {},
        byStatus: {},
      };
    }

    const byOperation = this.metrics.reduce<Partial<Record<SidecarOperation, OperationMetrics>>>((acc, m) => {
      const current = acc[m.operation] ?? { calls: 0, avgDuration: 0 };
      const totalDuration = current.avgDuration * current.calls + m.durationMs;
      const calls = current.calls + 1;
      acc[m.operation] = { calls, avgDuration: totalDuration / calls };
      return acc;
    }, {});

    const byStatus = this.metrics.reduce<Record<string, number>>((acc, m) => {
      // Status 0 means the call never got a response
      const key = String(m.status);
      acc[key] = (acc[key] ?? 0) + 1;
      return acc;
    }, {});

    const totalDuration = this.metrics.reduce((sum, m) => sum + m.durationMs, 0);

    return {
      total: this.metrics.length,
      failures: this.metrics.filter((m) => m.errorCode !== undefined).length,
      avgDuration: totalDuration / this.metrics.length,
      byOperation,
      byStatus,
    };
  }
}

/**
 * Sanitizes a sidecar endpoint for logs and metrics: keeps the path only and
 * masks state keys and secret names.
 */
export function sanitizeEndpoint(endpoint: string): string {
  try {
    const url = new URL(endpoint, 'http://placeholder.com');

    return url.pathname
      .replace(/^(\/v1\.0\/state\/[^/]+)\/[^/]+$/, '$1/{key}')
      .replace(/^(\/v1\.0\/secrets\/[^/]+)\/[^/]+$/, '$1/{secret}');
  } catch {
    // If not a valid URL, just return the original
    return endpoint;
  }
}
