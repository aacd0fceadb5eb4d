import { Injectable } from '@nestjs/common';
import { METRIC_PATHS } from './metrics.constants';
import type { MetricPath } from './metrics.constants';
import type { Metrics } from './interfaces';

/**
 * @class MetricsService
 * @description Collects in-process counters and gauges for route reconciliation,
 * certificate issuance, TLS handshakes and proxying, and exposes them as one snapshot.
 */
@Injectable()
export class MetricsService {
  /** Timestamp when the service was initialized, used for uptime calculation */
  private readonly startTime: number = Date.now();

  private readonly values = new Map<MetricPath, number>(Object.values(METRIC_PATHS).map((path) => [path, 0]));

  /**
   * Retrieves the current state of all metrics, with uptime computed at call time.
   */
  getMetrics(): Readonly<Metrics> {
    return {
      routes: {
        reconcile_total: this.get(METRIC_PATHS.ROUTES_RECONCILE_TOTAL),
        reconcile_failures: this.get(METRIC_PATHS.ROUTES_RECONCILE_FAILURES),
        reconcile_skipped: this.get(METRIC_PATHS.ROUTES_RECONCILE_SKIPPED),
        resolve_failures: this.get(METRIC_PATHS.ROUTES_RESOLVE_FAILURES),
        active: this.get(METRIC_PATHS.ROUTES_ACTIVE),
      },
      certificate: {
        obtain_attempts: this.get(METRIC_PATHS.CERT_OBTAIN_ATTEMPTS),
        obtain_success: this.get(METRIC_PATHS.CERT_OBTAIN_SUCCESS),
        obtain_failures: this.get(METRIC_PATHS.CERT_OBTAIN_FAILURES),
        cached: this.get(METRIC_PATHS.CERT_CACHED),
      },
      tls: {
        sni_missing: this.get(METRIC_PATHS.TLS_SNI_MISSING),
        certificate_not_found: this.get(METRIC_PATHS.TLS_CERTIFICATE_NOT_FOUND),
      },
      proxy: {
        requests_total: this.get(METRIC_PATHS.PROXY_REQUESTS_TOTAL),
        no_route_total: this.get(METRIC_PATHS.PROXY_NO_ROUTE_TOTAL),
        errors_total: this.get(METRIC_PATHS.PROXY_ERRORS_TOTAL),
      },
      server: {
        uptime_seconds: Math.floor((Date.now() - this.startTime) / 1000),
      },
    };
  }

  /**
   * Increments a metric by the given value (default: 1).
   */
  increment(path: MetricPath, value: number = 1): void {
    this.values.set(path, this.get(path) + value);
  }

  /**
   * Decrements a metric by the given value (default: 1).
   */
  decrement(path: MetricPath, value: number = 1): void {
    this.values.set(path, this.get(path) - value);
  }

  /**
   * Sets a gauge to an absolute value.
   */
  set(path: MetricPath, value: number): void {
    this.values.set(path, value);
  }

  private get(path: MetricPath): number {
    return this.values.get(path) ?? 0;
  }
}
