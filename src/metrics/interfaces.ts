/**
 * Snapshot of every metric the gateway tracks.
 */
export interface Metrics {
  routes: {
    /** Reconciliation cycles started */
    reconcile_total: number;
    /** Cycles whose discovery step failed */
    reconcile_failures: number;
    /** Ticks skipped because a cycle was still running */
    reconcile_skipped: number;
    /** Backends dropped because their address could not be resolved */
    resolve_failures: number;
    /** Routes in the published table */
    active: number;
  };
  certificate: {
    obtain_attempts: number;
    obtain_success: number;
    obtain_failures: number;
    /** Certificates held in the in-memory store */
    cached: number;
  };
  tls: {
    /** Handshakes rejected for a missing or empty server name */
    sni_missing: number;
    /** Handshakes rejected because no certificate exists for the name */
    certificate_not_found: number;
  };
  proxy: {
    requests_total: number;
    /** Requests answered with 502 because no route matched the Host header */
    no_route_total: number;
    /** Requests that failed while forwarding */
    errors_total: number;
  };
  server: {
    uptime_seconds: number;
  };
}
