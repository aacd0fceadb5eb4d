export const METRIC_PATHS = {
  // Route reconciliation
  ROUTES_RECONCILE_TOTAL: 'routes.reconcile_total',
  ROUTES_RECONCILE_FAILURES: 'routes.reconcile_failures',
  ROUTES_RECONCILE_SKIPPED: 'routes.reconcile_skipped',
  ROUTES_RESOLVE_FAILURES: 'routes.resolve_failures',
  ROUTES_ACTIVE: 'routes.active',

  // Certificate
  CERT_OBTAIN_ATTEMPTS: 'certificate.obtain_attempts',
  CERT_OBTAIN_SUCCESS: 'certificate.obtain_success',
  CERT_OBTAIN_FAILURES: 'certificate.obtain_failures',
  CERT_CACHED: 'certificate.cached',

  // TLS handshakes
  TLS_SNI_MISSING: 'tls.sni_missing',
  TLS_CERTIFICATE_NOT_FOUND: 'tls.certificate_not_found',

  // Proxy
  PROXY_REQUESTS_TOTAL: 'proxy.requests_total',
  PROXY_NO_ROUTE_TOTAL: 'proxy.no_route_total',
  PROXY_ERRORS_TOTAL: 'proxy.errors_total',
} as const;

export type MetricPath = (typeof METRIC_PATHS)[keyof typeof METRIC_PATHS];
