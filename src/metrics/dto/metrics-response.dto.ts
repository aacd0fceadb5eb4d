import { ApiProperty } from '@nestjs/swagger';

/**
 * Route reconciliation metrics
 */
export class RouteMetricsDto {
  @ApiProperty({ description: 'Reconciliation cycles started', example: 120 })
  reconcile_total!: number;

  @ApiProperty({ description: 'Cycles whose discovery step failed', example: 2 })
  reconcile_failures!: number;

  @ApiProperty({ description: 'Ticks skipped because a cycle was still running', example: 0 })
  reconcile_skipped!: number;

  @ApiProperty({ description: 'Backends dropped because their address could not be resolved', example: 1 })
  resolve_failures!: number;

  @ApiProperty({ description: 'Routes in the published table', example: 6 })
  active!: number;
}

/**
 * Certificate issuance metrics
 */
export class CertificateMetricsDto {
  @ApiProperty({ description: 'ACME issuance attempts', example: 7 })
  obtain_attempts!: number;

  @ApiProperty({ description: 'Successful issuances', example: 6 })
  obtain_success!: number;

  @ApiProperty({ description: 'Failed issuances', example: 1 })
  obtain_failures!: number;

  @ApiProperty({ description: 'Certificates held in memory', example: 6 })
  cached!: number;
}

/**
 * TLS handshake metrics
 */
export class TlsMetricsDto {
  @ApiProperty({ description: 'Handshakes rejected for a missing server name', example: 3 })
  sni_missing!: number;

  @ApiProperty({ description: 'Handshakes rejected for an unknown server name', example: 12 })
  certificate_not_found!: number;
}

/**
 * Proxy metrics
 */
export class ProxyMetricsDto {
  @ApiProperty({ description: 'Requests received on the gateway', example: 5230 })
  requests_total!: number;

  @ApiProperty({ description: 'Requests answered with 502 for lack of a route', example: 4 })
  no_route_total!: number;

  @ApiProperty({ description: 'Requests that failed while forwarding', example: 1 })
  errors_total!: number;
}

/**
 * Server metrics
 */
export class ServerMetricsDto {
  @ApiProperty({ description: 'Seconds since the process started', example: 86400 })
  uptime_seconds!: number;
}

/**
 * Response body of GET /api/metrics
 */
export class MetricsResponseDto {
  @ApiProperty({ type: RouteMetricsDto })
  routes!: RouteMetricsDto;

  @ApiProperty({ type: CertificateMetricsDto })
  certificate!: CertificateMetricsDto;

  @ApiProperty({ type: TlsMetricsDto })
  tls!: TlsMetricsDto;

  @ApiProperty({ type: ProxyMetricsDto })
  proxy!: ProxyMetricsDto;

  @ApiProperty({ type: ServerMetricsDto })
  server!: ServerMetricsDto;
}
