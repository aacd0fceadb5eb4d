import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import type { HealthIndicatorResult } from '@nestjs/terminus';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { RoutingHealthIndicator } from '../routing/routing.health';
import { CertificateHealthIndicator } from '../certificate/certificate.health';
import { HealthResponseDto } from './dto/health-response.dto';

/**
 * Controller for handling health checks.
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    private readonly health: HealthCheckService,
    private readonly routing: RoutingHealthIndicator,
    private readonly certificate: CertificateHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  @ApiOperation({
    summary: 'Get Gateway Health Status',
    description: 'Reports whether discovery is current and every routed hostname has a valid certificate.',
  })
  @ApiResponse({
    status: 200,
    description: 'The gateway is healthy. See the response body for detailed status of each component.',
    type: HealthResponseDto,
  })
  @ApiResponse({
    status: 503,
    description: 'The gateway is unhealthy. One or more health checks failed.',
    type: HealthResponseDto,
  })
  check() {
    return this.health.check([
      () => Promise.resolve<HealthIndicatorResult>({ server: { status: 'up' } }),
      () => Promise.resolve(this.routing.isHealthy('routes')),
      () => this.certificate.isHealthy('certificates'),
    ]);
  }
}
