import { Controller, Get, UseGuards, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiSecurity, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MetricsService } from './metrics.service';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { MetricsResponseDto } from './dto/metrics-response.dto';

@ApiTags('Metrics')
@ApiSecurity('api-key')
@Controller('api/metrics')
export class MetricsController {
  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly metricsService: MetricsService) {}

  /**
   * GET /api/metrics
   * Requires X-API-Key header
   */
  @Get()
  @UseGuards(ApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Get Gateway Metrics',
    description: 'Returns counters for reconciliation, certificate issuance, TLS handshakes and proxying.',
  })
  @ApiResponse({ status: 200, description: 'Metrics retrieved successfully.', type: MetricsResponseDto })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  getMetrics() {
    return this.metricsService.getMetrics();
  }
}
