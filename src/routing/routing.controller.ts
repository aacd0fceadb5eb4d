import { Controller, Get, HttpCode, HttpStatus, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { RouteTableService } from './route-table.service';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { RouteTableResponseDto } from './dto/route-response.dto';

@ApiTags('Routes')
@ApiSecurity('api-key')
@Controller('api/routes')
export class RoutingController {
  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly routeTableService: RouteTableService) {}

  /**
   * GET /api/routes
   * Requires X-API-Key header
   */
  @Get()
  @UseGuards(ApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List Routes', description: 'Returns the currently published hostname routes.' })
  @ApiResponse({ status: 200, type: RouteTableResponseDto })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  getRoutes(): RouteTableResponseDto {
    return {
      routes: this.routeTableService.snapshot().routes(),
      publishedAt: this.routeTableService.getLastPublishedAt()?.toISOString(),
      reconciledAt: this.routeTableService.getLastReconciledAt()?.toISOString(),
    };
  }
}
