import { ApiProperty } from '@nestjs/swagger';

/**
 * Response for GET /health endpoint
 */
export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall health status',
    example: 'ok',
    enum: ['ok', 'error'],
  })
  status!: string;

  @ApiProperty({
    description: 'Indicators that are up',
    example: {
      server: { status: 'up' },
      routes: { status: 'up', routes: 3, reconciledAt: '2026-01-01T00:00:00.000Z' },
      certificates: { status: 'up', tracked: 3, valid: 3, missing: [] },
    },
    required: false,
  })
  info?: Record<string, unknown>;

  @ApiProperty({
    description: 'Indicators that are down',
    example: {
      certificates: { status: 'down', tracked: 3, valid: 2, missing: ['app.example.com'] },
    },
    required: false,
  })
  error?: Record<string, unknown>;

  @ApiProperty({
    description: 'Results for all indicators',
    example: {
      server: { status: 'up' },
      routes: { status: 'up', routes: 3, reconciledAt: '2026-01-01T00:00:00.000Z' },
      certificates: { status: 'up', tracked: 3, valid: 3, missing: [] },
    },
  })
  details!: Record<string, unknown>;
}
