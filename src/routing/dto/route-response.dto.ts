import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class RouteDto {
  @ApiProperty({ example: 'app.example.com' })
  fqdn!: string;

  @ApiProperty({ example: '10.88.0.5' })
  targetAddress!: string;

  @ApiProperty({ example: 8080 })
  targetPort!: number;
}

export class RouteTableResponseDto {
  @ApiProperty({ type: [RouteDto] })
  routes!: RouteDto[];

  @ApiPropertyOptional({ description: 'When the current table was published', type: String, format: 'date-time' })
  publishedAt?: string;

  @ApiPropertyOptional({
    description: 'When discovery last succeeded',
    type: String,
    format: 'date-time',
  })
  reconciledAt?: string;
}
