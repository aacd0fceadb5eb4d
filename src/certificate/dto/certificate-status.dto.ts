import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CertificateFailureDto {
  @ApiProperty({ type: String, format: 'date-time' })
  at!: string;

  @ApiProperty({ example: 'ACME rate limit reached' })
  message!: string;
}

export class CertificateStatusDto {
  @ApiProperty({ example: 'app.example.com' })
  fqdn!: string;

  @ApiProperty({ description: 'A certificate is cached or stored for this hostname' })
  exists!: boolean;

  @ApiProperty({ description: 'The certificate is within its validity period' })
  valid!: boolean;

  @ApiProperty({ description: 'The hostname is currently routed' })
  tracked!: boolean;

  @ApiProperty({ description: 'An ACME order is in progress' })
  obtaining!: boolean;

  @ApiProperty()
  renewalDue!: boolean;

  @ApiPropertyOptional({ type: String, format: 'date-time' })
  issuedAt?: string;

  @ApiPropertyOptional({ type: String, format: 'date-time' })
  expiresAt?: string;

  @ApiPropertyOptional({ example: 62 })
  daysUntilExpiry?: number;

  @ApiPropertyOptional({ type: CertificateFailureDto })
  lastFailure?: CertificateFailureDto;
}

export class CertificateListResponseDto {
  @ApiProperty({ type: [CertificateStatusDto] })
  certificates!: CertificateStatusDto[];
}
