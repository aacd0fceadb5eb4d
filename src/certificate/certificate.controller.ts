import { Controller, Get, HttpCode, HttpStatus, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { CertificateService } from './certificate.service';
import { ApiKeyGuard } from '../shared/guards/api-key.guard';
import { CertificateListResponseDto, CertificateStatusDto } from './dto/certificate-status.dto';
import type { CertificateStatus } from './interfaces';

/**
 * Read-only view of the certificates the gateway holds.
 */
@ApiTags('Certificates')
@ApiSecurity('api-key')
@Controller('api/certificates')
export class CertificateController {
  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly certificateService: CertificateService) {}

  /**
   * GET /api/certificates
   * Requires X-API-Key header
   */
  /* v8 ignore next 4 - decorator branch coverage false positive */
  @Get()
  @UseGuards(ApiKeyGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List Certificates', description: 'Returns the status of every routed or stored hostname.' })
  @ApiResponse({ status: 200, type: CertificateListResponseDto })
  @ApiResponse({ status: 401, description: 'Unauthorized, API key is missing or invalid.' })
  async getCertificates(): Promise<CertificateListResponseDto> {
    const statuses = await this.certificateService.listStatuses();
    return { certificates: statuses.map(toDto) };
  }
}

function toDto(status: CertificateStatus): CertificateStatusDto {
  return {
    fqdn: status.fqdn,
    exists: status.exists,
    valid: status.valid,
    tracked: status.tracked,
    obtaining: status.obtaining,
    renewalDue: status.renewalDue,
    issuedAt: status.issuedAt?.toISOString(),
    expiresAt: status.expiresAt?.toISOString(),
    daysUntilExpiry: status.daysUntilExpiry,
    lastFailure: status.lastFailure
      ? { at: status.lastFailure.at.toISOString(), message: status.lastFailure.message }
      : undefined,
  };
}
