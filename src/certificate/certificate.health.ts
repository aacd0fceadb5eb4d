import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { CertificateService } from './certificate.service';

/**
 * A health indicator for the certificates of routed hostnames.
 * It is down while any routed hostname has no currently valid certificate.
 */
@Injectable()
export class CertificateHealthIndicator {
  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly certificateService: CertificateService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  /**
   * @param key - A key to represent this health indicator in the results.
   */
  async isHealthy(key: string, now: Date = new Date()) {
    const statuses = (await this.certificateService.listStatuses(now)).filter((status) => status.tracked);
    const missing = statuses.filter((status) => !status.valid).map((status) => status.fqdn);

    const indicator = this.healthIndicatorService.check(key);
    const details = {
      tracked: statuses.length,
      valid: statuses.length - missing.length,
      missing,
    };

    if (missing.length === 0) {
      return indicator.up(details);
    }

    return indicator.down(details);
  }
}
