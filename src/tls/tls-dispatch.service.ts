import { Injectable, Logger } from '@nestjs/common';
import type { SecureContext } from 'tls';
import { CertificateStoreService } from '../certificate/store/certificate-store.service';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { isSafeFqdn, normalizeDnsName } from '../config/config.validators';
import { CertificateNotFoundError, InvalidSniError } from './tls.errors';
import type { CertificateProvider } from './interfaces';

type SniCallback = (err: Error | null, ctx?: SecureContext) => void;

/**
 * Picks the certificate for each TLS handshake from the certificate store.
 * Reads the cache, falling back to the persisted files; never issues.
 */
@Injectable()
export class TlsDispatchService implements CertificateProvider {
  private readonly logger = new Logger(TlsDispatchService.name);

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly store: CertificateStoreService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * @throws {InvalidSniError} If the server name is empty or blank.
   * @throws {CertificateNotFoundError} If no certificate is cached or stored for it.
   */
  async getCertificate(serverName: string | undefined): Promise<SecureContext> {
    const fqdn = normalizeDnsName(serverName ?? '');
    if (!fqdn) {
      this.metricsService.increment(METRIC_PATHS.TLS_SNI_MISSING);
      throw new InvalidSniError();
    }

    // Names that cannot be certificate files never reach the store
    const entry = isSafeFqdn(fqdn) ? await this.store.lookup(fqdn) : null;
    if (!entry) {
      this.metricsService.increment(METRIC_PATHS.TLS_CERTIFICATE_NOT_FOUND);
      throw new CertificateNotFoundError(fqdn);
    }

    return entry.secureContext;
  }

  /**
   * `SNICallback` for `tls.createServer`.
   */
  sniCallback(servername: string, cb: SniCallback): void {
    this.getCertificate(servername).then(
      (context) => cb(null, context),
      (error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.debug(`Rejecting handshake for "${servername}": ${err.message}`);
        cb(err);
      },
    );
  }
}
