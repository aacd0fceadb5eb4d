import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { TerminusModule } from '@nestjs/terminus';
import { CertificateController } from './certificate.controller';
import { CertificateService } from './certificate.service';
import { AcmeClientService } from './acme/acme-client.service';
import { CertificateStorageService } from './storage/certificate-storage.service';
import { CertificateStoreService } from './store/certificate-store.service';
import { CertificateWatcherService } from './watcher/certificate-watcher.service';
import { CertificateHealthIndicator } from './certificate.health';
import { GandiDnsProvider } from './dns/gandi-dns.provider';
import type { CertificateConfig } from './interfaces';
import type { DnsConfig } from './dns/interfaces';
import { ACME_ISSUER, CERTIFICATE_CONFIG } from './certificate.tokens';
import { DNS_CHALLENGE_PROVIDER, DNS_CONFIG } from './dns/dns.tokens';
import { CERTIFICATE_ENSURER } from '../routing/routing.tokens';

const certificateConfigProvider = {
  provide: CERTIFICATE_CONFIG,
  useFactory: (configService: ConfigService): CertificateConfig =>
    configService.getOrThrow<CertificateConfig>('podgate.certificate'),
  inject: [ConfigService],
};

const dnsConfigProvider = {
  provide: DNS_CONFIG,
  useFactory: (configService: ConfigService): DnsConfig => configService.getOrThrow<DnsConfig>('podgate.dns'),
  inject: [ConfigService],
};

/**
 * Certificate issuance (ACME with DNS-01), persistence, the in-memory store
 * read by the TLS handshake path, and the lifecycle manager driving them.
 */
@Module({
  imports: [HttpModule, TerminusModule],
  controllers: [CertificateController],
  providers: [
    certificateConfigProvider,
    dnsConfigProvider,
    GandiDnsProvider,
    { provide: DNS_CHALLENGE_PROVIDER, useExisting: GandiDnsProvider },
    AcmeClientService,
    { provide: ACME_ISSUER, useExisting: AcmeClientService },
    CertificateStorageService,
    CertificateStoreService,
    CertificateWatcherService,
    CertificateService,
    { provide: CERTIFICATE_ENSURER, useExisting: CertificateService },
    CertificateHealthIndicator,
  ],
  exports: [CertificateStoreService, CertificateService, CERTIFICATE_ENSURER, CertificateHealthIndicator],
})
export class CertificateModule {}
