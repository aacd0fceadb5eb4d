import { Injectable, Logger, OnModuleInit, OnModuleDestroy, Inject } from '@nestjs/common';
import { CertificateStoreService } from './store/certificate-store.service';
import { CertificateStorageService } from './storage/certificate-storage.service';
import { CertificateWatcherService } from './watcher/certificate-watcher.service';
import { ACME_ISSUER, CERTIFICATE_CONFIG } from './certificate.tokens';
import type { AcmeIssuer, CertificateConfig, CertificateEntry, CertificateRecord, CertificateStatus } from './interfaces';
import { AccountCredentialError } from './certificate.errors';
import { daysUntil, isRenewalDue, parseCertificateMaterial } from './certificate.parser';
import type { CertificateEnsurer } from '../routing/interfaces';
import { SingleFlight } from '../shared/single-flight';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { getErrorMessage } from '../shared/error.utils';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Decides when each routed hostname needs a certificate and obtains it.
 *
 * Hostname state, conceptually: absent → obtaining → valid → expiring →
 * obtaining → valid | failed. There is no retry loop in here; the reconciler
 * calls `ensure` again on a later tick.
 */
@Injectable()
export class CertificateService implements CertificateEnsurer, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CertificateService.name);
  private readonly ensures = new SingleFlight<string, void>();
  private readonly obtains = new SingleFlight<string, CertificateRecord>();
  private readonly tracked = new Set<string>();
  private readonly failures = new Map<string, { at: Date; message: string }>();
  private readonly shutdown = new AbortController();

  /* v8 ignore next 8 - false positive on constructor parameter properties */
  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    @Inject(ACME_ISSUER) private readonly issuer: AcmeIssuer,
    private readonly store: CertificateStoreService,
    private readonly storageService: CertificateStorageService,
    private readonly watcherService: CertificateWatcherService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Registers the ACME account. An unusable stored account key aborts startup;
   * any other registration failure is retried before the next order.
   */
  async onModuleInit(): Promise<void> {
    try {
      await this.issuer.initialize();
    } catch (error) {
      if (error instanceof AccountCredentialError) {
        throw error;
      }
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`ACME account registration failed, retrying before the next order: ${err.message}`, err.stack);
    }

    this.watcherService.startWatching();
    this.logger.log('Certificate module initialised');
  }

  /**
   * Waits up to the shutdown grace period for running issuances, then abandons them.
   * An abandoned DNS-01 record is overwritten by the next attempt.
   */
  async onModuleDestroy(): Promise<void> {
    await this.watcherService.stopWatching();

    if (this.obtains.size > 0) {
      this.logger.log(`Waiting up to ${this.config.shutdownGrace}ms for ${this.obtains.size} certificate orders`);

      let timer: NodeJS.Timeout | undefined;
      const finished = await Promise.race([
        this.obtains.drain().then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), this.config.shutdownGrace);
        }),
      ]);
      clearTimeout(timer);

      if (!finished) {
        this.logger.warn('Abandoning certificate orders still running at shutdown');
      }
    }

    this.shutdown.abort();
  }

  /**
   * Makes sure a usable certificate exists for `fqdn`, obtaining one when it is
   * missing or due for renewal. Concurrent calls for one hostname share a single
   * run. Never rejects; a failure is logged and recorded for `getStatus`.
   */
  ensure(fqdn: string): Promise<void> {
    this.tracked.add(fqdn);

    return this.ensures.run(fqdn, async () => {
      if (this.shutdown.signal.aborted) {
        return;
      }

      const entry = await this.store.lookup(fqdn);
      if (entry && !isRenewalDue(entry.record, this.config.renewBeforeDays)) {
        return;
      }

      if (entry) {
        this.logger.log(`Certificate for ${fqdn} expires ${entry.record.notAfter.toISOString()}, renewing`);
      } else {
        this.logger.log(`No certificate for ${fqdn}, obtaining one`);
      }

      try {
        await this.obtain(fqdn);
      } catch (error) {
        this.logger.warn(`Certificate for ${fqdn} not obtained, will retry on a later tick: ${getErrorMessage(error)}`);
      }
    });
  }

  /**
   * Runs one ACME issuance for `fqdn`. The new certificate replaces the cached
   * one only after it parses, covers the hostname and matches its key; on any
   * failure the previous certificate stays in use.
   */
  obtain(fqdn: string): Promise<CertificateRecord> {
    return this.obtains.run(fqdn, async () => {
      this.metricsService.increment(METRIC_PATHS.CERT_OBTAIN_ATTEMPTS);

      let entry: CertificateEntry;
      try {
        const issued = await this.issuer.obtain(fqdn, this.shutdown.signal);
        const record = await parseCertificateMaterial(fqdn, issued.certificateChain, issued.privateKey);
        entry = this.store.createEntry(record);
      } catch (error) {
        this.recordFailure(fqdn, error);
        throw error;
      }

      this.store.put(entry);
      this.failures.delete(fqdn);
      this.metricsService.increment(METRIC_PATHS.CERT_OBTAIN_SUCCESS);

      try {
        this.storageService.saveCertificate(entry.record);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`Certificate for ${fqdn} is served but could not be saved: ${err.message}`, err.stack);
      }

      this.warnOnRenewalLoop(entry.record);
      this.logger.log(`Certificate obtained for ${fqdn}`, { expiresAt: entry.record.notAfter.toISOString() });
      return entry.record;
    });
  }

  /**
   * Certificate for the TLS path: cache, then disk. Never issues.
   */
  lookup(fqdn: string): Promise<CertificateEntry | null> {
    return this.store.lookup(fqdn);
  }

  isDue(fqdn: string, now: Date = new Date()): boolean {
    if (this.ensures.has(fqdn) || this.obtains.has(fqdn)) {
      return false;
    }

    const failure = this.failures.get(fqdn);
    if (failure && now.getTime() - failure.at.getTime() < this.config.retryBackoff) {
      return false;
    }

    const entry = this.store.get(fqdn);
    return !entry || isRenewalDue(entry.record, this.config.renewBeforeDays, now);
  }

  release(fqdn: string): void {
    if (this.tracked.delete(fqdn)) {
      this.failures.delete(fqdn);
      this.logger.log(`${fqdn} is no longer routed; its certificate is kept but not renewed`);
    }
  }

  isTracked(fqdn: string): boolean {
    return this.tracked.has(fqdn);
  }

  async getStatus(fqdn: string, now: Date = new Date()): Promise<CertificateStatus> {
    const entry = await this.store.lookup(fqdn);
    const failure = this.failures.get(fqdn);
    const base = {
      fqdn,
      tracked: this.tracked.has(fqdn),
      obtaining: this.obtains.has(fqdn),
      lastFailure: failure ? { at: failure.at, message: failure.message } : undefined,
    };

    if (!entry) {
      return { ...base, exists: false, valid: false, renewalDue: true };
    }

    const { notBefore, notAfter } = entry.record;
    return {
      ...base,
      exists: true,
      valid: notBefore <= now && notAfter > now,
      renewalDue: isRenewalDue(entry.record, this.config.renewBeforeDays, now),
      issuedAt: notBefore,
      expiresAt: notAfter,
      daysUntilExpiry: daysUntil(notAfter, now),
    };
  }

  /**
   * Status of every routed or cached hostname, sorted by name.
   */
  async listStatuses(now: Date = new Date()): Promise<CertificateStatus[]> {
    const names = new Set<string>([...this.tracked, ...this.store.list().map((entry) => entry.record.fqdn)]);
    return Promise.all([...names].sort().map((fqdn) => this.getStatus(fqdn, now)));
  }

  private recordFailure(fqdn: string, error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.failures.set(fqdn, { at: new Date(), message: err.message });
    this.metricsService.increment(METRIC_PATHS.CERT_OBTAIN_FAILURES);
    this.logger.error(`Failed to obtain certificate for ${fqdn}: ${err.message}`, err.stack);
  }

  private warnOnRenewalLoop(record: CertificateRecord): void {
    const lifetimeMs = record.notAfter.getTime() - record.notBefore.getTime();
    if (this.config.renewBeforeDays * DAY_MS >= lifetimeMs) {
      this.logger.error(
        `Renewal window of ${this.config.renewBeforeDays} days is not shorter than the ` +
          `${Math.floor(lifetimeMs / DAY_MS)}-day lifetime of ${record.fqdn}; it will be renewed on every check`,
      );
    }
  }
}
