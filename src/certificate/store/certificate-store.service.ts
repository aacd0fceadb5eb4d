import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import * as tls from 'tls';
import { CertificateStorageService } from '../storage/certificate-storage.service';
import type { CertificateEntry, CertificateFilesChangedEvent, CertificateRecord } from '../interfaces';
import { CERTIFICATE_FILES_CHANGED_EVENT } from '../certificate.tokens';
import { CertificateValidationError } from '../certificate.errors';
import { SingleFlight } from '../../shared/single-flight';
import { MetricsService } from '../../metrics/metrics.service';
import { METRIC_PATHS } from '../../metrics/metrics.constants';
import { getErrorMessage } from '../../shared/error.utils';

/**
 * In-memory certificate cache in front of the on-disk storage.
 *
 * The map is replaced on every write and never modified in place, so readers
 * on the handshake path see a consistent map without locking. Writes happen
 * after a successful issuance or a successful load from disk.
 */
@Injectable()
export class CertificateStoreService {
  private readonly logger = new Logger(CertificateStoreService.name);
  private entries: ReadonlyMap<string, CertificateEntry> = new Map();
  private readonly loads = new SingleFlight<string, CertificateEntry | null>();

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly storageService: CertificateStorageService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Cached entry only; never touches the disk.
   */
  get(fqdn: string): CertificateEntry | undefined {
    return this.entries.get(fqdn);
  }

  /**
   * Cached entry, falling back to a load from disk. Concurrent lookups for the
   * same hostname share one load. Invalid stored material counts as absent.
   */
  async lookup(fqdn: string): Promise<CertificateEntry | null> {
    const cached = this.entries.get(fqdn);
    if (cached) {
      return cached;
    }

    return this.loads.run(fqdn, () => this.loadFromDisk(fqdn));
  }

  /**
   * Builds the TLS context for a record.
   * @throws {CertificateValidationError} If the key does not match the certificate.
   */
  createEntry(record: CertificateRecord): CertificateEntry {
    try {
      const secureContext = tls.createSecureContext({
        cert: record.certificateChain,
        key: record.privateKey,
      });
      return { record, secureContext };
    } catch (error) {
      throw new CertificateValidationError(
        `Certificate and key for ${record.fqdn} do not form a usable pair: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }
  }

  put(entry: CertificateEntry): void {
    const next = new Map(this.entries);
    next.set(entry.record.fqdn, entry);
    this.replace(next);
  }

  evict(fqdn: string): boolean {
    if (!this.entries.has(fqdn)) {
      return false;
    }
    const next = new Map(this.entries);
    next.delete(fqdn);
    this.replace(next);
    return true;
  }

  list(): CertificateEntry[] {
    return [...this.entries.values()];
  }

  /**
   * Picks up operator edits to the certificate directory. A removed pair stops
   * being served; a replaced pair is served once it parses and validates.
   */
  @OnEvent(CERTIFICATE_FILES_CHANGED_EVENT)
  async handleFilesChanged(event: CertificateFilesChangedEvent): Promise<void> {
    const { fqdn } = event;

    let record: CertificateRecord | null;
    try {
      record = await this.storageService.loadCertificate(fqdn);
    } catch (error) {
      this.logger.warn(`Ignoring invalid certificate files for ${fqdn}: ${getErrorMessage(error)}`);
      return;
    }

    if (!record) {
      if (this.evict(fqdn)) {
        this.logger.log(`Certificate files for ${fqdn} removed, no longer serving it`);
      }
      return;
    }

    const cached = this.entries.get(fqdn);
    if (cached && cached.record.certificateChain.equals(record.certificateChain)) {
      return;
    }

    try {
      this.put(this.createEntry(record));
      this.logger.log(`Reloaded certificate for ${fqdn} from disk`, { expiresAt: record.notAfter.toISOString() });
    } catch (error) {
      this.logger.warn(`Ignoring invalid certificate files for ${fqdn}: ${getErrorMessage(error)}`);
    }
  }

  private async loadFromDisk(fqdn: string): Promise<CertificateEntry | null> {
    let record: CertificateRecord | null;
    try {
      record = await this.storageService.loadCertificate(fqdn);
    } catch (error) {
      this.logger.warn(`Failed to load stored certificate for ${fqdn}: ${getErrorMessage(error)}`);
      return null;
    }

    if (!record) {
      return null;
    }

    // An issuance may have completed while the files were being read
    const current = this.entries.get(fqdn);
    if (current) {
      return current;
    }

    try {
      const entry = this.createEntry(record);
      this.put(entry);
      this.logger.log(`Loaded certificate for ${fqdn} from disk`, { expiresAt: record.notAfter.toISOString() });
      return entry;
    } catch (error) {
      this.logger.warn(getErrorMessage(error));
      return null;
    }
  }

  private replace(next: Map<string, CertificateEntry>): void {
    this.entries = next;
    this.metricsService.set(METRIC_PATHS.CERT_CACHED, next.size);
  }
}
