import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import * as chokidar from 'chokidar';
import { CertificateStorageService } from '../storage/certificate-storage.service';
import type { CertificateFilesChangedEvent } from '../interfaces';
import { CERTIFICATE_FILES_CHANGED_EVENT } from '../certificate.tokens';

/**
 * Service that watches the certificate directory for changes made outside the
 * gateway, such as an operator replacing or deleting a pair.
 */
@Injectable()
export class CertificateWatcherService {
  private readonly logger = new Logger(CertificateWatcherService.name);
  private watcher?: chokidar.FSWatcher;

  /**
   * Constructor
   */
  constructor(
    private readonly storageService: CertificateStorageService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Starts watching the certificate directory.
   */
  startWatching(): void {
    if (this.watcher) {
      return;
    }

    this.watcher = chokidar.watch(this.storageService.getStoragePath(), {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold: 2000,
        pollInterval: 100,
      },
    });

    this.watcher
      .on('add', (filePath: string) => this.handleFileEvent('add', filePath))
      .on('change', (filePath: string) => this.handleFileEvent('change', filePath))
      .on('unlink', (filePath: string) => this.handleFileEvent('unlink', filePath))
      .on('error', (error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`Certificate watcher error: ${err.message}`, err.stack);
      });

    this.logger.log('Certificate watcher started');
  }

  /**
   * Stops watching for file changes.
   */
  async stopWatching(): Promise<void> {
    if (!this.watcher) {
      return;
    }

    await this.watcher.close();
    this.watcher = undefined;
    this.logger.log('Certificate watcher stopped');
  }

  private handleFileEvent(change: CertificateFilesChangedEvent['change'], filePath: string): void {
    const fqdn = this.storageService.fqdnForFile(filePath);
    if (!fqdn) {
      return;
    }

    this.logger.log('Certificate file changed on disk', { fqdn, filePath, change });
    const event: CertificateFilesChangedEvent = { fqdn, path: filePath, change };
    this.eventEmitter.emit(CERTIFICATE_FILES_CHANGED_EVENT, event);
  }
}
