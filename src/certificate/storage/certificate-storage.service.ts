import { Injectable, Logger, Inject } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { createPrivateKey } from 'crypto';
import * as acme from 'acme-client';
import type { CertificateConfig, CertificateRecord } from '../interfaces';
import { CERTIFICATE_CONFIG } from '../certificate.tokens';
import { AccountCredentialError } from '../certificate.errors';
import { parseCertificateMaterial } from '../certificate.parser';
import { getErrorMessage } from '../../shared/error.utils';
import { isSafeFqdn } from '../../config/config.validators';

export const ACCOUNT_KEY_FILE = 'acme_account.key';
const CERTIFICATE_EXTENSION = '.crt';
const KEY_EXTENSION = '.key';

/**
 * Service responsible for storing and retrieving the ACME account key and the
 * per-hostname certificate and key files.
 *
 * Layout: `<fqdn>.crt` (chain, 0644), `<fqdn>.key` (0600), `acme_account.key` (0600).
 */
@Injectable()
export class CertificateStorageService {
  private readonly logger = new Logger(CertificateStorageService.name);

  /**
   * Constructor
   */
  constructor(@Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig) {
    this.ensureStorageDirectory();
  }

  getStoragePath(): string {
    return this.config.storagePath;
  }

  /**
   * Loads the ACME account private key from storage, or generates and saves a new one if not found.
   * @throws {AccountCredentialError} If the stored key cannot be read or parsed.
   */
  async loadOrGenerateAccountKey(): Promise<Buffer> {
    const accountKeyPath = path.join(this.config.storagePath, ACCOUNT_KEY_FILE);

    if (fs.existsSync(accountKeyPath)) {
      this.logger.log('Loading existing ACME account key');
      let accountKey: Buffer;
      try {
        accountKey = fs.readFileSync(accountKeyPath);
        createPrivateKey(accountKey);
      } catch (error) {
        throw new AccountCredentialError(
          `ACME account key at ${accountKeyPath} is unusable: ${getErrorMessage(error)}. ` +
            'Remove it to register a new account.',
          { cause: error },
        );
      }
      return accountKey;
    }

    this.logger.log('Generating new ACME account key');
    const accountKeyBuffer = await acme.forge.createPrivateKey();
    this.atomicWriteFile(accountKeyPath, accountKeyBuffer, { mode: 0o600 });
    return accountKeyBuffer;
  }

  /**
   * Saves a certificate chain and private key for a hostname.
   * Backs up any existing pair before writing the new one.
   */
  saveCertificate(record: CertificateRecord): void {
    const { certPath, keyPath } = this.pathsFor(record.fqdn);

    this.backupExisting(certPath, keyPath);

    // Key first: a reader that sees the new chain must also find the new key
    this.atomicWriteFile(keyPath, record.privateKey, { mode: 0o600 });
    this.atomicWriteFile(certPath, record.certificateChain, { mode: 0o644 });

    this.logger.log('Certificate saved successfully', {
      fqdn: record.fqdn,
      expiresAt: record.notAfter.toISOString(),
    });
  }

  /**
   * Loads and parses the stored pair for a hostname.
   * @returns The record, or null when either file is missing.
   * @throws {CertificateValidationError} If the stored material is invalid.
   */
  async loadCertificate(fqdn: string): Promise<CertificateRecord | null> {
    const { certPath, keyPath } = this.pathsFor(fqdn);

    if (!fs.existsSync(certPath) || !fs.existsSync(keyPath)) {
      return null;
    }

    const certificateChain = fs.readFileSync(certPath);
    const privateKey = fs.readFileSync(keyPath);

    return parseCertificateMaterial(fqdn, certificateChain, privateKey);
  }

  /**
   * Maps a file in the storage directory back to the hostname it belongs to.
   * @returns The hostname, or undefined for files that are not certificate or key files.
   */
  fqdnForFile(filePath: string): string | undefined {
    const baseName = path.basename(filePath);
    if (baseName === ACCOUNT_KEY_FILE) {
      return undefined;
    }

    const extension = path.extname(baseName);
    if (extension !== CERTIFICATE_EXTENSION && extension !== KEY_EXTENSION) {
      return undefined;
    }

    const fqdn = baseName.slice(0, -extension.length);
    return isSafeFqdn(fqdn) ? fqdn : undefined;
  }

  /**
   * Ensures that the storage directory exists.
   * @private
   */
  private ensureStorageDirectory(): void {
    if (!fs.existsSync(this.config.storagePath)) {
      fs.mkdirSync(this.config.storagePath, { recursive: true, mode: 0o700 });
    }
  }

  private pathsFor(fqdn: string): { certPath: string; keyPath: string } {
    if (!isSafeFqdn(fqdn)) {
      throw new Error(`Refusing to use "${fqdn}" as a certificate file name`);
    }

    return {
      certPath: path.join(this.config.storagePath, `${fqdn}${CERTIFICATE_EXTENSION}`),
      keyPath: path.join(this.config.storagePath, `${fqdn}${KEY_EXTENSION}`),
    };
  }

  /**
   * Creates a backup of the existing certificate and key files.
   * @private
   */
  private backupExisting(certPath: string, keyPath: string): void {
    if (fs.existsSync(certPath)) {
      fs.copyFileSync(certPath, `${certPath}.backup`);
    }

    if (fs.existsSync(keyPath)) {
      fs.copyFileSync(keyPath, `${keyPath}.backup`);
    }
  }

  /**
   * Writes data to a temporary file and atomically renames it into place.
   * @private
   */
  private atomicWriteFile(
    targetPath: string,
    data: string | NodeJS.ArrayBufferView,
    options?: fs.WriteFileOptions & { mode?: number },
  ): void {
    const directory = path.dirname(targetPath);
    const baseName = path.basename(targetPath);
    const tempPath = path.join(
      directory,
      `${baseName}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`,
    );

    try {
      fs.writeFileSync(tempPath, data, options);
      fs.renameSync(tempPath, targetPath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        try {
          fs.unlinkSync(tempPath);
        } catch (cleanupError) {
          this.logger.warn('Failed to clean up temporary certificate file', {
            tempPath,
            error: getErrorMessage(cleanupError),
          });
        }
      }
      throw error;
    }
  }
}
