import type { SecureContext } from 'tls';

/**
 * Configuration for the certificate management module.
 */
export interface CertificateConfig {
  /** Email address for ACME account registration and notifications. */
  email: string;
  /** Directory holding per-hostname certificates and the ACME account key. */
  storagePath: string;
  /** Renew once the certificate expires within this many days. */
  renewBeforeDays: number;
  /** Minimum milliseconds between reconciler-driven attempts for a failing hostname. */
  retryBackoff: number;
  /** Milliseconds to wait for in-flight issuance at shutdown before abandoning it. */
  shutdownGrace: number;
  /** The ACME directory URL (Let's Encrypt production or staging). */
  acmeDirectoryUrl: string;
  /** Whether the staging directory was selected. */
  staging: boolean;
}

/**
 * A parsed certificate for one hostname, loaded from disk or newly issued.
 */
export interface CertificateRecord {
  fqdn: string;
  /** Leaf certificate followed by intermediates (PEM). */
  certificateChain: Buffer;
  /** Private key for the leaf certificate (PEM). */
  privateKey: Buffer;
  notBefore: Date;
  notAfter: Date;
}

/**
 * Raw material returned by the ACME issuer, not yet validated.
 */
export interface IssuedCertificate {
  certificateChain: Buffer;
  privateKey: Buffer;
}

/**
 * Obtains a certificate for one domain.
 * Fails with an `AcmeError` carrying the failure kind.
 */
export interface AcmeIssuer {
  /** Loads the account credential and registers it. */
  initialize(): Promise<void>;
  obtain(domain: string, signal?: AbortSignal): Promise<IssuedCertificate>;
}

/**
 * A cached record together with the TLS context built from it.
 */
export interface CertificateEntry {
  record: CertificateRecord;
  secureContext: SecureContext;
}

/**
 * Status of one hostname's certificate, as reported by the admin API.
 */
export interface CertificateStatus {
  fqdn: string;
  /** Whether a certificate is cached or stored on disk. */
  exists: boolean;
  /** Whether the certificate is within its validity period. */
  valid: boolean;
  /** Whether the hostname is currently routed. */
  tracked: boolean;
  /** Whether issuance is running right now. */
  obtaining: boolean;
  renewalDue: boolean;
  issuedAt?: Date;
  expiresAt?: Date;
  daysUntilExpiry?: number;
  lastFailure?: {
    at: Date;
    message: string;
  };
}

/**
 * Emitted when a certificate or key file changes on disk outside of issuance.
 */
export interface CertificateFilesChangedEvent {
  fqdn: string;
  path: string;
  change: 'add' | 'change' | 'unlink';
}
