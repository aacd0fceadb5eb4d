import type { SecureContext } from 'tls';

/**
 * Supplies the TLS context for a handshake by server name.
 */
export interface CertificateProvider {
  getCertificate(serverName: string | undefined): Promise<SecureContext>;
}
