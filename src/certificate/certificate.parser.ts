import * as acme from 'acme-client';
import type { CertificateInfo } from 'acme-client';
import type { CertificateRecord } from './interfaces';
import { CertificateValidationError } from './certificate.errors';
import { getErrorMessage } from '../shared/error.utils';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Whether a certificate name (possibly a wildcard) covers a hostname.
 */
export function coversHostname(certificateName: string, hostname: string): boolean {
  const name = certificateName.toLowerCase();
  const host = hostname.toLowerCase();

  if (name === host) {
    return true;
  }

  if (name.startsWith('*.')) {
    const suffix = name.slice(1);
    const label = host.slice(0, host.length - suffix.length);
    return host.endsWith(suffix) && label.length > 0 && !label.includes('.');
  }

  return false;
}

/**
 * Parses certificate material for a hostname and checks that it covers it.
 *
 * Does not check that the key matches the certificate; building the TLS
 * context does that.
 *
 * @throws {CertificateValidationError}
 */
export async function parseCertificateMaterial(
  fqdn: string,
  certificateChain: Buffer,
  privateKey: Buffer,
): Promise<CertificateRecord> {
  if (!privateKey.toString('utf8').includes('PRIVATE KEY-----')) {
    throw new CertificateValidationError(`Private key for ${fqdn} is not a PEM private key`);
  }

  let info: CertificateInfo;
  try {
    info = await acme.forge.readCertificateInfo(certificateChain);
  } catch (error) {
    throw new CertificateValidationError(`Certificate for ${fqdn} could not be parsed: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }

  const names = [info.domains.commonName, ...(info.domains.altNames ?? [])].filter(
    (name): name is string => typeof name === 'string' && name.length > 0,
  );
  if (!names.some((name) => coversHostname(name, fqdn))) {
    throw new CertificateValidationError(`Certificate does not cover ${fqdn} (names: ${names.join(', ') || 'none'})`);
  }

  if (info.notAfter.getTime() <= info.notBefore.getTime()) {
    throw new CertificateValidationError(`Certificate for ${fqdn} has an empty validity period`);
  }

  return {
    fqdn,
    certificateChain,
    privateKey,
    notBefore: info.notBefore,
    notAfter: info.notAfter,
  };
}

/**
 * Whether a record is due for renewal: `now > notAfter - renewBefore`.
 */
export function isRenewalDue(record: CertificateRecord, renewBeforeDays: number, now: Date = new Date()): boolean {
  return now.getTime() > record.notAfter.getTime() - renewBeforeDays * DAY_MS;
}

export function daysUntil(date: Date, now: Date = new Date()): number {
  return Math.floor((date.getTime() - now.getTime()) / DAY_MS);
}
