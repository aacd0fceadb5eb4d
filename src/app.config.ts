import { registerAs } from '@nestjs/config';
import * as process from 'process';
import { join } from 'path';
import {
  DEFAULT_DATA_PATH,
  DEFAULT_GATEWAY_HOST,
  DEFAULT_GATEWAY_PORT,
  DEFAULT_GATEWAY_CLOSE_TIMEOUT,
  DEFAULT_GATEWAY_REQUEST_TIMEOUT,
  DEFAULT_GATEWAY_KEEP_ALIVE_TIMEOUT,
  DEFAULT_ADMIN_HOST,
  DEFAULT_ADMIN_PORT,
  DEFAULT_SSH_PORT,
  DEFAULT_SSH_USER,
  DEFAULT_SSH_KEY_PATH,
  DEFAULT_SSH_TIMEOUT,
  DEFAULT_DISCOVERY_INTERVAL,
  DEFAULT_DISCOVERY_CONCURRENCY,
  DEFAULT_CERT_RENEW_BEFORE_DAYS,
  MAX_CERT_RENEW_BEFORE_DAYS,
  DEFAULT_CERT_RETRY_BACKOFF,
  DEFAULT_CERT_SHUTDOWN_GRACE,
  DEFAULT_ACME_DIRECTORY_URL,
  STAGING_ACME_DIRECTORY_URL,
  DEFAULT_GANDI_API_URL,
  DEFAULT_DNS_TTL,
  DEFAULT_DNS_PROPAGATION_TIMEOUT,
  DEFAULT_DNS_POLL_INTERVAL,
  DEFAULT_DNS_REQUEST_TIMEOUT,
} from './config/config.constants';
import {
  parseOptionalBoolean,
  parseNumberWithDefault,
  parseStringWithDefault,
  parseRequiredString,
  parsePort,
} from './config/config.parsers';
import { isValidDomain, isValidEmail, normalizeDnsName } from './config/config.validators';
import type { PodgateConfiguration } from './config/config.types';
import type { DiscoveryConfig, SshConfig } from './discovery/interfaces';
import type { CertificateConfig } from './certificate/interfaces';
import type { DnsConfig } from './certificate/dns/interfaces';
import type { AdminConfig, GatewayConfig } from './gateway/interfaces';

/**
 * Build Gateway Configuration
 *
 * The public TLS listener that terminates HTTPS and proxies to backends.
 *
 * Optional environment variables:
 * - PODGATE_GATEWAY_HOST: Bind address (default: 0.0.0.0)
 * - PODGATE_GATEWAY_PORT: Listen port (default: 443)
 * - PODGATE_GATEWAY_CLOSE_TIMEOUT: Drain period at shutdown in ms (default: 10000)
 */
function buildGatewayConfig(): GatewayConfig {
  return {
    host: parseStringWithDefault(process.env.PODGATE_GATEWAY_HOST, DEFAULT_GATEWAY_HOST),
    port: parsePort('PODGATE_GATEWAY_PORT', process.env.PODGATE_GATEWAY_PORT, DEFAULT_GATEWAY_PORT),
    closeTimeout: parseNumberWithDefault(process.env.PODGATE_GATEWAY_CLOSE_TIMEOUT, DEFAULT_GATEWAY_CLOSE_TIMEOUT),
    requestTimeout: DEFAULT_GATEWAY_REQUEST_TIMEOUT,
    keepAliveTimeout: DEFAULT_GATEWAY_KEEP_ALIVE_TIMEOUT,
  };
}

/**
 * Build Admin Configuration
 *
 * Health checks and the read-only admin API. Binds to loopback unless told otherwise.
 *
 * Optional environment variables:
 * - PODGATE_ADMIN_HOST: Bind address (default: 127.0.0.1)
 * - PODGATE_ADMIN_PORT: Listen port (default: 8080)
 * - PODGATE_ADMIN_API_KEY: X-API-Key value for /api/* (unset rejects every /api request)
 */
function buildAdminConfig(): AdminConfig {
  const apiKey = process.env.PODGATE_ADMIN_API_KEY?.trim();

  return {
    host: parseStringWithDefault(process.env.PODGATE_ADMIN_HOST, DEFAULT_ADMIN_HOST),
    port: parsePort('PODGATE_ADMIN_PORT', process.env.PODGATE_ADMIN_PORT, DEFAULT_ADMIN_PORT),
    apiKey: apiKey ? apiKey : undefined,
  };
}

/**
 * Build SSH Configuration
 *
 * Required environment variables:
 * - PODGATE_SSH_HOST: Podman host to connect to
 *
 * Optional environment variables:
 * - PODGATE_SSH_PORT (default: 22)
 * - PODGATE_SSH_USER (default: core)
 * - PODGATE_SSH_KEY_PATH (default: /ssh/id_rsa)
 * - PODGATE_SSH_TIMEOUT: Connect and command timeout in ms (default: 10000)
 */
function buildSshConfig(): SshConfig {
  return {
    host: parseRequiredString('PODGATE_SSH_HOST', process.env.PODGATE_SSH_HOST),
    port: parsePort('PODGATE_SSH_PORT', process.env.PODGATE_SSH_PORT, DEFAULT_SSH_PORT),
    username: parseStringWithDefault(process.env.PODGATE_SSH_USER, DEFAULT_SSH_USER),
    privateKeyPath: parseStringWithDefault(process.env.PODGATE_SSH_KEY_PATH, DEFAULT_SSH_KEY_PATH),
    timeout: parseNumberWithDefault(process.env.PODGATE_SSH_TIMEOUT, DEFAULT_SSH_TIMEOUT),
  };
}

/**
 * Build Discovery Configuration
 *
 * Optional environment variables:
 * - PODGATE_DISCOVERY_INTERVAL: Reconciliation tick in ms (default: 10000)
 * - PODGATE_DISCOVERY_CONCURRENCY: Max concurrent address lookups (default: 4)
 */
function buildDiscoveryConfig(): DiscoveryConfig {
  const interval = parseNumberWithDefault(process.env.PODGATE_DISCOVERY_INTERVAL, DEFAULT_DISCOVERY_INTERVAL);
  const concurrency = parseNumberWithDefault(
    process.env.PODGATE_DISCOVERY_CONCURRENCY,
    DEFAULT_DISCOVERY_CONCURRENCY,
  );

  if (interval < 1000) {
    throw new Error(`PODGATE_DISCOVERY_INTERVAL must be at least 1000ms (got ${interval})`);
  }
  if (concurrency < 1) {
    throw new Error('PODGATE_DISCOVERY_CONCURRENCY must be at least 1');
  }

  return { interval, concurrency };
}

/**
 * Build Certificate Configuration
 *
 * Certificate storage path is derived from PODGATE_DATA_PATH/certificates.
 *
 * Required environment variables:
 * - PODGATE_CERT_EMAIL: ACME account contact address
 *
 * Optional environment variables:
 * - PODGATE_DATA_PATH: Data directory root (default: '/app/data')
 * - PODGATE_CERT_RENEW_BEFORE_DAYS: Renew this many days before expiry (default: 30, max: 89)
 * - PODGATE_CERT_RETRY_BACKOFF: Minimum ms between attempts for a failing hostname (default: 900000)
 * - PODGATE_CERT_SHUTDOWN_GRACE: Wait for in-flight issuance at shutdown in ms (default: 30000)
 * - PODGATE_ACME_STAGING: Use Let's Encrypt staging (default: false)
 * - PODGATE_ACME_DIRECTORY: Explicit directory URL, overrides PODGATE_ACME_STAGING
 *
 * @throws {Error} If the email is missing or the renewal window is out of range
 */
function buildCertificateConfig(): CertificateConfig {
  const email = parseRequiredString('PODGATE_CERT_EMAIL', process.env.PODGATE_CERT_EMAIL);
  if (!isValidEmail(email)) {
    throw new Error(`PODGATE_CERT_EMAIL is not a valid email address: ${email}`);
  }

  const renewBeforeDays = parseNumberWithDefault(
    process.env.PODGATE_CERT_RENEW_BEFORE_DAYS,
    DEFAULT_CERT_RENEW_BEFORE_DAYS,
  );
  // A window as long as the certificate lifetime would renew on every tick
  if (renewBeforeDays < 1 || renewBeforeDays > MAX_CERT_RENEW_BEFORE_DAYS) {
    throw new Error(
      `PODGATE_CERT_RENEW_BEFORE_DAYS must be between 1 and ${MAX_CERT_RENEW_BEFORE_DAYS} (got ${renewBeforeDays})`,
    );
  }

  const staging = parseOptionalBoolean(process.env.PODGATE_ACME_STAGING, false);
  const dataPath = parseStringWithDefault(process.env.PODGATE_DATA_PATH, DEFAULT_DATA_PATH);

  return {
    email,
    storagePath: join(dataPath, 'certificates'),
    renewBeforeDays,
    retryBackoff: parseNumberWithDefault(process.env.PODGATE_CERT_RETRY_BACKOFF, DEFAULT_CERT_RETRY_BACKOFF),
    shutdownGrace: parseNumberWithDefault(process.env.PODGATE_CERT_SHUTDOWN_GRACE, DEFAULT_CERT_SHUTDOWN_GRACE),
    acmeDirectoryUrl: parseStringWithDefault(
      process.env.PODGATE_ACME_DIRECTORY,
      staging ? STAGING_ACME_DIRECTORY_URL : DEFAULT_ACME_DIRECTORY_URL,
    ),
    staging,
  };
}

/**
 * Build DNS Configuration
 *
 * DNS-01 challenges are published in a Gandi LiveDNS zone.
 *
 * Required environment variables:
 * - PODGATE_GANDI_API_KEY: Personal access token
 * - PODGATE_DNS_ZONE: Base zone, every routed hostname must sit under it
 *
 * Optional environment variables:
 * - PODGATE_GANDI_API_URL (default: https://api.gandi.net)
 * - PODGATE_DNS_TTL: TXT record TTL in seconds (default: 300)
 * - PODGATE_DNS_PROPAGATION_TIMEOUT: ms (default: 600000)
 * - PODGATE_DNS_POLL_INTERVAL: ms (default: 30000)
 * - PODGATE_DNS_REQUEST_TIMEOUT: ms (default: 30000)
 */
function buildDnsConfig(): DnsConfig {
  const apiKey = parseRequiredString('PODGATE_GANDI_API_KEY', process.env.PODGATE_GANDI_API_KEY);
  const zone = normalizeDnsName(parseRequiredString('PODGATE_DNS_ZONE', process.env.PODGATE_DNS_ZONE));

  if (!isValidDomain(zone)) {
    throw new Error(`Invalid domain format in PODGATE_DNS_ZONE: ${zone}`);
  }

  const propagationTimeout = parseNumberWithDefault(
    process.env.PODGATE_DNS_PROPAGATION_TIMEOUT,
    DEFAULT_DNS_PROPAGATION_TIMEOUT,
  );
  const pollInterval = parseNumberWithDefault(process.env.PODGATE_DNS_POLL_INTERVAL, DEFAULT_DNS_POLL_INTERVAL);

  if (pollInterval < 1 || pollInterval > propagationTimeout) {
    throw new Error('PODGATE_DNS_POLL_INTERVAL must be positive and no longer than PODGATE_DNS_PROPAGATION_TIMEOUT');
  }

  return {
    apiUrl: parseStringWithDefault(process.env.PODGATE_GANDI_API_URL, DEFAULT_GANDI_API_URL).replace(/\/+$/, ''),
    apiKey,
    zone,
    ttl: parseNumberWithDefault(process.env.PODGATE_DNS_TTL, DEFAULT_DNS_TTL),
    propagationTimeout,
    pollInterval,
    requestTimeout: parseNumberWithDefault(process.env.PODGATE_DNS_REQUEST_TIMEOUT, DEFAULT_DNS_REQUEST_TIMEOUT),
  };
}

export default registerAs(
  'podgate',
  (): PodgateConfiguration => ({
    environment: parseStringWithDefault(process.env.NODE_ENV, 'production'),
    gateway: buildGatewayConfig(),
    admin: buildAdminConfig(),
    ssh: buildSshConfig(),
    discovery: buildDiscoveryConfig(),
    certificate: buildCertificateConfig(),
    dns: buildDnsConfig(),
  }),
);
