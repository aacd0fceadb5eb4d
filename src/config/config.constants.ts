export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];
export const BOOLEAN_FALSE_VALUES = ['false', '0', 'no', 'off'];

// Configuration defaults
export const DEFAULT_DATA_PATH = '/app/data';

// Gateway (TLS listener)
export const DEFAULT_GATEWAY_HOST = '0.0.0.0';
export const DEFAULT_GATEWAY_PORT = 443;
export const DEFAULT_GATEWAY_CLOSE_TIMEOUT = 10_000;
export const DEFAULT_GATEWAY_REQUEST_TIMEOUT = 15_000;
export const DEFAULT_GATEWAY_KEEP_ALIVE_TIMEOUT = 60_000;

// Admin API
export const DEFAULT_ADMIN_HOST = '127.0.0.1';
export const DEFAULT_ADMIN_PORT = 8080;

// SSH transport
export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_SSH_USER = 'core';
export const DEFAULT_SSH_KEY_PATH = '/ssh/id_rsa';
export const DEFAULT_SSH_TIMEOUT = 10_000;

// Discovery
export const DEFAULT_DISCOVERY_INTERVAL = 10_000;
export const DEFAULT_DISCOVERY_CONCURRENCY = 4;

// Certificates
export const DEFAULT_CERT_RENEW_BEFORE_DAYS = 30;
export const MAX_CERT_RENEW_BEFORE_DAYS = 89; // Let's Encrypt issues 90-day certificates
export const DEFAULT_CERT_RETRY_BACKOFF = 15 * 60 * 1000;
export const DEFAULT_CERT_SHUTDOWN_GRACE = 30_000;
export const DEFAULT_ACME_DIRECTORY_URL = 'https://acme-v02.api.letsencrypt.org/directory';
export const STAGING_ACME_DIRECTORY_URL = 'https://acme-staging-v02.api.letsencrypt.org/directory';

// DNS-01 (Gandi LiveDNS)
export const DEFAULT_GANDI_API_URL = 'https://api.gandi.net';
export const DEFAULT_DNS_TTL = 300;
export const DEFAULT_DNS_PROPAGATION_TIMEOUT = 10 * 60 * 1000;
export const DEFAULT_DNS_POLL_INTERVAL = 30_000;
export const DEFAULT_DNS_REQUEST_TIMEOUT = 30_000;
