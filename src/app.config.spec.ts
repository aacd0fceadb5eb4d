import { describe, expect, it, beforeAll, afterAll, beforeEach } from '@jest/globals';
import appConfig from './app.config';
import {
  DEFAULT_ACME_DIRECTORY_URL,
  DEFAULT_CERT_RETRY_BACKOFF,
  STAGING_ACME_DIRECTORY_URL,
} from './config/config.constants';

describe('app.config', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeAll(() => {
    originalEnv = { ...process.env };
  });

  afterAll(() => {
    process.env = { ...originalEnv };
  });

  beforeEach(() => {
    Object.keys(process.env).forEach((key) => {
      if (key.startsWith('PODGATE_') || key === 'NODE_ENV') {
        delete process.env[key];
      }
    });
  });

  const setMinimalEnv = () => {
    process.env.PODGATE_SSH_HOST = 'podman.internal';
    process.env.PODGATE_CERT_EMAIL = 'ops@example.com';
    process.env.PODGATE_GANDI_API_KEY = 'test-secret';
    process.env.PODGATE_DNS_ZONE = 'example.com';
  };

  describe('defaults', () => {
    it('builds the full configuration from the required variables', () => {
      setMinimalEnv();

      const config = appConfig();

      expect(config.environment).toBe('production');
      expect(config.gateway).toEqual({
        host: '0.0.0.0',
        port: 443,
        closeTimeout: 10000,
        requestTimeout: 15000,
        keepAliveTimeout: 60000,
      });
      expect(config.admin).toEqual({ host: '127.0.0.1', port: 8080, apiKey: undefined });
      expect(config.ssh).toEqual({
        host: 'podman.internal',
        port: 22,
        username: 'core',
        privateKeyPath: '/ssh/id_rsa',
        timeout: 10000,
      });
      expect(config.discovery).toEqual({ interval: 10000, concurrency: 4 });
      expect(config.certificate).toEqual({
        email: 'ops@example.com',
        storagePath: '/app/data/certificates',
        renewBeforeDays: 30,
        retryBackoff: DEFAULT_CERT_RETRY_BACKOFF,
        shutdownGrace: 30000,
        acmeDirectoryUrl: DEFAULT_ACME_DIRECTORY_URL,
        staging: false,
      });
      expect(config.dns).toEqual({
        apiUrl: 'https://api.gandi.net',
        apiKey: 'test-secret',
        zone: 'example.com',
        ttl: 300,
        propagationTimeout: 600000,
        pollInterval: 30000,
        requestTimeout: 30000,
      });
    });
  });

  describe('required variables', () => {
    it.each(['PODGATE_SSH_HOST', 'PODGATE_CERT_EMAIL', 'PODGATE_GANDI_API_KEY', 'PODGATE_DNS_ZONE'])(
      'fails when %s is missing',
      (name) => {
        setMinimalEnv();
        delete process.env[name];

        expect(() => appConfig()).toThrow(`${name} is required`);
      },
    );
  });

  describe('certificate', () => {
    it('rejects an invalid contact address', () => {
      setMinimalEnv();
      process.env.PODGATE_CERT_EMAIL = 'not-an-email';

      expect(() => appConfig()).toThrow('PODGATE_CERT_EMAIL is not a valid email address: not-an-email');
    });

    it.each(['0', '90'])('rejects a renewal window of %s days', (days) => {
      setMinimalEnv();
      process.env.PODGATE_CERT_RENEW_BEFORE_DAYS = days;

      expect(() => appConfig()).toThrow(`PODGATE_CERT_RENEW_BEFORE_DAYS must be between 1 and 89 (got ${days})`);
    });

    it('uses the staging directory when requested', () => {
      setMinimalEnv();
      process.env.PODGATE_ACME_STAGING = 'true';

      const config = appConfig();

      expect(config.certificate.staging).toBe(true);
      expect(config.certificate.acmeDirectoryUrl).toBe(STAGING_ACME_DIRECTORY_URL);
    });

    it('prefers an explicit directory URL over the staging flag', () => {
      setMinimalEnv();
      process.env.PODGATE_ACME_STAGING = 'true';
      process.env.PODGATE_ACME_DIRECTORY = 'https://acme.test/directory';

      expect(appConfig().certificate.acmeDirectoryUrl).toBe('https://acme.test/directory');
    });

    it('derives the storage path from the data path', () => {
      setMinimalEnv();
      process.env.PODGATE_DATA_PATH = '/srv/podgate';

      expect(appConfig().certificate.storagePath).toBe('/srv/podgate/certificates');
    });
  });

  describe('discovery', () => {
    it('rejects an interval below one second', () => {
      setMinimalEnv();
      process.env.PODGATE_DISCOVERY_INTERVAL = '500';

      expect(() => appConfig()).toThrow('PODGATE_DISCOVERY_INTERVAL must be at least 1000ms (got 500)');
    });

    it('rejects a concurrency of zero', () => {
      setMinimalEnv();
      process.env.PODGATE_DISCOVERY_CONCURRENCY = '0';

      expect(() => appConfig()).toThrow('PODGATE_DISCOVERY_CONCURRENCY must be at least 1');
    });
  });

  describe('dns', () => {
    it('normalizes the zone and strips trailing slashes from the API URL', () => {
      setMinimalEnv();
      process.env.PODGATE_DNS_ZONE = 'Example.COM.';
      process.env.PODGATE_GANDI_API_URL = 'http://gandi.test//';

      const config = appConfig();

      expect(config.dns.zone).toBe('example.com');
      expect(config.dns.apiUrl).toBe('http://gandi.test');
    });

    it('rejects a malformed zone', () => {
      setMinimalEnv();
      process.env.PODGATE_DNS_ZONE = 'localhost';

      expect(() => appConfig()).toThrow('Invalid domain format in PODGATE_DNS_ZONE: localhost');
    });

    it('rejects a poll interval longer than the propagation timeout', () => {
      setMinimalEnv();
      process.env.PODGATE_DNS_PROPAGATION_TIMEOUT = '1000';
      process.env.PODGATE_DNS_POLL_INTERVAL = '2000';

      expect(() => appConfig()).toThrow(
        'PODGATE_DNS_POLL_INTERVAL must be positive and no longer than PODGATE_DNS_PROPAGATION_TIMEOUT',
      );
    });
  });

  describe('admin', () => {
    it('treats a blank API key as unset', () => {
      setMinimalEnv();
      process.env.PODGATE_ADMIN_API_KEY = '   ';

      expect(appConfig().admin.apiKey).toBeUndefined();
    });

    it('rejects an out-of-range port', () => {
      setMinimalEnv();
      process.env.PODGATE_ADMIN_PORT = '70000';

      expect(() => appConfig()).toThrow('PODGATE_ADMIN_PORT must be between 1 and 65535 (got 70000)');
    });
  });
});
