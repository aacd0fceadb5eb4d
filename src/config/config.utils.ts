import { Logger } from '@nestjs/common';
import type { PodgateConfiguration } from './config.types';

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 * Secrets (API keys, key material) are never printed.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: PodgateConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`Gateway: ${config.gateway.host}:${config.gateway.port}`);
  summaryLogger.log(
    `Admin API: ${config.admin.host}:${config.admin.port} (api key: ${config.admin.apiKey ? 'configured' : 'not configured'})`,
  );
  summaryLogger.log(`SSH: ${config.ssh.username}@${config.ssh.host}:${config.ssh.port} (key: ${config.ssh.privateKeyPath})`);
  summaryLogger.log(
    `Discovery: every ${config.discovery.interval}ms, up to ${config.discovery.concurrency} concurrent lookups`,
  );
  summaryLogger.log(`Certificate Storage: ${config.certificate.storagePath}`);
  summaryLogger.log(`Certificate Renewal: ${config.certificate.renewBeforeDays} days before expiry`);
  summaryLogger.log(`ACME Directory: ${config.certificate.acmeDirectoryUrl}${config.certificate.staging ? ' (STAGING)' : ''}`);
  summaryLogger.log(`DNS Zone: ${config.dns.zone} via ${config.dns.apiUrl} (api key: [REDACTED])`);

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
