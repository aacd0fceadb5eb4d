import type { DiscoveryConfig, SshConfig } from '../discovery/interfaces';
import type { CertificateConfig } from '../certificate/interfaces';
import type { DnsConfig } from '../certificate/dns/interfaces';
import type { AdminConfig, GatewayConfig } from '../gateway/interfaces';

/**
 * Configuration type definition for type-safe access
 */
export interface PodgateConfiguration {
  environment: string;
  gateway: GatewayConfig;
  admin: AdminConfig;
  ssh: SshConfig;
  discovery: DiscoveryConfig;
  certificate: CertificateConfig;
  dns: DnsConfig;
}
