import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SshCommandService } from './ssh/ssh-command.service';
import { PodmanDiscoveryService } from './podman/podman-discovery.service';
import type { DiscoveryConfig, SshConfig } from './interfaces';
import { DISCOVERY_CONFIG, DISCOVERY_SOURCE, SSH_CONFIG } from './discovery.tokens';

const sshConfigProvider = {
  provide: SSH_CONFIG,
  useFactory: (configService: ConfigService): SshConfig => configService.getOrThrow<SshConfig>('podgate.ssh'),
  inject: [ConfigService],
};

const discoveryConfigProvider = {
  provide: DISCOVERY_CONFIG,
  useFactory: (configService: ConfigService): DiscoveryConfig =>
    configService.getOrThrow<DiscoveryConfig>('podgate.discovery'),
  inject: [ConfigService],
};

/**
 * Backend discovery over SSH. Consumers depend on the DISCOVERY_SOURCE token,
 * not on the podman implementation.
 */
@Module({
  providers: [
    sshConfigProvider,
    discoveryConfigProvider,
    SshCommandService,
    PodmanDiscoveryService,
    { provide: DISCOVERY_SOURCE, useExisting: PodmanDiscoveryService },
  ],
  exports: [DISCOVERY_SOURCE, DISCOVERY_CONFIG],
})
export class DiscoveryModule {}
