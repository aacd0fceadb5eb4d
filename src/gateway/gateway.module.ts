import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RoutingModule } from '../routing/routing.module';
import { TlsModule } from '../tls/tls.module';
import { GatewayServerService } from './gateway-server.service';
import { ProxyService } from './proxy.service';
import { ADMIN_CONFIG, GATEWAY_CONFIG } from './gateway.tokens';
import type { AdminConfig, GatewayConfig } from './interfaces';

const gatewayConfigProvider = {
  provide: GATEWAY_CONFIG,
  useFactory: (configService: ConfigService): GatewayConfig =>
    configService.getOrThrow<GatewayConfig>('podgate.gateway'),
  inject: [ConfigService],
};

const adminConfigProvider = {
  provide: ADMIN_CONFIG,
  useFactory: (configService: ConfigService): AdminConfig => configService.getOrThrow<AdminConfig>('podgate.admin'),
  inject: [ConfigService],
};

/**
 * The HTTPS listener that terminates TLS and proxies to backends, plus the
 * admin HTTP listener for the Nest app.
 */
@Module({
  imports: [RoutingModule, TlsModule],
  providers: [gatewayConfigProvider, adminConfigProvider, ProxyService, GatewayServerService],
  exports: [GatewayServerService],
})
export class GatewayModule {}
