import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import appConfig from './app.config';
import { MetricsModule } from './metrics/metrics.module';
import { DiscoveryModule } from './discovery/discovery.module';
import { CertificateModule } from './certificate/certificate.module';
import { RoutingModule } from './routing/routing.module';
import { TlsModule } from './tls/tls.module';
import { GatewayModule } from './gateway/gateway.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    EventEmitterModule.forRoot(),
    MetricsModule,
    DiscoveryModule,
    CertificateModule,
    RoutingModule,
    TlsModule,
    GatewayModule,
    HealthModule,
  ],
})
export class AppModule {}
