import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { DiscoveryModule } from '../discovery/discovery.module';
import { CertificateModule } from '../certificate/certificate.module';
import { RouteTableService } from './route-table.service';
import { RouteReconcilerService } from './route-reconciler.service';
import { RoutingController } from './routing.controller';
import { RoutingHealthIndicator } from './routing.health';
import { ROUTE_RESOLVER } from './routing.tokens';

/**
 * Route table ownership and the reconciliation loop that keeps it current.
 */
@Module({
  imports: [DiscoveryModule, CertificateModule, TerminusModule],
  controllers: [RoutingController],
  providers: [
    RouteTableService,
    RouteReconcilerService,
    RoutingHealthIndicator,
    { provide: ROUTE_RESOLVER, useExisting: RouteTableService },
  ],
  exports: [ROUTE_RESOLVER, RouteTableService, RoutingHealthIndicator],
})
export class RoutingModule {}
