import { Inject, Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { RouteTableService } from './route-table.service';
import type { DiscoveryConfig } from '../discovery/interfaces';
import { DISCOVERY_CONFIG } from '../discovery/discovery.tokens';

/** Discovery may miss this many ticks in a row before routes count as stale. */
const STALE_AFTER_TICKS = 5;

/**
 * Reports routes as down until discovery has succeeded once, and again when it
 * has not succeeded for several consecutive ticks.
 */
@Injectable()
export class RoutingHealthIndicator {
  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    private readonly routeTableService: RouteTableService,
    private readonly healthIndicatorService: HealthIndicatorService,
    @Inject(DISCOVERY_CONFIG) private readonly config: DiscoveryConfig,
  ) {}

  isHealthy(key: string, now: Date = new Date()) {
    const indicator = this.healthIndicatorService.check(key);
    const reconciledAt = this.routeTableService.getLastReconciledAt();
    const details = {
      routes: this.routeTableService.snapshot().size,
      reconciledAt: reconciledAt?.toISOString(),
    };

    if (!reconciledAt) {
      return indicator.down({ ...details, reason: 'discovery has not succeeded yet' });
    }

    if (now.getTime() - reconciledAt.getTime() > this.config.interval * STALE_AFTER_TICKS) {
      return indicator.down({ ...details, reason: 'discovery is failing' });
    }

    return indicator.up(details);
  }
}
