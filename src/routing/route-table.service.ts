import { Injectable, Logger } from '@nestjs/common';
import { RouteTable } from './route-table';
import type { Route, RouteResolver } from './interfaces';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';

/**
 * Normalizes a Host header value or SNI name for route lookup.
 * Drops the port (including bracketed IPv6 forms) and one trailing dot.
 */
export function normalizeHost(host: string): string {
  let hostname = host.trim().toLowerCase();

  if (hostname.startsWith('[')) {
    const end = hostname.indexOf(']');
    hostname = end === -1 ? hostname : hostname.slice(0, end + 1);
  } else {
    const colon = hostname.indexOf(':');
    if (colon !== -1) {
      hostname = hostname.slice(0, colon);
    }
  }

  return hostname.endsWith('.') ? hostname.slice(0, -1) : hostname;
}

/**
 * Holds the currently published route table.
 *
 * There is one writer, the reconciler. Readers call `snapshot()` or `resolve()`
 * and get the table that was current at that moment.
 */
@Injectable()
export class RouteTableService implements RouteResolver {
  private readonly logger = new Logger(RouteTableService.name);
  private current: RouteTable = RouteTable.empty();
  private publishedAt?: Date;
  private reconciledAt?: Date;

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly metricsService: MetricsService) {}

  snapshot(): RouteTable {
    return this.current;
  }

  resolve(host: string): Route | undefined {
    return this.current.get(normalizeHost(host));
  }

  publish(table: RouteTable): void {
    this.current = table;
    this.publishedAt = new Date();
    this.metricsService.set(METRIC_PATHS.ROUTES_ACTIVE, table.size);
    this.logger.debug(`Published route table with ${table.size} routes`);
  }

  /**
   * Records a cycle whose discovery step succeeded, whether or not it published.
   */
  markReconciled(at: Date = new Date()): void {
    this.reconciledAt = at;
  }

  getLastPublishedAt(): Date | undefined {
    return this.publishedAt;
  }

  getLastReconciledAt(): Date | undefined {
    return this.reconciledAt;
  }
}
