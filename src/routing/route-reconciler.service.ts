import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import pLimit from 'p-limit';
import { RouteTable } from './route-table';
import { RouteTableService } from './route-table.service';
import type { CertificateEnsurer, DroppedBackend, ReconcileResult, Route, RouteTableDiff } from './interfaces';
import { CERTIFICATE_ENSURER } from './routing.tokens';
import type { BackendDescriptor, DiscoveryConfig, DiscoverySource } from '../discovery/interfaces';
import { DISCOVERY_CONFIG, DISCOVERY_SOURCE } from '../discovery/discovery.tokens';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { getErrorMessage } from '../shared/error.utils';

interface ResolvedBackend {
  backend: BackendDescriptor;
  address: string;
}

/**
 * Orders backends that claim the same hostname: lowest name wins, then lowest id.
 */
export function compareBackends(a: BackendDescriptor, b: BackendDescriptor): number {
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  if (a.id !== b.id) {
    return a.id < b.id ? -1 : 1;
  }
  return 0;
}

/**
 * Periodically rebuilds the route table from the discovery source.
 *
 * Ticks never overlap: a tick that fires while a cycle is running is skipped.
 * A cycle whose discovery step fails leaves the published table as it was.
 */
@Injectable()
export class RouteReconcilerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(RouteReconcilerService.name);
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<ReconcileResult>;
  private stopped = false;

  /* v8 ignore next 7 - false positive on constructor parameter properties */
  constructor(
    @Inject(DISCOVERY_SOURCE) private readonly source: DiscoverySource,
    @Inject(DISCOVERY_CONFIG) private readonly config: DiscoveryConfig,
    @Inject(CERTIFICATE_ENSURER) private readonly certificates: CertificateEnsurer,
    private readonly routeTable: RouteTableService,
    private readonly metricsService: MetricsService,
  ) {}

  onApplicationBootstrap(): void {
    this.logger.log(`Starting route reconciliation every ${this.config.interval}ms`);
    void this.tick();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.config.interval);
  }

  async onModuleDestroy(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }

    if (this.inFlight) {
      this.logger.log('Waiting for the running reconciliation cycle to finish');
      await this.inFlight.catch(() => undefined);
    }
  }

  isRunning(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * Runs one cycle unless one is already running or shutdown has begun.
   * @returns The cycle result, or undefined when the tick was skipped or failed.
   */
  async tick(): Promise<ReconcileResult | undefined> {
    if (this.stopped) {
      return undefined;
    }

    if (this.inFlight) {
      this.metricsService.increment(METRIC_PATHS.ROUTES_RECONCILE_SKIPPED);
      this.logger.debug('Previous reconciliation still running, skipping tick');
      return undefined;
    }

    const cycle = this.reconcile();
    this.inFlight = cycle;
    try {
      return await cycle;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Reconciliation cycle failed: ${err.message}`, err.stack);
      return undefined;
    } finally {
      this.inFlight = undefined;
    }
  }

  /**
   * One discovery → resolve → diff → publish cycle.
   */
  async reconcile(): Promise<ReconcileResult> {
    const previous = this.routeTable.snapshot();
    this.metricsService.increment(METRIC_PATHS.ROUTES_RECONCILE_TOTAL);

    let backends: BackendDescriptor[];
    try {
      backends = await this.source.list();
    } catch (error) {
      this.metricsService.increment(METRIC_PATHS.ROUTES_RECONCILE_FAILURES);
      this.logger.warn(`Discovery failed, keeping ${previous.size} published routes: ${getErrorMessage(error)}`);
      return { status: 'discovery-failed', table: previous, added: [], changed: [], removed: [], dropped: [] };
    }

    const dropped: DroppedBackend[] = [];
    const resolved = await this.resolveAll(backends, dropped);
    const candidate = this.buildTable(resolved, dropped);
    const diff = candidate.diff(previous);
    this.routeTable.markReconciled();

    if (diff.added.length === 0 && diff.changed.length === 0 && diff.removed.length === 0) {
      this.triggerCertificates(diff, previous);
      return { status: 'unchanged', table: previous, ...diff, dropped };
    }

    this.routeTable.publish(candidate);
    this.logger.log(
      `Route table updated: ${candidate.size} routes (+${diff.added.length} ~${diff.changed.length} -${diff.removed.length})`,
      diff,
    );
    this.triggerCertificates(diff, candidate);

    return { status: 'published', table: candidate, ...diff, dropped };
  }

  /**
   * Resolves every backend with bounded concurrency. A failed backend is
   * recorded in `dropped` and does not affect the others.
   */
  private async resolveAll(backends: BackendDescriptor[], dropped: DroppedBackend[]): Promise<ResolvedBackend[]> {
    const limit = pLimit(this.config.concurrency);

    const results = await Promise.all(
      backends.map((backend) =>
        limit(async (): Promise<ResolvedBackend | undefined> => {
          try {
            const address = await this.source.resolveAddress(backend.id);
            return { backend, address };
          } catch (error) {
            const reason = getErrorMessage(error);
            this.metricsService.increment(METRIC_PATHS.ROUTES_RESOLVE_FAILURES);
            this.logger.warn(`Dropping backend ${backend.name} (${backend.fqdn}): ${reason}`);
            dropped.push({ backend, reason });
            return undefined;
          }
        }),
      ),
    );

    return results.filter((result): result is ResolvedBackend => result !== undefined);
  }

  private buildTable(resolved: ResolvedBackend[], dropped: DroppedBackend[]): RouteTable {
    const winners = new Map<string, ResolvedBackend>();
    const ordered = [...resolved].sort((a, b) => compareBackends(a.backend, b.backend));

    for (const entry of ordered) {
      const winner = winners.get(entry.backend.fqdn);
      if (winner) {
        const reason = `hostname ${entry.backend.fqdn} already claimed by ${winner.backend.name}`;
        this.logger.warn(`Ignoring backend ${entry.backend.name}: ${reason}`);
        dropped.push({ backend: entry.backend, reason });
        continue;
      }
      winners.set(entry.backend.fqdn, entry);
    }

    const routes: Route[] = [...winners.values()].map(({ backend, address }) => ({
      fqdn: backend.fqdn,
      targetAddress: address,
      targetPort: backend.port,
    }));

    return RouteTable.fromRoutes(routes);
  }

  /**
   * Starts certificate work without waiting for it. New and changed hostnames
   * always get an `ensure`; unchanged ones only when the manager reports them due.
   */
  private triggerCertificates(diff: RouteTableDiff, table: RouteTable): void {
    const targets = new Set<string>([...diff.added, ...diff.changed]);
    for (const fqdn of table.fqdns()) {
      if (!targets.has(fqdn) && this.certificates.isDue(fqdn)) {
        targets.add(fqdn);
      }
    }

    for (const fqdn of targets) {
      this.certificates.ensure(fqdn).catch((error: unknown) => {
        this.logger.error(`Certificate ensure for ${fqdn} failed: ${getErrorMessage(error)}`);
      });
    }

    for (const fqdn of diff.removed) {
      this.certificates.release(fqdn);
    }
  }
}
