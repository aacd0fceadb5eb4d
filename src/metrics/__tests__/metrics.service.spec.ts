import { Test, TestingModule } from '@nestjs/testing';
import { MetricsService } from '../metrics.service';
import { METRIC_PATHS } from '../metrics.constants';

describe('MetricsService', () => {
  let service: MetricsService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [MetricsService],
    }).compile();

    service = module.get<MetricsService>(MetricsService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should initialize with all metrics set to zero', () => {
    const metrics = service.getMetrics();

    expect(metrics.routes).toEqual({
      reconcile_total: 0,
      reconcile_failures: 0,
      reconcile_skipped: 0,
      resolve_failures: 0,
      active: 0,
    });
    expect(metrics.certificate).toEqual({ obtain_attempts: 0, obtain_success: 0, obtain_failures: 0, cached: 0 });
    expect(metrics.tls).toEqual({ sni_missing: 0, certificate_not_found: 0 });
    expect(metrics.proxy).toEqual({ requests_total: 0, no_route_total: 0, errors_total: 0 });
  });

  it('should increment counters by one or by the given value', () => {
    service.increment(METRIC_PATHS.ROUTES_RECONCILE_TOTAL);
    service.increment(METRIC_PATHS.ROUTES_RECONCILE_TOTAL);
    service.increment(METRIC_PATHS.PROXY_REQUESTS_TOTAL, 5);

    const metrics = service.getMetrics();
    expect(metrics.routes.reconcile_total).toBe(2);
    expect(metrics.proxy.requests_total).toBe(5);
  });

  it('should decrement and set gauges', () => {
    service.set(METRIC_PATHS.ROUTES_ACTIVE, 4);
    service.decrement(METRIC_PATHS.ROUTES_ACTIVE);
    service.set(METRIC_PATHS.CERT_CACHED, 7);

    const metrics = service.getMetrics();
    expect(metrics.routes.active).toBe(3);
    expect(metrics.certificate.cached).toBe(7);
  });

  it('should compute uptime in whole seconds', async () => {
    jest.useFakeTimers({ now: new Date('2026-01-01T00:00:00Z') });
    const module = await Test.createTestingModule({ providers: [MetricsService] }).compile();
    const timed = module.get(MetricsService);

    jest.setSystemTime(new Date('2026-01-01T00:01:30.900Z'));

    expect(timed.getMetrics().server.uptime_seconds).toBe(90);
  });
});
