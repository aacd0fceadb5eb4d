import { Test, TestingModule } from '@nestjs/testing';
import { MetricsController } from '../metrics.controller';
import { MetricsService } from '../metrics.service';
import { ApiKeyGuard } from '../../shared/guards/api-key.guard';

describe('MetricsController', () => {
  let controller: MetricsController;
  let metricsService: { getMetrics: jest.Mock };

  const mockMetrics = {
    routes: { reconcile_total: 12, reconcile_failures: 1, reconcile_skipped: 0, resolve_failures: 2, active: 3 },
    certificate: { obtain_attempts: 3, obtain_success: 3, obtain_failures: 0, cached: 3 },
    tls: { sni_missing: 4, certificate_not_found: 1 },
    proxy: { requests_total: 250, no_route_total: 5, errors_total: 1 },
    server: { uptime_seconds: 3600 },
  };

  beforeEach(async () => {
    metricsService = { getMetrics: jest.fn().mockReturnValue(mockMetrics) };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [MetricsController],
      providers: [{ provide: MetricsService, useValue: metricsService }],
    })
      .overrideGuard(ApiKeyGuard)
      .useValue({ canActivate: jest.fn().mockReturnValue(true) })
      .compile();

    controller = module.get<MetricsController>(MetricsController);
  });

  it('should return the metrics snapshot', () => {
    expect(controller.getMetrics()).toEqual(mockMetrics);
    expect(metricsService.getMetrics).toHaveBeenCalledTimes(1);
  });
});
