import { Test, TestingModule } from '@nestjs/testing';
import { HealthCheckService } from '@nestjs/terminus';
import type { HealthIndicatorFunction } from '@nestjs/terminus';
import { HealthController } from '../health.controller';
import { RoutingHealthIndicator } from '../../routing/routing.health';
import { CertificateHealthIndicator } from '../../certificate/certificate.health';

describe('HealthController', () => {
  let controller: HealthController;
  let healthCheckService: { check: jest.Mock };
  let routingHealthIndicator: { isHealthy: jest.Mock };
  let certificateHealthIndicator: { isHealthy: jest.Mock };

  beforeEach(async () => {
    healthCheckService = {
      check: jest.fn((indicators: HealthIndicatorFunction[]) => Promise.all(indicators.map((indicator) => indicator()))),
    };
    routingHealthIndicator = {
      isHealthy: jest.fn().mockReturnValue({ routes: { status: 'up', routes: 2 } }),
    };
    certificateHealthIndicator = {
      isHealthy: jest.fn().mockResolvedValue({ certificates: { status: 'up', tracked: 2, valid: 2, missing: [] } }),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: HealthCheckService, useValue: healthCheckService },
        { provide: RoutingHealthIndicator, useValue: routingHealthIndicator },
        { provide: CertificateHealthIndicator, useValue: certificateHealthIndicator },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  it('checks the server, routes and certificates', async () => {
    const results = await controller.check();

    expect(healthCheckService.check).toHaveBeenCalledWith([
      expect.any(Function),
      expect.any(Function),
      expect.any(Function),
    ]);
    expect(routingHealthIndicator.isHealthy).toHaveBeenCalledWith('routes');
    expect(certificateHealthIndicator.isHealthy).toHaveBeenCalledWith('certificates');
    expect(results).toEqual([
      { server: { status: 'up' } },
      { routes: { status: 'up', routes: 2 } },
      { certificates: { status: 'up', tracked: 2, valid: 2, missing: [] } },
    ]);
  });
});
