import { Test, TestingModule } from '@nestjs/testing';
import { HealthIndicatorService } from '@nestjs/terminus';
import { CertificateHealthIndicator } from '../certificate.health';
import { CertificateService } from '../certificate.service';
import type { CertificateStatus } from '../interfaces';

describe('CertificateHealthIndicator', () => {
  let healthIndicator: CertificateHealthIndicator;
  let certificateService: { listStatuses: jest.Mock };
  let healthIndicatorService: { check: jest.Mock };
  let mockIndicator: { up: jest.Mock; down: jest.Mock };

  const now = new Date('2026-03-01T00:00:00Z');

  const status = (fqdn: string, overrides: Partial<CertificateStatus> = {}): CertificateStatus => ({
    fqdn,
    exists: true,
    valid: true,
    tracked: true,
    obtaining: false,
    renewalDue: false,
    ...overrides,
  });

  beforeEach(async () => {
    mockIndicator = {
      up: jest.fn((details) => ({ certificates: { status: 'up', ...details } })),
      down: jest.fn((details) => ({ certificates: { status: 'down', ...details } })),
    };
    certificateService = { listStatuses: jest.fn() };
    healthIndicatorService = { check: jest.fn().mockReturnValue(mockIndicator) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CertificateHealthIndicator,
        { provide: CertificateService, useValue: certificateService },
        { provide: HealthIndicatorService, useValue: healthIndicatorService },
      ],
    }).compile();

    healthIndicator = module.get<CertificateHealthIndicator>(CertificateHealthIndicator);
  });

  it('is up when nothing is routed', async () => {
    certificateService.listStatuses.mockResolvedValue([]);

    await healthIndicator.isHealthy('certificates', now);

    expect(healthIndicatorService.check).toHaveBeenCalledWith('certificates');
    expect(certificateService.listStatuses).toHaveBeenCalledWith(now);
    expect(mockIndicator.up).toHaveBeenCalledWith({ tracked: 0, valid: 0, missing: [] });
  });

  it('is up when every routed hostname has a valid certificate', async () => {
    certificateService.listStatuses.mockResolvedValue([
      status('api.example.com'),
      status('web.example.com'),
      status('old.example.com', { tracked: false, valid: false }),
    ]);

    const result = await healthIndicator.isHealthy('certificates', now);

    expect(mockIndicator.up).toHaveBeenCalledWith({ tracked: 2, valid: 2, missing: [] });
    expect(result).toEqual({ certificates: { status: 'up', tracked: 2, valid: 2, missing: [] } });
  });

  it('is down and names routed hostnames without a valid certificate', async () => {
    certificateService.listStatuses.mockResolvedValue([
      status('api.example.com'),
      status('new.example.com', { exists: false, valid: false, renewalDue: true }),
      status('web.example.com', { valid: false }),
    ]);

    await healthIndicator.isHealthy('certificates', now);

    expect(mockIndicator.down).toHaveBeenCalledWith({
      tracked: 3,
      valid: 1,
      missing: ['new.example.com', 'web.example.com'],
    });
    expect(mockIndicator.up).not.toHaveBeenCalled();
  });
});
