import { Test, TestingModule } from '@nestjs/testing';
import { CertificateController } from '../certificate.controller';
import { CertificateService } from '../certificate.service';
import { ApiKeyGuard } from '../../shared/guards/api-key.guard';

describe('CertificateController', () => {
  let controller: CertificateController;
  let certificateService: { listStatuses: jest.Mock };

  beforeEach(async () => {
    certificateService = { listStatuses: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [CertificateController],
      providers: [{ provide: CertificateService, useValue: certificateService }],
    })
      .overrideGuard(ApiKeyGuard)
      .useValue({ canActivate: jest.fn().mockReturnValue(true) })
      .compile();

    controller = module.get<CertificateController>(CertificateController);
  });

  it('returns an empty list', async () => {
    certificateService.listStatuses.mockResolvedValue([]);

    await expect(controller.getCertificates()).resolves.toEqual({ certificates: [] });
  });

  it('serialises dates as ISO strings', async () => {
    certificateService.listStatuses.mockResolvedValue([
      {
        fqdn: 'app.example.com',
        exists: true,
        valid: true,
        tracked: true,
        obtaining: false,
        renewalDue: false,
        issuedAt: new Date('2026-01-01T00:00:00Z'),
        expiresAt: new Date('2026-04-01T00:00:00Z'),
        daysUntilExpiry: 31,
      },
      {
        fqdn: 'new.example.com',
        exists: false,
        valid: false,
        tracked: true,
        obtaining: true,
        renewalDue: true,
        lastFailure: { at: new Date('2026-03-01T12:00:00Z'), message: 'too many certificates' },
      },
    ]);

    const response = await controller.getCertificates();

    expect(response.certificates).toEqual([
      {
        fqdn: 'app.example.com',
        exists: true,
        valid: true,
        tracked: true,
        obtaining: false,
        renewalDue: false,
        issuedAt: '2026-01-01T00:00:00.000Z',
        expiresAt: '2026-04-01T00:00:00.000Z',
        daysUntilExpiry: 31,
        lastFailure: undefined,
      },
      {
        fqdn: 'new.example.com',
        exists: false,
        valid: false,
        tracked: true,
        obtaining: true,
        renewalDue: true,
        issuedAt: undefined,
        expiresAt: undefined,
        daysUntilExpiry: undefined,
        lastFailure: { at: '2026-03-01T12:00:00.000Z', message: 'too many certificates' },
      },
    ]);
  });
});
