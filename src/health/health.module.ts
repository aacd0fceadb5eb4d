import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { CertificateModule } from '../certificate/certificate.module';
import { RoutingModule } from '../routing/routing.module';

/**
 * The HealthModule provides health check endpoints for the application.
 */
@Module({
  imports: [TerminusModule, RoutingModule, CertificateModule],
  controllers: [HealthController],
})
export class HealthModule {}
