import { Module } from '@nestjs/common';
import { CertificateModule } from '../certificate/certificate.module';
import { TlsDispatchService } from './tls-dispatch.service';

@Module({
  imports: [CertificateModule],
  providers: [TlsDispatchService],
  exports: [TlsDispatchService],
})
export class TlsModule {}
