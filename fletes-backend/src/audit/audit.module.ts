import { Module } from '@nestjs/common';
import { BundlesModule } from '../bundles/bundles.module';
import { AuditTrailService } from './audit-trail.service';

@Module({
  imports: [BundlesModule],
  providers: [AuditTrailService],
  exports: [AuditTrailService],
})
export class AuditModule {}
