import { Module } from '@nestjs/common';
import { BundleStore } from './bundle-store';
import { DynamoBundleStore } from './dynamo-bundle-store.service';
import { BundleLockService } from './bundle-lock.service';

@Module({
  providers: [{ provide: BundleStore, useClass: DynamoBundleStore }, BundleLockService],
  exports: [BundleStore, BundleLockService],
})
export class BundlesModule {}
