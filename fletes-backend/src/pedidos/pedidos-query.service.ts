import { Injectable } from '@nestjs/common';
import {
  BundleAuditTrail,
  BundleFiltersDto,
  BundleListing,
  buildBundleListing,
} from '@fletes/shared';
import { AccessPolicyService } from '../access/access-policy.service';
import { AuditTrailService } from '../audit/audit-trail.service';
import { ACTIVE_BUNDLE_STATES, BundleStore } from '../bundles/bundle-store';
import { OperationContext } from '../common/operation-context';

/** Region of a vehicle consecutive, for bundles that no longer exist */
function regionOf(vehicleConsecutive: string): string {
  return vehicleConsecutive.split('-')[0];
}

@Injectable()
export class PedidosQueryService {
  constructor(
    private readonly bundleStore: BundleStore,
    private readonly accessPolicy: AccessPolicyService,
    private readonly auditTrail: AuditTrailService,
  ) {}

  async listBundles(filters: BundleFiltersDto, ctx: OperationContext): Promise<BundleListing[]> {
    const region = filters.region?.trim().toUpperCase();
    if (region) {
      this.accessPolicy.assertRegion(ctx.actor, region);
    }

    const snapshots = await this.bundleStore.listBundles(
      {
        states: filters.state ? [filters.state] : [...ACTIVE_BUNDLE_STATES],
        regions: region ? [region] : this.accessPolicy.operableRegions(ctx.actor),
      },
      ctx,
    );
    return snapshots.map(({ bundle, lines }) => buildBundleListing(bundle, lines));
  }

  async getBundle(bundleId: string, ctx: OperationContext): Promise<BundleListing> {
    const { bundle, lines } = await this.bundleStore.requireSnapshot(bundleId, ctx);
    this.accessPolicy.assertRegion(ctx.actor, bundle.region, bundleId);
    return buildBundleListing(bundle, lines);
  }

  async getAuditTrail(bundleId: string, ctx: OperationContext): Promise<BundleAuditTrail> {
    const bundle = await this.bundleStore.getBundle(bundleId, ctx);
    this.accessPolicy.assertRegion(ctx.actor, bundle?.region ?? regionOf(bundleId), bundleId);
    return this.auditTrail.getAuditTrail(bundleId, ctx);
  }
}
