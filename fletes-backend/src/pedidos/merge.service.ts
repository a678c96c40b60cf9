import { Injectable, Logger } from '@nestjs/common';
import {
  Bundle,
  BundleAuditEntry,
  BundleListing,
  BundleSnapshot,
  DispatchErrorCode,
  DispatchEvent,
  DispatchLine,
  MergeBundlesDto,
  buildBundleListing,
} from '@fletes/shared';
import { AuditTrailService } from '../audit/audit-trail.service';
import { BundleLockService } from '../bundles/bundle-lock.service';
import { BundleStore } from '../bundles/bundle-store';
import { Clock } from '../common/clock';
import { validationError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';
import { BundlePricingService } from './bundle-pricing.service';
import { StatusWorkflowService } from './status-workflow.service';

/** Most frequent integra consecutive; ties go to the lexicographically smallest */
export function dominantIntegraConsecutive(lines: readonly Pick<DispatchLine, 'integraConsecutive'>[]): string | undefined {
  const counts = new Map<string, number>();
  for (const line of lines) {
    counts.set(line.integraConsecutive, (counts.get(line.integraConsecutive) ?? 0) + 1);
  }
  let best: string | undefined;
  let bestCount = 0;
  for (const [ci, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== undefined && ci < best)) {
      best = ci;
      bestCount = count;
    }
  }
  return best;
}

@Injectable()
export class MergeService {
  private readonly logger = new Logger(MergeService.name);

  constructor(
    private readonly bundleStore: BundleStore,
    private readonly bundleLocks: BundleLockService,
    private readonly statusWorkflow: StatusWorkflowService,
    private readonly pricing: BundlePricingService,
    private readonly auditTrail: AuditTrailService,
    private readonly clock: Clock,
  ) {}

  /**
   * Fold every source bundle into the first one. The others disappear; their
   * lines move over and take the target's dominant integra consecutive.
   */
  async merge(dto: MergeBundlesDto, ctx: OperationContext): Promise<BundleListing> {
    const { actor } = ctx;
    const ids = [...new Set(dto.bundleIds.map(id => id.trim()))];
    if (ids.length < 2) {
      throw validationError({
        code: DispatchErrorCode.MergeTooFewBundles,
        message: 'Se requieren al menos dos vehículos distintos para fusionar',
        context: { bundleIds: ids },
        region: actor.region,
      });
    }
    const [targetId, ...sourceIds] = ids;

    return this.bundleLocks.withLocks(ids, async () => {
      const snapshots: BundleSnapshot[] = [];
      for (const id of ids) {
        const snapshot = await this.bundleStore.requireSnapshot(id, ctx);
        this.statusWorkflow.assertTransition(snapshot.bundle, DispatchEvent.Merge, actor);
        snapshots.push(snapshot);
      }
      this.assertHomogeneous(snapshots, ctx);

      const [target, ...sources] = snapshots;
      const integraConsecutive = dominantIntegraConsecutive(target.lines) ?? target.lines[0]?.integraConsecutive;
      const moved = this.bundleStore.moveLinesChanges(
        snapshots.flatMap(s =>
          s.lines.map(line => ({ ...line, integraConsecutive: integraConsecutive ?? line.integraConsecutive })),
        ),
        targetId,
      );
      const mergedLines = moved.putLines;

      const at = this.clock.isoNow();
      const billingType = dto.billingVehicleType.trim().toUpperCase();
      const merged: Bundle = {
        ...target.bundle,
        destination: dto.destination.trim().toUpperCase(),
        vehicleTypeSicetac: billingType,
        mergedBy: actor.username,
        mergedAt: at,
        mergeObservations: dto.observations?.trim() || undefined,
      };
      const reclassified = await this.pricing.reclassify(
        merged,
        mergedLines,
        { billingVehicleType: billingType, overrides: { ...dto.overrides } },
        at,
        ctx.signal,
      );

      const audit: BundleAuditEntry[] = [
        this.auditTrail.createEntry(
          {
            vehicleConsecutive: targetId,
            event: DispatchEvent.Merge,
            changedBy: actor.username,
            previousState: target.bundle.state,
            newState: reclassified.state,
            notes: dto.observations,
            relatedBundles: sourceIds,
          },
          at,
        ),
        ...sources.map(source =>
          this.auditTrail.createEntry(
            {
              vehicleConsecutive: source.bundle.vehicleConsecutive,
              event: DispatchEvent.Merge,
              changedBy: actor.username,
              previousState: source.bundle.state,
              notes: `Fusionado en ${targetId}`,
              relatedBundles: [targetId],
            },
            at,
          ),
        ),
      ];

      await this.bundleStore.commit(
        {
          bundles: [{ bundle: reclassified, expectedVersion: target.bundle.version }],
          deleteBundles: sources.map(s => ({
            vehicleConsecutive: s.bundle.vehicleConsecutive,
            expectedVersion: s.bundle.version,
          })),
          ...moved,
          audit,
        },
        ctx,
      );

      this.logger.log(`${actor.username} merged ${sourceIds.join(', ')} into ${targetId} (${reclassified.state})`);
      return buildBundleListing({ ...reclassified, version: target.bundle.version + 1 }, mergedLines);
    });
  }

  private assertHomogeneous(snapshots: readonly BundleSnapshot[], ctx: OperationContext): void {
    const [first] = snapshots;
    for (const { bundle } of snapshots) {
      if (bundle.region !== first.bundle.region || bundle.origin !== first.bundle.origin) {
        throw validationError({
          code: DispatchErrorCode.MergeHomogeneity,
          message: `El vehículo ${bundle.vehicleConsecutive} no comparte regional y origen con ${first.bundle.vehicleConsecutive}`,
          context: {
            bundleIds: snapshots.map(s => s.bundle.vehicleConsecutive),
            region: bundle.region,
            origin: bundle.origin,
          },
          region: ctx.actor.region,
        });
      }
    }
  }
}
