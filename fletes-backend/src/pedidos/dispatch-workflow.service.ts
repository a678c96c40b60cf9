import { Injectable, Logger } from '@nestjs/common';
import {
  BulkOperationResult,
  BundleListing,
  BundleState,
  DispatchErrorCode,
  DispatchEvent,
  buildBundleListing,
} from '@fletes/shared';
import { AuditTrailService } from '../audit/audit-trail.service';
import { BundleLockService } from '../bundles/bundle-lock.service';
import { BundleStore } from '../bundles/bundle-store';
import { Clock } from '../common/clock';
import { errorMessage, stateError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';
import { StatusWorkflowService } from './status-workflow.service';

export interface BundleDeletionResult {
  message: string;
  vehicleConsecutive: string;
  deletedLines: number;
}

/** Approval and removal of whole bundles */
@Injectable()
export class DispatchWorkflowService {
  private readonly logger = new Logger(DispatchWorkflowService.name);

  constructor(
    private readonly bundleStore: BundleStore,
    private readonly bundleLocks: BundleLockService,
    private readonly statusWorkflow: StatusWorkflowService,
    private readonly auditTrail: AuditTrailService,
    private readonly clock: Clock,
  ) {}

  confirmPreauthorized(bundleId: string, note: string | undefined, ctx: OperationContext): Promise<BundleListing> {
    return this.approve(bundleId, DispatchEvent.Confirm, note, ctx);
  }

  authorize(bundleId: string, note: string | undefined, ctx: OperationContext): Promise<BundleListing> {
    return this.approve(bundleId, DispatchEvent.Authorize, note, ctx);
  }

  /**
   * Authorize several bundles. Each one succeeds or fails on its own; the
   * result lists both.
   */
  async authorizeMany(bundleIds: string[], note: string | undefined, ctx: OperationContext): Promise<BulkOperationResult> {
    const result: BulkOperationResult = {
      successful: [],
      failed: [],
      totalProcessed: 0,
      successCount: 0,
      failureCount: 0,
    };

    for (const bundleId of bundleIds) {
      result.totalProcessed++;
      try {
        await this.authorize(bundleId, note, ctx);
        result.successful.push(bundleId);
        result.successCount++;
      } catch (error: unknown) {
        result.failed.push({ id: bundleId, error: errorMessage(error) });
        result.failureCount++;
      }
    }

    this.logger.log(
      `${ctx.actor.username} bulk authorized ${result.successCount}/${result.totalProcessed} bundles`,
    );
    return result;
  }

  async deleteBundle(bundleId: string, ctx: OperationContext): Promise<BundleDeletionResult> {
    return this.bundleLocks.withLock(bundleId, async () => {
      const snapshot = await this.bundleStore.requireSnapshot(bundleId, ctx);
      const { bundle, lines } = snapshot;
      this.statusWorkflow.assertTransition(bundle, DispatchEvent.Delete, ctx.actor);

      const numbered = lines.find(line => line.pedidoNumber);
      if (numbered) {
        throw stateError({
          code: DispatchErrorCode.LineCompleted,
          message: `El vehículo ${bundleId} tiene pedidos con número asignado (${numbered.integraConsecutive}) y no puede eliminarse`,
          context: { bundleId, integraConsecutive: numbered.integraConsecutive },
          region: ctx.actor.region,
        });
      }

      const audit = this.auditTrail.createEntry({
        vehicleConsecutive: bundleId,
        event: DispatchEvent.Delete,
        changedBy: ctx.actor.username,
        previousState: bundle.state,
      });
      await this.bundleStore.deleteBundle(snapshot, [audit], ctx);

      this.logger.log(`${ctx.actor.username} deleted ${bundleId} (${lines.length} lines)`);
      return {
        message: `Se eliminó el vehículo ${bundleId}`,
        vehicleConsecutive: bundleId,
        deletedLines: lines.length,
      };
    });
  }

  private approve(
    bundleId: string,
    event: DispatchEvent.Confirm | DispatchEvent.Authorize,
    note: string | undefined,
    ctx: OperationContext,
  ): Promise<BundleListing> {
    return this.bundleLocks.withLock(bundleId, async () => {
      const { bundle, lines } = await this.bundleStore.requireSnapshot(bundleId, ctx);
      const rule = this.statusWorkflow.assertTransition(bundle, event, ctx.actor);
      const at = this.clock.isoNow();

      const updated = {
        ...bundle,
        state: rule.to ?? BundleState.Authorized,
        authorizedBy: ctx.actor.username,
        authorizationTs: at,
        approverObservations: note || undefined,
        updatedAt: at,
      };
      const audit = this.auditTrail.createEntry(
        {
          vehicleConsecutive: bundleId,
          event,
          changedBy: ctx.actor.username,
          previousState: bundle.state,
          newState: updated.state,
          notes: note,
        },
        at,
      );
      await this.bundleStore.updateBundle(updated, bundle.version, [audit], ctx);

      this.logger.log(`${ctx.actor.username} moved ${bundleId} from ${bundle.state} to ${updated.state}`);
      return buildBundleListing({ ...updated, version: bundle.version + 1 }, lines);
    });
  }
}
