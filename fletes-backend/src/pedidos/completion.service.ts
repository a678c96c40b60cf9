import { Injectable, Logger } from '@nestjs/common';
import {
  Bundle,
  BundleState,
  DispatchCapability,
  DispatchErrorCode,
  DispatchEvent,
  LoadPedidoNumbersDto,
  LoadPedidoNumbersResult,
  PedidoNumberEntryDto,
} from '@fletes/shared';
import { AccessPolicyService } from '../access/access-policy.service';
import { AuditTrailService } from '../audit/audit-trail.service';
import { BundleLockService } from '../bundles/bundle-lock.service';
import { BundleStore } from '../bundles/bundle-store';
import { Clock } from '../common/clock';
import { errorMessage, validationError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';
import { StatusWorkflowService } from './status-workflow.service';

interface BundleOutcome {
  updatedLines: number;
  completed: boolean;
}

/**
 * Completion feed from the billing system. Each pair is applied on its own;
 * a bundle whose lines all carry a pedido number is completed and archived.
 */
@Injectable()
export class CompletionService {
  private readonly logger = new Logger(CompletionService.name);

  constructor(
    private readonly bundleStore: BundleStore,
    private readonly bundleLocks: BundleLockService,
    private readonly statusWorkflow: StatusWorkflowService,
    private readonly accessPolicy: AccessPolicyService,
    private readonly auditTrail: AuditTrailService,
    private readonly clock: Clock,
  ) {}

  async loadPedidoNumbers(dto: LoadPedidoNumbersDto, ctx: OperationContext): Promise<LoadPedidoNumbersResult> {
    this.accessPolicy.assert(ctx.actor, DispatchCapability.LoadPedidoNumbers);

    const result: LoadPedidoNumbersResult = { updatedLines: 0, completedBundles: [], failed: [] };
    for (const entry of dto.entries) {
      try {
        await this.applyEntry(entry, result, ctx);
      } catch (error: unknown) {
        result.failed.push({ integraConsecutive: entry.integraConsecutive, error: errorMessage(error) });
      }
    }

    this.logger.log(
      `${ctx.actor.username} loaded pedido numbers: ${result.updatedLines} lines, ${result.completedBundles.length} bundles completed, ${result.failed.length} failed`,
    );
    return result;
  }

  /** Counts each bundle into `result` as soon as its write lands */
  private async applyEntry(
    entry: PedidoNumberEntryDto,
    result: LoadPedidoNumbersResult,
    ctx: OperationContext,
  ): Promise<void> {
    const integraConsecutive = entry.integraConsecutive.trim();
    const pedidoNumber = entry.pedidoNumber.trim();
    const found = await this.bundleStore.findLinesByIntegraConsecutive(integraConsecutive, ctx);
    if (found.length === 0) {
      throw validationError({
        code: DispatchErrorCode.LineNotFound,
        message: `El pedido ${integraConsecutive} no existe en vehículos activos`,
        context: { integraConsecutive },
        region: ctx.actor.region,
      });
    }

    const bundleIds = [...new Set(found.map(line => line.vehicleConsecutive))].sort();
    for (const bundleId of bundleIds) {
      const outcome = await this.bundleLocks.withLock(bundleId, () =>
        this.numberBundleLines(bundleId, integraConsecutive, pedidoNumber, ctx),
      );
      result.updatedLines += outcome.updatedLines;
      if (outcome.completed) {
        result.completedBundles.push(bundleId);
      }
    }
  }

  /**
   * Numbers the pending lines of one bundle. When no line is left without a
   * number the bundle is completed and archived in the same write.
   */
  private async numberBundleLines(
    bundleId: string,
    integraConsecutive: string,
    pedidoNumber: string,
    ctx: OperationContext,
  ): Promise<BundleOutcome> {
    const { bundle, lines } = await this.bundleStore.requireSnapshot(bundleId, ctx);
    this.statusWorkflow.assertTransition(bundle, DispatchEvent.Complete, ctx.actor);

    const pending = lines.filter(line => line.integraConsecutive === integraConsecutive && !line.pedidoNumber);
    if (pending.length === 0) {
      throw validationError({
        code: DispatchErrorCode.LineCompleted,
        message: `El pedido ${integraConsecutive} ya tiene número de pedido asignado`,
        context: { bundleId, integraConsecutive },
        region: ctx.actor.region,
      });
    }

    const at = this.clock.isoNow();
    const pendingIds = new Set(pending.map(line => line.lineId));
    const updated = lines.map(line =>
      pendingIds.has(line.lineId)
        ? { ...line, pedidoNumber, pedidoUpdatedBy: ctx.actor.username, pedidoUpdatedAt: at }
        : line,
    );
    const numbered = updated.filter(line => pendingIds.has(line.lineId));

    if (!updated.every(line => line.pedidoNumber)) {
      await this.bundleStore.commit(
        { bundles: [{ bundle: { ...bundle, updatedAt: at }, expectedVersion: bundle.version }], putLines: numbered },
        ctx,
      );
      return { updatedLines: numbered.length, completed: false };
    }

    const completedBundle: Bundle = { ...bundle, state: BundleState.Completed, updatedAt: at };
    const audit = this.auditTrail.createEntry(
      {
        vehicleConsecutive: bundleId,
        event: DispatchEvent.Complete,
        changedBy: ctx.actor.username,
        previousState: bundle.state,
        newState: BundleState.Completed,
        notes: `Último pedido ${integraConsecutive} con número ${pedidoNumber}`,
        automaticChange: true,
      },
      at,
    );
    await this.bundleStore.archiveBundle(
      { bundle: completedBundle, expectedVersion: bundle.version, lines: updated, audit: [audit] },
      ctx,
    );
    this.logger.log(`Archived completed bundle ${bundleId}`);
    return { updatedLines: numbered.length, completed: true };
  }
}
