import { Injectable, Logger } from '@nestjs/common';
import {
  AdjustBundleDto,
  Bundle,
  BundleListing,
  CostOverrides,
  DispatchErrorCode,
  DispatchEvent,
  DispatchLine,
  WAREHOUSE_OBSERVATION_SUFFIX,
  buildBundleListing,
  cityKey,
  sameCity,
  specialWarehouseCity,
  warehouseUnloadLocation,
} from '@fletes/shared';
import { AuditTrailService } from '../audit/audit-trail.service';
import { BundleLockService } from '../bundles/bundle-lock.service';
import { BundleStore } from '../bundles/bundle-store';
import { Clock } from '../common/clock';
import { stateError, validationError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';
import { BundlePricingService } from './bundle-pricing.service';
import { StatusWorkflowService } from './status-workflow.service';

/** Field-wise: amounts given now replace the stored ones, the rest are kept */
export function mergeOverrides(stored?: CostOverrides, next?: CostOverrides): CostOverrides | undefined {
  if (!next) {
    return stored;
  }
  const merged: CostOverrides = {
    freight: next.freight ?? stored?.freight,
    loadUnload: next.loadUnload ?? stored?.loadUnload,
    extraPoint: next.extraPoint ?? stored?.extraPoint,
    detour: next.detour ?? stored?.detour,
  };
  return Object.values(merged).some(v => v !== undefined) ? merged : undefined;
}

interface DestinationChange {
  destination: string;
  warehouseLine?: DispatchLine;
}

@Injectable()
export class AdjustService {
  private readonly logger = new Logger(AdjustService.name);

  constructor(
    private readonly bundleStore: BundleStore,
    private readonly bundleLocks: BundleLockService,
    private readonly statusWorkflow: StatusWorkflowService,
    private readonly pricing: BundlePricingService,
    private readonly auditTrail: AuditTrailService,
    private readonly clock: Clock,
  ) {}

  /**
   * Change destination, SICETAC type, kilos or amounts of a bundle and
   * reclassify it. An authorized bundle goes back through approval.
   */
  async adjust(bundleId: string, dto: AdjustBundleDto, ctx: OperationContext): Promise<BundleListing> {
    const { actor } = ctx;

    if (dto.newDestination !== undefined && dto.destinationFromReal !== undefined) {
      throw validationError({
        code: DispatchErrorCode.ConflictingDestination,
        message: 'Indique un nuevo destino o un destino real, no ambos',
        context: { bundleId },
        region: actor.region,
      });
    }
    if (dto.newDestination !== undefined && dto.newDestination.trim() === '') {
      throw validationError({
        code: DispatchErrorCode.EmptyDestination,
        message: 'El nuevo destino no puede estar vacío',
        context: { bundleId },
        region: actor.region,
      });
    }

    return this.bundleLocks.withLock(bundleId, async () => {
      const { bundle, lines } = await this.bundleStore.requireSnapshot(bundleId, ctx);
      this.statusWorkflow.assertTransition(bundle, DispatchEvent.Adjust, actor);

      const completed = lines.find(line => line.pedidoNumber);
      if (completed) {
        throw stateError({
          code: DispatchErrorCode.LineCompleted,
          message: `El pedido ${completed.integraConsecutive} del vehículo ${bundleId} ya está completado`,
          context: { bundleId, integraConsecutive: completed.integraConsecutive },
          region: actor.region,
        });
      }

      const at = this.clock.isoNow();
      const change = this.resolveDestination(bundle, lines, dto, ctx, at);
      const allLines = change.warehouseLine ? [...lines, change.warehouseLine] : lines;
      const overrides = mergeOverrides(bundle.costOverrides, dto.overrides);
      const sicetacType = dto.vehicleTypeSicetac?.trim().toUpperCase() || bundle.vehicleTypeSicetac;

      const adjusted: Bundle = {
        ...bundle,
        destination: change.destination,
        vehicleTypeSicetac: sicetacType,
        adjustedBy: actor.username,
        adjustedAt: at,
        adjustmentObservations: dto.observations?.trim() || bundle.adjustmentObservations,
      };
      const reclassified = await this.pricing.reclassify(
        adjusted,
        allLines,
        {
          overrides,
          totalKilosSicetacOverride: dto.totalKilosSicetac ?? bundle.totalKilosSicetacOverride,
        },
        at,
        ctx.signal,
      );

      const audit = this.auditTrail.createEntry(
        {
          vehicleConsecutive: bundleId,
          event: DispatchEvent.Adjust,
          changedBy: actor.username,
          previousState: bundle.state,
          newState: reclassified.state,
          notes: dto.observations,
          automaticChange: false,
        },
        at,
      );

      await this.bundleStore.commit(
        {
          bundles: [{ bundle: reclassified, expectedVersion: bundle.version }],
          putLines: change.warehouseLine ? [change.warehouseLine] : [],
          audit: [audit],
        },
        ctx,
      );

      this.logger.log(
        `${actor.username} adjusted ${bundleId}: ${bundle.state} -> ${reclassified.state} (destination ${change.destination})`,
      );
      return buildBundleListing({ ...reclassified, version: bundle.version + 1 }, allLines);
    });
  }

  private resolveDestination(
    bundle: Bundle,
    lines: readonly DispatchLine[],
    dto: AdjustBundleDto,
    ctx: OperationContext,
    at: string,
  ): DestinationChange {
    if (dto.destinationFromReal !== undefined) {
      const match = lines.find(line => sameCity(line.realDestination, dto.destinationFromReal));
      if (!match) {
        throw validationError({
          code: DispatchErrorCode.UnknownRealDestination,
          message: `${dto.destinationFromReal} no es un destino real del vehículo ${bundle.vehicleConsecutive}`,
          context: { bundleId: bundle.vehicleConsecutive },
          region: ctx.actor.region,
        });
      }
      return { destination: match.realDestination.trim().toUpperCase() };
    }

    if (dto.newDestination === undefined) {
      return { destination: bundle.destination };
    }

    const destination = dto.newDestination.trim().toUpperCase();
    const city = specialWarehouseCity(destination);
    if (!city) {
      return { destination };
    }

    const first = lines[0];
    const alreadyThere = lines.some(line => cityKey(line.realDestination) === city);
    if (alreadyThere || !first) {
      return { destination: city };
    }

    // Zero-quantity line so the warehouse counts as a delivery point
    const warehouseLine = this.bundleStore.cloneLine(first, {
      realDestination: city,
      unloadLocation: warehouseUnloadLocation(city),
      observations: `${first.observations}${WAREHOUSE_OBSERVATION_SUFFIX}`,
      cajas: 0,
      kilos: 0,
      kilosSicetac: 0,
      declaredValue: 0,
      insurance: 0,
      requestedFreight: 0,
      realFreight: 0,
      detour: 0,
      loadUnload: 0,
      loadUnloadKabi: 0,
      extraPoint: 0,
      totalPoints: 0,
      pedidoNumber: undefined,
      createdBy: ctx.actor.username,
      createdAt: at,
    });
    return { destination: city, warehouseLine };
  }
}
