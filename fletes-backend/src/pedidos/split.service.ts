import { Injectable, Logger } from '@nestjs/common';
import {
  Bundle,
  BundleAuditEntry,
  BundleListing,
  BundleState,
  CostOverrides,
  DispatchErrorCode,
  DispatchEvent,
  DispatchLine,
  KiloSplitDto,
  SplitBundleDto,
  SplitGroupDto,
  SplitSuffix,
  billingTypeForKilos,
  buildBundleListing,
  cityKey,
  round2,
  sumBy,
  withSplitSuffix,
} from '@fletes/shared';
import { AuditTrailService } from '../audit/audit-trail.service';
import { BundleLockService } from '../bundles/bundle-lock.service';
import { BundleStore } from '../bundles/bundle-store';
import { Clock } from '../common/clock';
import { validationError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';
import { BundlePricingService } from './bundle-pricing.service';
import { StatusWorkflowService } from './status-workflow.service';

export type KiloSplitFields = Pick<
  DispatchLine,
  'cajas' | 'kilos' | 'kilosSicetac' | 'requestedFreight' | 'realFreight' | 'declaredValue' | 'insurance'
>;

export interface KiloSplitResult {
  peeled: KiloSplitFields;
  remainder: KiloSplitFields;
}

/** Proportional share of boxes; a positive share never rounds down to nothing */
export function peelCajas(cajas: number, ratio: number): number {
  const peeled = Math.round(cajas * ratio);
  if (peeled === 0 && cajas > 0) {
    return 1;
  }
  return Math.min(peeled, cajas);
}

/**
 * Peel `kilos` SICETAC kilograms off a line. Quantities and money move in
 * proportion; whatever is peeled is subtracted from the source so the two
 * parts always add back up to the original.
 */
export function splitLineKilos(line: KiloSplitFields, kilos: number): KiloSplitResult {
  const ratio = kilos / line.kilosSicetac;
  const peeled: KiloSplitFields = {
    cajas: peelCajas(line.cajas, ratio),
    kilos: round2(line.kilos * ratio),
    kilosSicetac: kilos,
    requestedFreight: round2(line.requestedFreight * ratio),
    realFreight: round2(line.realFreight * ratio),
    declaredValue: round2(line.declaredValue * ratio),
    insurance: round2(line.insurance * ratio),
  };
  return {
    peeled,
    remainder: {
      cajas: line.cajas - peeled.cajas,
      kilos: round2(line.kilos - peeled.kilos),
      kilosSicetac: round2(line.kilosSicetac - kilos),
      requestedFreight: round2(line.requestedFreight - peeled.requestedFreight),
      realFreight: round2(line.realFreight - peeled.realFreight),
      declaredValue: round2(line.declaredValue - peeled.declaredValue),
      insurance: round2(line.insurance - peeled.insurance),
    },
  };
}

function consigneeMatches(line: DispatchLine, key: string): boolean {
  const trimmed = key.trim();
  if (line.integraConsecutive === trimmed || line.lineId === trimmed) {
    return true;
  }
  const city = cityKey(trimmed);
  return city !== '' && (cityKey(line.unloadLocation) === city || cityKey(line.realDestination) === city);
}

interface SplitChild {
  suffix: SplitSuffix;
  vehicleConsecutive: string;
  spec: SplitGroupDto;
  lines: DispatchLine[];
}

/** Mutable working set of one split call */
class SplitPlan {
  readonly retained: DispatchLine[];
  readonly movedFromSource: DispatchLine[] = [];

  constructor(lines: readonly DispatchLine[]) {
    this.retained = [...lines];
  }

  take(predicate: (line: DispatchLine) => boolean): DispatchLine[] {
    const taken = this.retained.filter(predicate);
    for (const line of taken) {
      this.retained.splice(this.retained.indexOf(line), 1);
      this.movedFromSource.push(line);
    }
    return taken;
  }

  replace(line: DispatchLine, next: DispatchLine): void {
    this.retained[this.retained.indexOf(line)] = next;
  }
}

@Injectable()
export class SplitService {
  private readonly logger = new Logger(SplitService.name);

  constructor(
    private readonly bundleStore: BundleStore,
    private readonly bundleLocks: BundleLockService,
    private readonly statusWorkflow: StatusWorkflowService,
    private readonly pricing: BundlePricingService,
    private readonly auditTrail: AuditTrailService,
    private readonly clock: Clock,
  ) {}

  /**
   * Split a bundle into A (the source id) and B, optionally C (suffixed ids).
   * Each resulting bundle is classified on its own, billed by its SICETAC kilos.
   */
  async split(bundleId: string, dto: SplitBundleDto, ctx: OperationContext): Promise<BundleListing[]> {
    const { actor } = ctx;
    const destination = dto.destination.trim().toUpperCase();
    this.assertGroups(bundleId, dto, destination, ctx);

    return this.bundleLocks.withLock(bundleId, async () => {
      const { bundle, lines } = await this.bundleStore.requireSnapshot(bundleId, ctx);
      this.statusWorkflow.assertTransition(bundle, DispatchEvent.Split, actor);

      const children: SplitChild[] = [];
      for (const [suffix, spec] of [
        ['B', dto.groupB],
        ['C', dto.groupC],
      ] as const) {
        if (!spec) {
          continue;
        }
        const vehicleConsecutive = withSplitSuffix(bundleId, suffix);
        if (await this.bundleStore.exists(vehicleConsecutive, ctx)) {
          throw validationError({
            code: DispatchErrorCode.BundleAlreadyExists,
            message: `El vehículo ${vehicleConsecutive} ya existe; no es posible dividir ${bundleId}`,
            context: { bundleId, childId: vehicleConsecutive },
            region: actor.region,
          });
        }
        children.push({ suffix, vehicleConsecutive, spec, lines: [] });
      }

      const at = this.clock.isoNow();
      const plan = new SplitPlan(lines);
      for (const child of children) {
        this.fillGroup(child, plan, bundleId, at, ctx);
      }

      if (plan.retained.length === 0) {
        throw validationError({
          code: DispatchErrorCode.SplitEmptyGroup,
          message: `El vehículo ${bundleId} quedaría sin pedidos después de la división`,
          context: { bundleId },
          region: actor.region,
        });
      }

      const shared: Pick<Bundle, 'destination' | 'splitBy' | 'splitAt' | 'splitObservations'> = {
        destination,
        splitBy: actor.username,
        splitAt: at,
        splitObservations: dto.observations?.trim() || undefined,
      };
      const retainedBundle = await this.classifyGroup(
        { ...bundle, ...shared },
        plan.retained,
        dto.groupA?.overrides,
        at,
        ctx,
      );
      const childBundles: Bundle[] = [];
      for (const child of children) {
        childBundles.push(
          await this.classifyGroup(
            {
              ...bundle,
              ...shared,
              vehicleConsecutive: child.vehicleConsecutive,
              adjustedBy: undefined,
              adjustedAt: undefined,
              adjustmentObservations: undefined,
              mergedBy: undefined,
              mergedAt: undefined,
              mergeObservations: undefined,
              createdBy: actor.username,
              createdAt: at,
            },
            child.lines,
            child.spec.overrides,
            at,
            ctx,
          ),
        );
      }

      const childIds = children.map(c => c.vehicleConsecutive);
      const audit: BundleAuditEntry[] = [
        this.auditTrail.createEntry(
          {
            vehicleConsecutive: bundleId,
            event: DispatchEvent.Split,
            changedBy: actor.username,
            previousState: bundle.state,
            newState: retainedBundle.state,
            notes: dto.observations,
            relatedBundles: childIds,
          },
          at,
        ),
        ...childBundles.map(child =>
          this.auditTrail.createEntry(
            {
              vehicleConsecutive: child.vehicleConsecutive,
              event: DispatchEvent.Split,
              changedBy: actor.username,
              newState: child.state,
              notes: `Dividido de ${bundleId}`,
              relatedBundles: [bundleId],
              automaticChange: child.state === BundleState.Preauthorized,
            },
            at,
          ),
        ),
      ];

      await this.bundleStore.commit(
        {
          bundles: [
            { bundle: retainedBundle, expectedVersion: bundle.version },
            ...childBundles.map(child => ({ bundle: child })),
          ],
          deleteLines: plan.movedFromSource.map(line => ({ vehicleConsecutive: bundleId, lineId: line.lineId })),
          putLines: [...plan.retained, ...children.flatMap(c => c.lines)],
          audit,
        },
        ctx,
      );

      this.logger.log(
        `${actor.username} split ${bundleId} into ${[bundleId, ...childIds].join(', ')}`,
      );
      return [
        buildBundleListing({ ...retainedBundle, version: bundle.version + 1 }, plan.retained),
        ...childBundles.map((child, i) => buildBundleListing({ ...child, version: 1 }, children[i].lines)),
      ];
    });
  }

  private assertGroups(bundleId: string, dto: SplitBundleDto, destination: string, ctx: OperationContext): void {
    const reject = (code: DispatchErrorCode, message: string) =>
      validationError({ code, message, context: { bundleId }, region: ctx.actor.region });

    if (destination === '') {
      throw reject(DispatchErrorCode.EmptyDestination, 'El destino unificado no puede estar vacío');
    }
    if (!dto.groupB) {
      throw reject(
        DispatchErrorCode.SplitInvalidGroups,
        dto.groupC ? 'El grupo C requiere el grupo B' : 'Indique al menos el grupo B para dividir el vehículo',
      );
    }
    for (const [name, group] of [
      ['B', dto.groupB],
      ['C', dto.groupC],
    ] as const) {
      if (group && !group.kiloSplit && (group.consignees ?? []).length === 0) {
        throw reject(DispatchErrorCode.SplitEmptyGroup, `El grupo ${name} no tiene pedidos ni división por kilos`);
      }
    }
  }

  private fillGroup(child: SplitChild, plan: SplitPlan, bundleId: string, at: string, ctx: OperationContext): void {
    const suffixed = (line: DispatchLine): Partial<DispatchLine> => ({
      vehicleConsecutive: child.vehicleConsecutive,
      integraConsecutive: withSplitSuffix(line.integraConsecutive, child.suffix),
      orderConsecutive: withSplitSuffix(line.orderConsecutive, child.suffix),
    });

    for (const key of child.spec.consignees ?? []) {
      const taken = plan.take(line => consigneeMatches(line, key));
      if (taken.length === 0) {
        throw validationError({
          code: DispatchErrorCode.LineNotFound,
          message: `No hay pedidos de ${key} en el vehículo ${bundleId} para el grupo ${child.suffix}`,
          context: { bundleId, consignee: key },
          region: ctx.actor.region,
        });
      }
      child.lines.push(...taken.map(line => ({ ...line, ...suffixed(line) })));
    }

    if (child.spec.kiloSplit) {
      const source = this.findKiloSplitSource(plan, child.spec.kiloSplit, bundleId, ctx);
      const k = child.spec.kiloSplit.kilos;
      if (!(k > 0 && k < source.kilosSicetac)) {
        throw validationError({
          code: DispatchErrorCode.SplitKilos,
          message: `Los kilos a dividir (${k}) deben ser mayores que 0 y menores que ${source.kilosSicetac} en ${source.integraConsecutive}`,
          context: { bundleId, integraConsecutive: source.integraConsecutive, lineId: source.lineId },
          region: ctx.actor.region,
        });
      }

      const { peeled, remainder } = splitLineKilos(source, k);
      plan.replace(source, { ...source, ...remainder });
      child.lines.push(
        this.bundleStore.cloneLine(source, {
          ...peeled,
          ...suffixed(source),
          detour: 0,
          loadUnload: 0,
          loadUnloadKabi: 0,
          extraPoint: 0,
          totalPoints: 0,
          createdBy: ctx.actor.username,
          createdAt: at,
        }),
      );
    }
  }

  private findKiloSplitSource(plan: SplitPlan, spec: KiloSplitDto, bundleId: string, ctx: OperationContext): DispatchLine {
    const candidates = plan.retained.filter(
      line => line.integraConsecutive === spec.integraConsecutive && (!spec.lineId || line.lineId === spec.lineId),
    );
    if (candidates.length === 0) {
      throw validationError({
        code: DispatchErrorCode.LineNotFound,
        message: `El pedido ${spec.integraConsecutive} no está en el vehículo ${bundleId}`,
        context: { bundleId, integraConsecutive: spec.integraConsecutive },
        region: ctx.actor.region,
      });
    }
    if (candidates.length > 1) {
      throw validationError({
        code: DispatchErrorCode.AmbiguousLine,
        message: `El pedido ${spec.integraConsecutive} tiene ${candidates.length} líneas; indique el lineId a dividir`,
        context: { bundleId, integraConsecutive: spec.integraConsecutive, lineIds: candidates.map(c => c.lineId) },
        region: ctx.actor.region,
      });
    }
    return candidates[0];
  }

  private classifyGroup(
    bundle: Bundle,
    lines: readonly DispatchLine[],
    overrides: CostOverrides | undefined,
    at: string,
    ctx: OperationContext,
  ): Promise<Bundle> {
    const billingVehicleType = billingTypeForKilos(sumBy(lines, l => l.kilosSicetac));
    return this.pricing.reclassify(
      { ...bundle, vehicleTypeSicetac: billingVehicleType },
      lines,
      { billingVehicleType, overrides: overrides ? { ...overrides } : undefined },
      at,
      ctx.signal,
    );
  }
}
