import { Injectable, Logger } from '@nestjs/common';
import {
  Bundle,
  BundleState,
  DispatchCapability,
  DispatchErrorCode,
  DispatchErrorKind,
  DispatchEvent,
  DispatchLine,
  DispatchUser,
  IngestColumn,
  IngestRow,
  IngestSummary,
  REQUIRED_INGEST_COLUMNS,
  RowError,
  TRIP_TYPE_ALIASES,
  TripType,
  buildIntegraConsecutive,
  buildVehicleConsecutive,
  formatCompactDate,
  normalizePlate,
  resolveBillingVehicleType,
} from '@fletes/shared';
import { v4 as uuidv4 } from 'uuid';
import { AccessPolicyService } from '../access/access-policy.service';
import { AuditTrailService } from '../audit/audit-trail.service';
import { BundleLockService } from '../bundles/bundle-lock.service';
import { BundleStore } from '../bundles/bundle-store';
import { ClientsService } from '../catalog/clients.service';
import { TariffsService } from '../catalog/tariffs.service';
import { Clock } from '../common/clock';
import { ConfigService } from '../config/config.service';
import { dispatchPayloadOf, validationError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';
import { BundlePricingService } from './bundle-pricing.service';
import { StatusWorkflowService } from './status-workflow.service';

/** First data row of an uploaded sheet; row 1 holds the headers */
const FIRST_DATA_ROW = 2;

const OPTIONAL_NUMERIC_COLUMNS: readonly IngestColumn[] = [
  'DECLARED_VALUE',
  'DETOUR',
  'LOAD_UNLOAD',
  'LOAD_UNLOAD_KABI',
  'EXTRA_POINT',
  'TOTAL_POINTS',
  'INSURANCE',
  'REAL_FREIGHT',
];

/** A row after field-level validation */
interface ParsedRow {
  row: number;
  clientNit: string;
  origin: string;
  destination: string;
  realDestination: string;
  cajas: number;
  kilos: number;
  kilosSicetac: number;
  vehicleType: string;
  vehicleTypeSicetac?: string;
  plate: string;
  declaredValue: number;
  trackingDocument: string;
  requestedFreight: number;
  loadLocation: string;
  loadAddress: string;
  unloadLocation: string;
  unloadAddress: string;
  observations: string;
  tripType: TripType;
  orderConsecutive: string;
  detour: number;
  loadUnload: number;
  loadUnloadKabi: number;
  extraPoint: number;
  totalPoints: number;
  insurance: number;
  realFreight: number;
}

interface PlateGroup {
  plate: string;
  vehicleConsecutive: string;
  rows: ParsedRow[];
}

/** Accumulators for one ingest call */
class BatchContext {
  readonly errors: RowError[] = [];
  readonly groups = new Map<string, PlateGroup>();
  readonly orderOwners = new Map<string, string>();

  reject(row: number, message: string): void {
    this.errors.push({ row, message });
  }

  get hasErrors(): boolean {
    return this.errors.length > 0;
  }
}

export function cellText(value: IngestRow[IngestColumn]): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

/**
 * Parse a numeric cell. Strings may carry a currency sign and spaces. With
 * both separators the last one is the decimal point; a lone comma is a
 * decimal comma; repeated commas or dots group thousands.
 */
export function parseAmount(value: IngestRow[IngestColumn]): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  let text = cellText(value).replace(/[$\s]/g, '');
  if (text === '') {
    return undefined;
  }
  const commas = text.split(',').length - 1;
  const dots = text.split('.').length - 1;
  if (commas > 0 && dots > 0) {
    text = text.lastIndexOf(',') > text.lastIndexOf('.')
      ? text.replace(/\./g, '').replace(',', '.')
      : text.replace(/,/g, '');
  } else if (commas === 1) {
    text = text.replace(',', '.');
  } else if (commas > 1) {
    text = text.replace(/,/g, '');
  } else if (dots > 1) {
    text = text.replace(/\./g, '');
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

@Injectable()
export class IngestService {
  private readonly logger = new Logger(IngestService.name);

  constructor(
    private readonly bundleStore: BundleStore,
    private readonly bundleLocks: BundleLockService,
    private readonly clientsService: ClientsService,
    private readonly tariffsService: TariffsService,
    private readonly accessPolicy: AccessPolicyService,
    private readonly pricing: BundlePricingService,
    private readonly statusWorkflow: StatusWorkflowService,
    private readonly auditTrail: AuditTrailService,
    private readonly configService: ConfigService,
    private readonly clock: Clock,
  ) {}

  /**
   * Validate, group and classify a batch of rows, then stage every line in
   * one commit. Any row error rejects the whole batch.
   */
  async ingest(rows: readonly IngestRow[], ctx: OperationContext): Promise<IngestSummary> {
    const { actor } = ctx;
    this.accessPolicy.assert(actor, DispatchCapability.IngestBatch);
    const region = actor.region.toUpperCase();

    if (rows.length === 0) {
      throw validationError({
        code: DispatchErrorCode.BatchRejected,
        message: 'El archivo no contiene pedidos',
        context: { errors: [] },
        region,
      });
    }

    const now = this.clock.now();
    const at = now.toISOString();
    const compactDate = formatCompactDate(now, this.configService.dispatchTimeZone);
    const batch = new BatchContext();

    const parsed: ParsedRow[] = [];
    rows.forEach((raw, i) => {
      const row = this.parseRow(raw, i + FIRST_DATA_ROW, batch);
      if (row) {
        parsed.push(row);
      }
    });

    await this.checkCatalog(parsed, batch, ctx.signal);
    this.groupByPlate(parsed, region, compactDate, batch);
    await this.checkStore(batch, region, compactDate, ctx);
    this.rejectIfErrors(batch, region);

    const staged: Array<{ bundle: Bundle; lines: DispatchLine[] }> = [];
    for (const group of batch.groups.values()) {
      const result = await this.stageGroup(group, region, compactDate, actor, at, batch, ctx.signal);
      if (result) {
        staged.push(result);
      }
    }
    this.rejectIfErrors(batch, region);

    const audit = staged.map(({ bundle }) =>
      this.auditTrail.createEntry(
        {
          vehicleConsecutive: bundle.vehicleConsecutive,
          event: DispatchEvent.Ingest,
          changedBy: actor.username,
          newState: bundle.state,
          automaticChange: bundle.state === BundleState.Preauthorized,
        },
        at,
      ),
    );

    await this.bundleLocks.withLocks(
      staged.map(s => s.bundle.vehicleConsecutive),
      () =>
        this.bundleStore.commit(
          {
            bundles: staged.map(s => ({ bundle: s.bundle })),
            putLines: staged.flatMap(s => s.lines),
            audit,
          },
          ctx,
        ),
    );

    const lineCount = staged.reduce((acc, s) => acc + s.lines.length, 0);
    const states: Partial<Record<BundleState, number>> = {};
    for (const { bundle } of staged) {
      states[bundle.state] = (states[bundle.state] ?? 0) + 1;
    }
    this.logger.log(`${actor.username} staged ${lineCount} lines in ${staged.length} bundles for ${region}`);

    return {
      message: `Se cargaron ${lineCount} pedidos en ${staged.length} vehículos`,
      bundles: staged.map(s => ({
        vehicleConsecutive: s.bundle.vehicleConsecutive,
        state: s.bundle.state,
        lines: s.lines.length,
      })),
      lines: lineCount,
      states,
    };
  }

  // ── Row level ───────────────────────────────────────────────────

  private parseRow(raw: IngestRow, row: number, batch: BatchContext): ParsedRow | undefined {
    const errorsBefore = batch.errors.length;

    for (const column of REQUIRED_INGEST_COLUMNS) {
      if (cellText(raw[column]) === '') {
        batch.reject(row, `Fila ${row}: el campo ${column} es obligatorio`);
      }
    }
    if (batch.errors.length > errorsBefore) {
      return undefined;
    }

    const amount = (column: IngestColumn, required: boolean): number => {
      const blank = cellText(raw[column]) === '';
      if (blank && !required) {
        return 0;
      }
      const value = parseAmount(raw[column]);
      if (value === undefined || value < 0) {
        batch.reject(row, `Fila ${row}: el campo ${column} debe ser un número válido`);
        return 0;
      }
      return value;
    };

    const cajas = amount('NUM_CAJAS', true);
    const kilos = amount('NUM_KILOS', true);
    const requestedFreight = amount('REQUESTED_FREIGHT', true);
    const kilosSicetac = cellText(raw.NUM_KILOS_SICETAC) === '' ? kilos : amount('NUM_KILOS_SICETAC', true);
    const optional = Object.fromEntries(OPTIONAL_NUMERIC_COLUMNS.map(column => [column, amount(column, false)]));

    const orderConsecutive = cellText(raw.ORDER_CONSECUTIVE);
    if (!/^\d+$/.test(orderConsecutive)) {
      batch.reject(row, `Fila ${row}: el campo ORDER_CONSECUTIVE debe contener solo dígitos`);
    }

    const tripType = TRIP_TYPE_ALIASES[cellText(raw.TRIP_TYPE).toUpperCase()];
    if (!tripType) {
      batch.reject(row, `Fila ${row}: el tipo de viaje ${cellText(raw.TRIP_TYPE)} no es válido (BULK o PARCEL)`);
    }

    if (batch.errors.length > errorsBefore || !tripType) {
      return undefined;
    }

    const sicetacType = cellText(raw.VEHICLE_TYPE_SICETAC).toUpperCase();

    return {
      row,
      clientNit: cellText(raw.NIT_CLIENT),
      origin: cellText(raw.ORIGIN).toUpperCase(),
      destination: cellText(raw.DESTINATION).toUpperCase(),
      realDestination: cellText(raw.REAL_DESTINATION).toUpperCase(),
      cajas,
      kilos,
      kilosSicetac,
      vehicleType: cellText(raw.VEHICLE_TYPE).toUpperCase(),
      vehicleTypeSicetac: sicetacType || undefined,
      plate: normalizePlate(cellText(raw.VEHICLE_PLATE)),
      declaredValue: optional.DECLARED_VALUE,
      trackingDocument: cellText(raw.TRACKING_DOCUMENT),
      requestedFreight,
      loadLocation: cellText(raw.LOAD_LOCATION),
      loadAddress: cellText(raw.LOAD_ADDRESS),
      unloadLocation: cellText(raw.UNLOAD_LOCATION),
      unloadAddress: cellText(raw.UNLOAD_ADDRESS),
      observations: cellText(raw.OBSERVATIONS),
      tripType,
      orderConsecutive,
      detour: optional.DETOUR,
      loadUnload: optional.LOAD_UNLOAD,
      loadUnloadKabi: optional.LOAD_UNLOAD_KABI,
      extraPoint: optional.EXTRA_POINT,
      totalPoints: optional.TOTAL_POINTS,
      insurance: optional.INSURANCE,
      realFreight: optional.REAL_FREIGHT,
    };
  }

  private async checkCatalog(rows: readonly ParsedRow[], batch: BatchContext, signal?: AbortSignal): Promise<void> {
    const clients = await this.clientsService.findMany(
      rows.map(r => r.clientNit),
      signal,
    );

    for (const row of rows) {
      if (!clients.has(row.clientNit)) {
        batch.reject(row.row, `Fila ${row.row}: el cliente con NIT ${row.clientNit} no existe`);
      }

      const tariff = await this.tariffsService.findTariff(row.origin, row.destination, signal);
      if (!tariff) {
        batch.reject(row.row, `Fila ${row.row}: no existe tarifa para la ruta ${row.origin} - ${row.destination}`);
        continue;
      }
      for (const type of [row.vehicleType, row.vehicleTypeSicetac]) {
        if (type && tariff.rates[type] === undefined) {
          batch.reject(
            row.row,
            `Fila ${row.row}: la tarifa ${row.origin} - ${row.destination} no tiene valor para el tipo de vehículo ${type}`,
          );
        }
      }

      const billingType = resolveBillingVehicleType(row.vehicleType, row.vehicleTypeSicetac);
      if (!(await this.tariffsService.findOtherCosts(billingType, signal))) {
        batch.reject(row.row, `Fila ${row.row}: no existen otros costos para el tipo de vehículo ${billingType}`);
      }
    }
  }

  // ── Bundle level ────────────────────────────────────────────────

  private groupByPlate(rows: readonly ParsedRow[], region: string, compactDate: string, batch: BatchContext): void {
    for (const row of rows) {
      const owner = batch.orderOwners.get(row.orderConsecutive);
      if (owner !== undefined && owner !== row.plate) {
        batch.reject(
          row.row,
          `Fila ${row.row}: el consecutivo de orden ${row.orderConsecutive} ya está asignado a la placa ${owner}`,
        );
        continue;
      }
      batch.orderOwners.set(row.orderConsecutive, row.plate);

      const group = batch.groups.get(row.plate);
      if (!group) {
        batch.groups.set(row.plate, {
          plate: row.plate,
          vehicleConsecutive: buildVehicleConsecutive(region, compactDate, row.plate),
          rows: [row],
        });
        continue;
      }

      const first = group.rows[0];
      const mismatched = (
        [
          ['VEHICLE_TYPE', first.vehicleType, row.vehicleType],
          ['VEHICLE_TYPE_SICETAC', first.vehicleTypeSicetac ?? '', row.vehicleTypeSicetac ?? ''],
          ['ORIGIN', first.origin, row.origin],
          ['DESTINATION', first.destination, row.destination],
        ] as const
      ).filter(([, expected, actual]) => expected !== actual);

      if (mismatched.length > 0) {
        const fields = mismatched.map(([field]) => field).join(', ');
        batch.reject(
          row.row,
          `Fila ${row.row}: la placa ${row.plate} tiene valores distintos en ${fields} respecto a la fila ${first.row}`,
        );
        continue;
      }
      group.rows.push(row);
    }
  }

  private async checkStore(batch: BatchContext, region: string, compactDate: string, ctx: OperationContext): Promise<void> {
    const seen = new Set<string>();
    for (const group of batch.groups.values()) {
      if (await this.bundleStore.exists(group.vehicleConsecutive, ctx)) {
        batch.reject(
          group.rows[0].row,
          `Fila ${group.rows[0].row}: el vehículo ${group.vehicleConsecutive} ya fue cargado y sigue activo`,
        );
      }

      for (const row of group.rows) {
        const integra = buildIntegraConsecutive(region, compactDate, row.orderConsecutive);
        if (seen.has(integra)) {
          continue;
        }
        seen.add(integra);
        const active = await this.bundleStore.findLinesByIntegraConsecutive(integra, ctx);
        if (active.length > 0) {
          batch.reject(row.row, `Fila ${row.row}: el consecutivo integra ${integra} ya existe en un vehículo activo`);
        }
      }
    }
  }

  private async stageGroup(
    group: PlateGroup,
    region: string,
    compactDate: string,
    actor: DispatchUser,
    at: string,
    batch: BatchContext,
    signal?: AbortSignal,
  ): Promise<{ bundle: Bundle; lines: DispatchLine[] } | undefined> {
    const first = group.rows[0];
    const lines: DispatchLine[] = group.rows.map(row => ({
      lineId: uuidv4(),
      vehicleConsecutive: group.vehicleConsecutive,
      integraConsecutive: buildIntegraConsecutive(region, compactDate, row.orderConsecutive),
      orderConsecutive: row.orderConsecutive,
      clientNit: row.clientNit,
      realDestination: row.realDestination,
      loadLocation: row.loadLocation,
      loadAddress: row.loadAddress,
      unloadLocation: row.unloadLocation,
      unloadAddress: row.unloadAddress,
      observations: row.observations,
      trackingDocument: row.trackingDocument,
      cajas: row.cajas,
      kilos: row.kilos,
      kilosSicetac: row.kilosSicetac,
      declaredValue: row.declaredValue,
      insurance: row.insurance,
      tripType: row.tripType,
      requestedFreight: row.requestedFreight,
      realFreight: row.realFreight,
      detour: row.detour,
      loadUnload: row.loadUnload,
      loadUnloadKabi: row.loadUnloadKabi,
      extraPoint: row.extraPoint,
      totalPoints: row.totalPoints,
      createdBy: actor.username,
      createdAt: at,
    }));

    const shape = {
      origin: first.origin,
      destination: first.destination,
      vehicleType: first.vehicleType,
      vehicleTypeSicetac: first.vehicleTypeSicetac,
    };

    try {
      const { classification, totals } = await this.pricing.price(shape, lines, {}, signal);
      const bundle: Bundle = {
        vehicleConsecutive: group.vehicleConsecutive,
        region,
        ...shape,
        vehiclePlate: group.plate,
        state: classification.state,
        totals,
        ...this.statusWorkflow.authorizationStamp(classification.state, at),
        version: 1,
        createdBy: actor.username,
        createdAt: at,
        updatedAt: at,
      };
      return { bundle, lines };
    } catch (error: unknown) {
      const payload = dispatchPayloadOf(error);
      if (!payload || payload.kind !== DispatchErrorKind.Validation) {
        throw error;
      }
      batch.reject(first.row, `Fila ${first.row}: ${payload.message}`);
      return undefined;
    }
  }

  private rejectIfErrors(batch: BatchContext, region: string): void {
    if (!batch.hasErrors) {
      return;
    }
    const errors = [...batch.errors].sort((a, b) => a.row - b.row);
    throw validationError({
      code: DispatchErrorCode.BatchRejected,
      message: `El cargue fue rechazado: ${errors.length} error(es) en el archivo`,
      context: { errors },
      region,
    });
  }
}
