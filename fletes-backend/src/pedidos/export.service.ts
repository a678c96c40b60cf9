import { Injectable, Logger } from '@nestjs/common';
import * as XLSX from 'xlsx';
import {
  BundleSnapshot,
  BundleState,
  Client,
  DispatchCapability,
  DispatchErrorCode,
  DispatchLine,
  EXPORT_SHEET_NAME,
  ExportRow,
  ceilToMultiple,
  formatCalendarDate,
  round2,
  round3,
} from '@fletes/shared';
import { AccessPolicyService } from '../access/access-policy.service';
import { BundleStore } from '../bundles/bundle-store';
import { ClientsService } from '../catalog/clients.service';
import { ConfigService } from '../config/config.service';
import { Clock } from '../common/clock';
import { notFoundError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';

/** Client whose rows carry a flat insurance and a "DN" observation */
export const FLAT_INSURANCE_CLIENT_NIT = '900402080';
export const FLAT_INSURANCE_AMOUNT = 6000;
export const EXTRA_POINT_FLOOR = 70000;
/** Unit value is freight grossed up by this margin, rounded up to UNIT_VALUE_STEP */
export const UNIT_VALUE_MARGIN = 0.7;
export const UNIT_VALUE_STEP = 50;

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface ExportWorkbook {
  filename: string;
  buffer: Buffer;
  rows: number;
}

/** Tracking documents per integra consecutive, unique and in first-seen order */
export function concatTrackingDocuments(lines: readonly DispatchLine[]): Map<string, string> {
  const byConsecutive = new Map<string, string[]>();
  for (const line of lines) {
    const docs = byConsecutive.get(line.integraConsecutive) ?? [];
    const doc = line.trackingDocument.trim();
    if (doc && !docs.includes(doc)) {
      docs.push(doc);
    }
    byConsecutive.set(line.integraConsecutive, docs);
  }
  return new Map([...byConsecutive].map(([ci, docs]) => [ci, docs.join(', ')]));
}

/**
 * Billing export of authorized lines. One row per line; bundle amounts go on
 * the first row of each bundle and are zero on the rest.
 */
@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);

  constructor(
    private readonly bundleStore: BundleStore,
    private readonly clientsService: ClientsService,
    private readonly accessPolicy: AccessPolicyService,
    private readonly configService: ConfigService,
    private readonly clock: Clock,
  ) {}

  async exportRows(ctx: OperationContext): Promise<ExportRow[]> {
    this.accessPolicy.assert(ctx.actor, DispatchCapability.ExportAuthorized);

    const snapshots = await this.bundleStore.listBundles(
      { states: [BundleState.Authorized], regions: this.accessPolicy.operableRegions(ctx.actor) },
      ctx,
    );
    const exportable = snapshots
      .map(({ bundle, lines }) => ({
        bundle,
        lines: lines
          .filter(line => !line.pedidoNumber)
          .sort((a, b) => a.integraConsecutive.localeCompare(b.integraConsecutive)),
      }))
      .filter(s => s.lines.length > 0)
      .sort((a, b) => a.bundle.vehicleConsecutive.localeCompare(b.bundle.vehicleConsecutive));

    const clients = await this.clientsService.findMany(
      exportable.flatMap(s => s.lines.map(l => l.clientNit)),
      ctx.signal,
    );
    const tracking = concatTrackingDocuments(exportable.flatMap(s => s.lines));
    const seenConsecutives = new Set<string>();

    const rows = exportable.flatMap(snapshot => this.bundleRows(snapshot, clients, tracking, seenConsecutives));
    this.logger.log(`${ctx.actor.username} exported ${rows.length} rows from ${exportable.length} bundles`);
    return rows;
  }

  async exportWorkbook(ctx: OperationContext): Promise<ExportWorkbook> {
    const rows = await this.exportRows(ctx);
    if (rows.length === 0) {
      throw notFoundError({
        code: DispatchErrorCode.BundleNotFound,
        message: 'No hay pedidos AUTORIZADOS para exportar',
        region: ctx.actor.region,
      });
    }

    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), EXPORT_SHEET_NAME);
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

    const stamp = formatCalendarDate(this.clock.now(), this.configService.dispatchTimeZone).replace(/-/g, '');
    return { filename: `pedidos_autorizados_${stamp}.xlsx`, buffer, rows: rows.length };
  }

  private bundleRows(
    snapshot: BundleSnapshot,
    clients: Map<string, Client>,
    tracking: Map<string, string>,
    seenConsecutives: Set<string>,
  ): ExportRow[] {
    const { bundle, lines } = snapshot;
    const totals = bundle.totals;
    const flatInsurance = lines.some(line => line.clientNit === FLAT_INSURANCE_CLIENT_NIT);
    const extraPointCount = Math.max(0, totals.totalPointsVehicle - 1);

    const bundleAmounts = {
      Toneladas: round3(totals.totalKilosVehicleSicetac / 1000),
      'Flete unidad': round2(
        totals.totalRequestedFreight + totals.totalDetourVehicle + totals.totalExtraPoint + totals.totalLoadUnload,
      ),
      'Valor unitario': ceilToMultiple(totals.totalRequestedFreight / UNIT_VALUE_MARGIN, UNIT_VALUE_STEP),
      'Punto adicional': Math.max(totals.totalExtraPoint, EXTRA_POINT_FLOOR * extraPointCount),
      'Cargue descargue': Math.max(totals.totalLoadUnload, totals.totalLoadUnloadKabi),
      Desvio: totals.totalDetourVehicle,
      SEGURO: flatInsurance ? FLAT_INSURANCE_AMOUNT : round2(lines.reduce((acc, l) => acc + l.insurance, 0)),
    };
    const carryOver: typeof bundleAmounts = {
      Toneladas: 0,
      'Flete unidad': 0,
      'Valor unitario': 0,
      'Punto adicional': 0,
      'Cargue descargue': 0,
      Desvio: 0,
      SEGURO: 0,
    };

    return lines.map((line, index) => {
      const client = clients.get(line.clientNit);
      const documents = tracking.get(line.integraConsecutive) ?? '';
      const firstOfConsecutive = !seenConsecutives.has(line.integraConsecutive);
      seenConsecutives.add(line.integraConsecutive);

      return {
        'Tipo de viaje': line.tripType,
        'Linea de negocio': 'MASIVO',
        Estado: 'PENDIENTE',
        'Fecha pedido': formatCalendarDate(new Date(line.createdAt), this.configService.dispatchTimeZone),
        Cliente: client?.name ?? '',
        'Nit cliente': line.clientNit,
        Origen: bundle.origin,
        Destino: bundle.destination,
        'Destino real': line.realDestination,
        'Ubicación Cargue': line.loadLocation,
        'Direccion cargue': line.loadAddress,
        'Ubicación Descargue': line.unloadLocation,
        'Direccion Descargue': line.unloadAddress,
        Placa: bundle.vehiclePlate,
        'Tipo de vehiculo': totals.billingVehicleType,
        'Consecutivo vehiculo': bundle.vehicleConsecutive,
        'Consecutivo integra': line.integraConsecutive,
        'Documentos transporte': firstOfConsecutive ? documents : '',
        Observación:
          line.clientNit === FLAT_INSURANCE_CLIENT_NIT ? `DN ${documents}` : line.observations.toUpperCase(),
        'centro costo': `${totals.costCenterCode} ${line.tripType} OPERACIONES CARGA ${client?.costCenterCode ?? ''}`.trim(),
        Cajas: line.cajas,
        Kilos: line.kilos,
        'Vlr. Declar. Mercancia': line.declaredValue,
        ...(index === 0 ? bundleAmounts : carryOver),
      };
    });
  }
}
