import * as XLSX from 'xlsx';
import { DispatchErrorCode, DispatchErrorKind } from '@fletes/shared';
import { DispatchWorkflowService } from '../../../src/pedidos/dispatch-workflow.service';
import { ExportService } from '../../../src/pedidos/export.service';
import { IngestService } from '../../../src/pedidos/ingest.service';
import {
  DispatchHarness,
  USERS,
  createDispatchHarness,
  ctxFor,
  integraId,
  makeRow,
  rejectionOf,
  vehicleId,
} from '../../support/dispatch-fixtures';

describe('ExportService', () => {
  let harness: DispatchHarness;
  let service: ExportService;
  const analyst = ctxFor(USERS.analyst);
  const exportedId = vehicleId('ABC123');

  const seed = async () => {
    const dispatcher = ctxFor(USERS.dispatcher);
    await harness.module.get(IngestService).ingest(
      [
        makeRow({ REQUESTED_FREIGHT: 400_000, LOAD_UNLOAD: 50_000 }),
        makeRow({ REQUESTED_FREIGHT: 100_000, LOAD_UNLOAD: 0, TRACKING_DOCUMENT: 'RM-7' }),
        makeRow({
          ORDER_CONSECUTIVE: '102',
          NIT_CLIENT: '900402080',
          REAL_DESTINATION: 'Envigado',
          REQUESTED_FREIGHT: 500_000,
          LOAD_UNLOAD: 50_000,
          TRACKING_DOCUMENT: 'RM-2',
        }),
        makeRow({ VEHICLE_PLATE: 'XYZ789', ORDER_CONSECUTIVE: '201' }),
      ],
      dispatcher,
    );
    await harness.module.get(DispatchWorkflowService).confirmPreauthorized(exportedId, undefined, dispatcher);
  };

  beforeEach(async () => {
    harness = await createDispatchHarness();
    service = harness.module.get(ExportService);
  });

  it('should export one row per authorized line with bundle amounts on the first', async () => {
    await seed();

    const rows = await service.exportRows(analyst);

    expect(rows).toHaveLength(3);
    // 1,000,000 / 0.7 rounded up to 50; two points floor the extra point at 70,000
    expect(rows[0]).toEqual({
      'Tipo de viaje': 'BULK',
      'Linea de negocio': 'MASIVO',
      Estado: 'PENDIENTE',
      'Fecha pedido': '2024-03-01',
      Cliente: 'Distribuidora Andina',
      'Nit cliente': '800100200',
      Origen: 'BOGOTA',
      Destino: 'MEDELLIN',
      'Destino real': 'MEDELLIN',
      'Ubicación Cargue': 'BODEGA NORTE',
      'Direccion cargue': 'CALLE 80 # 10-20',
      'Ubicación Descargue': 'CEDI MEDELLIN',
      'Direccion Descargue': 'CARRERA 50 # 30-10',
      Placa: 'ABC123',
      'Tipo de vehiculo': 'TURBO',
      'Consecutivo vehiculo': exportedId,
      'Consecutivo integra': integraId('101'),
      'Documentos transporte': 'RM-1, RM-7',
      Observación: 'FRAGIL',
      'centro costo': 'CC01 BULK OPERACIONES CARGA DA',
      Cajas: 50,
      Kilos: 4000,
      'Vlr. Declar. Mercancia': 5_000_000,
      Toneladas: 12,
      'Flete unidad': 1_100_000,
      'Valor unitario': 1_428_600,
      'Punto adicional': 70_000,
      'Cargue descargue': 100_000,
      Desvio: 0,
      SEGURO: 6000,
    });
  });

  it('should list tracking documents once per consecutive and flag the flat insurance client', async () => {
    await seed();

    const [, second, third] = await service.exportRows(analyst);

    expect(second).toMatchObject({
      'Consecutivo integra': integraId('101'),
      'Documentos transporte': '',
      Observación: 'FRAGIL',
      Toneladas: 0,
      'Flete unidad': 0,
      SEGURO: 0,
    });
    expect(third).toMatchObject({
      'Consecutivo integra': integraId('102'),
      Cliente: 'Comercializadora Norte',
      'Destino real': 'ENVIGADO',
      'Documentos transporte': 'RM-2',
      Observación: 'DN RM-2',
      'centro costo': 'CC01 BULK OPERACIONES CARGA CN',
      'Valor unitario': 0,
    });
  });

  it('should skip numbered lines and sum their insurance otherwise', async () => {
    await seed();
    const flatLine = harness.store.allLines(exportedId).find(line => line.clientNit === '900402080');
    if (flatLine) {
      harness.store.lines.get(exportedId)?.set(flatLine.lineId, { ...flatLine, pedidoNumber: 'P-1' });
    }

    const rows = await service.exportRows(analyst);

    expect(rows.map(row => row['Consecutivo integra'])).toEqual([integraId('101'), integraId('101')]);
    expect(rows[0].SEGURO).toBe(30_000);
  });

  it('should only be available to analysts and admins', async () => {
    const error = await rejectionOf(service.exportRows(ctxFor(USERS.dispatcher)));

    expect(error.kind).toBe(DispatchErrorKind.Authorization);
    expect(error.message).toBe('[CELTA] El rol DISPATCHER no puede exportar vehículos autorizados');
  });

  it('should write the rows to a dated workbook', async () => {
    await seed();

    const workbook = await service.exportWorkbook(analyst);

    expect(workbook.filename).toBe('pedidos_autorizados_20240301.xlsx');
    expect(workbook.rows).toBe(3);
    const parsed = XLSX.read(workbook.buffer, { type: 'buffer' });
    expect(parsed.SheetNames).toEqual(['plantilla']);
    const sheetRows = XLSX.utils.sheet_to_json<Record<string, unknown>>(parsed.Sheets.plantilla);
    expect(sheetRows.map(row => row['Consecutivo integra'])).toEqual([
      integraId('101'),
      integraId('101'),
      integraId('102'),
    ]);
  });

  it('should report when nothing is authorized', async () => {
    const error = await rejectionOf(service.exportWorkbook(analyst));

    expect(error.kind).toBe(DispatchErrorKind.NotFound);
    expect(error.code).toBe(DispatchErrorCode.BundleNotFound);
    expect(error.message).toBe('[CELTA] No hay pedidos AUTORIZADOS para exportar');
  });
});
