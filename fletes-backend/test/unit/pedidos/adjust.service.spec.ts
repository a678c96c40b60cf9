import { BundleState, DispatchErrorCode, DispatchErrorKind, DispatchEvent } from '@fletes/shared';
import { AdjustService, mergeOverrides } from '../../../src/pedidos/adjust.service';
import { DispatchWorkflowService } from '../../../src/pedidos/dispatch-workflow.service';
import { IngestService } from '../../../src/pedidos/ingest.service';
import {
  DispatchHarness,
  FIXED_NOW,
  USERS,
  createDispatchHarness,
  ctxFor,
  makeRow,
  rejectionOf,
  vehicleId,
} from '../../support/dispatch-fixtures';

describe('AdjustService', () => {
  let harness: DispatchHarness;
  let service: AdjustService;
  const ctx = ctxFor(USERS.dispatcher);
  const id = vehicleId('ABC123');

  beforeEach(async () => {
    harness = await createDispatchHarness();
    service = harness.module.get(AdjustService);
    await harness.module.get(IngestService).ingest([makeRow()], ctx);
  });

  describe('mergeOverrides', () => {
    it('should replace only the amounts given', () => {
      expect(mergeOverrides({ freight: 1, detour: 5 }, { detour: 2 })).toEqual({ freight: 1, detour: 2 });
    });

    it('should keep the stored overrides when none are given', () => {
      expect(mergeOverrides({ freight: 1 }, undefined)).toEqual({ freight: 1 });
      expect(mergeOverrides(undefined, {})).toBeUndefined();
    });
  });

  it('should reclassify with the new amounts and stamp the adjustment', async () => {
    const listing = await service.adjust(id, { overrides: { freight: 1_050_000 }, observations: 'flete acordado' }, ctx);

    expect(listing.state).toBe(BundleState.RequiresCoordinator);
    const bundle = harness.store.bundles.get(id);
    expect(bundle).toMatchObject({
      state: BundleState.RequiresCoordinator,
      authorizedBy: 'NA',
      adjustedBy: 'DESPACHO1',
      adjustedAt: FIXED_NOW,
      adjustmentObservations: 'flete acordado',
      version: 2,
    });
    expect(bundle?.costOverrides).toEqual({ freight: 1_050_000 });
    expect(bundle?.totals.totalVehicleFreight).toBe(1_150_000);
    expect(bundle?.totals.percentOverTheoretical).toBe(4.55);

    const trail = await harness.store.getAuditTrail(id);
    expect(trail[1]).toMatchObject({
      event: DispatchEvent.Adjust,
      previousState: BundleState.Preauthorized,
      newState: BundleState.RequiresCoordinator,
    });
  });

  it('should keep earlier overrides across adjustments', async () => {
    await service.adjust(id, { overrides: { freight: 1_050_000 } }, ctx);
    await service.adjust(id, { overrides: { detour: 20_000 } }, ctx);

    const totals = harness.store.bundles.get(id)?.totals;
    expect(totals?.totalRequestedFreight).toBe(1_050_000);
    expect(totals?.totalDetourVehicle).toBe(20_000);
    expect(totals?.totalVehicleFreight).toBe(1_170_000);
    expect(totals?.percentOverTheoretical).toBe(6.36);
  });

  it('should send an authorized bundle back through approval', async () => {
    await harness.module.get(DispatchWorkflowService).confirmPreauthorized(id, undefined, ctx);

    const listing = await service.adjust(id, { overrides: { freight: 1_500_000 } }, ctx);

    expect(listing.state).toBe(BundleState.RequiresControl);
    expect(listing.lines[0]).toMatchObject({ authorizedBy: 'NA', authorizationTs: 'NA' });
  });

  it('should price with a corrected SICETAC type and kilos', async () => {
    await service.adjust(id, { vehicleTypeSicetac: 'nies', totalKilosSicetac: 3000 }, ctx);

    const bundle = harness.store.bundles.get(id);
    expect(bundle?.vehicleTypeSicetac).toBe('NIES');
    expect(bundle?.totalKilosSicetacOverride).toBe(3000);
    expect(bundle?.totals).toMatchObject({
      billingVehicleType: 'NIES',
      totalKilosVehicleSicetac: 3000,
      theoreticalCostVehicle: 1_520_000,
    });
    expect(bundle?.state).toBe(BundleState.Preauthorized);
  });

  it('should add a warehouse line when the destination is a special warehouse city', async () => {
    const listing = await service.adjust(id, { newDestination: 'Girardota' }, ctx);

    expect(listing.lines).toHaveLength(2);
    const warehouse = listing.lines.find(line => line.realDestination === 'GIRARDOTA');
    expect(warehouse).toMatchObject({
      destination: 'GIRARDOTA',
      unloadLocation: 'FKC_INTEGRA_GIRARDOTA',
      observations: 'fragil | SE ENVIA A BODEGA',
      cajas: 0,
      kilos: 0,
      requestedFreight: 0,
    });
    // Route pays no load/unload; two points add one extra point
    expect(harness.store.bundles.get(id)?.totals).toMatchObject({
      totalPointsVehicle: 2,
      theoreticalCostVehicle: 1_270_000,
      totalVehicleFreight: 1_100_000,
    });

    await service.adjust(id, { newDestination: 'GIRARDOTA' }, ctx);
    expect(harness.store.allLines(id)).toHaveLength(2);
  });

  it('should take the destination from one of the real destinations', async () => {
    const error = await rejectionOf(service.adjust(id, { destinationFromReal: 'Cali' }, ctx));
    expect(error.code).toBe(DispatchErrorCode.UnknownRealDestination);
    expect(error.message).toBe(`[CELTA] Cali no es un destino real del vehículo ${id}`);

    const listing = await service.adjust(id, { destinationFromReal: 'medellín' }, ctx);
    expect(listing.lines[0].destination).toBe('MEDELLIN');
  });

  it('should leave the bundle untouched when the new route has no tariff', async () => {
    const error = await rejectionOf(service.adjust(id, { newDestination: 'Pasto' }, ctx));

    expect(error.kind).toBe(DispatchErrorKind.Validation);
    expect(error.code).toBe(DispatchErrorCode.TariffMissing);
    expect(error.message).toBe('No existe tarifa para la ruta BOGOTA - PASTO');
    expect(harness.store.bundles.get(id)).toMatchObject({ destination: 'MEDELLIN', version: 1 });
  });

  it('should reject conflicting or empty destinations', async () => {
    const conflicting = await rejectionOf(
      service.adjust(id, { newDestination: 'CALI', destinationFromReal: 'MEDELLIN' }, ctx),
    );
    expect(conflicting.code).toBe(DispatchErrorCode.ConflictingDestination);

    const empty = await rejectionOf(service.adjust(id, { newDestination: '  ' }, ctx));
    expect(empty.code).toBe(DispatchErrorCode.EmptyDestination);
  });

  it('should not adjust a bundle with completed lines', async () => {
    const [line] = harness.store.allLines(id);
    harness.store.lines.get(id)?.set(line.lineId, { ...line, pedidoNumber: 'P-9' });

    const error = await rejectionOf(service.adjust(id, { overrides: { freight: 1 } }, ctx));

    expect(error.kind).toBe(DispatchErrorKind.State);
    expect(error.code).toBe(DispatchErrorCode.LineCompleted);
  });
});
