import { BundleState, DispatchErrorCode, DispatchErrorKind, DispatchEvent, MergeBundlesDto } from '@fletes/shared';
import { DispatchWorkflowService } from '../../../src/pedidos/dispatch-workflow.service';
import { IngestService } from '../../../src/pedidos/ingest.service';
import { MergeService, dominantIntegraConsecutive } from '../../../src/pedidos/merge.service';
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

describe('MergeService', () => {
  let harness: DispatchHarness;
  let service: MergeService;
  const ctx = ctxFor(USERS.dispatcher);
  const targetId = vehicleId('ABC123');
  const sourceId = vehicleId('XYZ789');

  const mergeDto = (bundleIds: string[]): MergeBundlesDto => ({
    bundleIds,
    destination: 'medellin',
    billingVehicleType: 'nies',
    overrides: { freight: 1_300_000, loadUnload: 100_000, extraPoint: 70_000, detour: 0 },
    observations: 'misma ruta',
  });

  beforeEach(async () => {
    harness = await createDispatchHarness();
    service = harness.module.get(MergeService);
    await harness.module.get(IngestService).ingest(
      [
        makeRow(),
        makeRow({
          VEHICLE_PLATE: 'XYZ789',
          ORDER_CONSECUTIVE: '201',
          REAL_DESTINATION: 'Envigado',
          NUM_KILOS: 1500,
          REQUESTED_FREIGHT: 400_000,
          LOAD_UNLOAD: 0,
        }),
      ],
      ctx,
    );
  });

  describe('dominantIntegraConsecutive', () => {
    it('should pick the most frequent consecutive', () => {
      const lines = [{ integraConsecutive: 'C-1' }, { integraConsecutive: 'C-2' }, { integraConsecutive: 'C-2' }];
      expect(dominantIntegraConsecutive(lines)).toBe('C-2');
    });

    it('should break ties with the smallest consecutive', () => {
      expect(dominantIntegraConsecutive([{ integraConsecutive: 'C-9' }, { integraConsecutive: 'C-3' }])).toBe('C-3');
      expect(dominantIntegraConsecutive([])).toBeUndefined();
    });
  });

  it('should fold the source bundle into the target and reclassify', async () => {
    const listing = await service.merge(mergeDto([targetId, sourceId]), ctx);

    expect(listing.vehicleConsecutive).toBe(targetId);
    expect(listing.state).toBe(BundleState.Preauthorized);
    expect(listing.lines).toHaveLength(2);
    expect(listing.lines.every(line => line.integraConsecutive === integraId('101'))).toBe(true);
    expect(listing.lines.every(line => line.destination === 'MEDELLIN')).toBe(true);

    const merged = harness.store.bundles.get(targetId);
    expect(merged).toMatchObject({
      vehicleTypeSicetac: 'NIES',
      mergedBy: 'DESPACHO1',
      mergeObservations: 'misma ruta',
      costOverrides: { freight: 1_300_000, loadUnload: 100_000, extraPoint: 70_000, detour: 0 },
      version: 2,
    });
    // NIES: 1,400,000 base, one extra point at 80,000 and 120,000 load/unload
    expect(merged?.totals).toMatchObject({
      billingVehicleType: 'NIES',
      totalKilosVehicle: 5500,
      totalPointsVehicle: 2,
      theoreticalCostVehicle: 1_600_000,
      totalVehicleFreight: 1_470_000,
      freightDifference: -130_000,
    });

    expect(harness.store.bundles.has(sourceId)).toBe(false);
    expect(harness.store.allLines(sourceId)).toEqual([]);
    expect(harness.store.allLines(targetId)).toHaveLength(2);
  });

  it('should record the merge on both bundles', async () => {
    await service.merge(mergeDto([targetId, sourceId]), ctx);

    const [, targetEntry] = await harness.store.getAuditTrail(targetId);
    const [, sourceEntry] = await harness.store.getAuditTrail(sourceId);
    expect(targetEntry).toMatchObject({ event: DispatchEvent.Merge, relatedBundles: [sourceId], notes: 'misma ruta' });
    expect(sourceEntry).toMatchObject({
      event: DispatchEvent.Merge,
      previousState: BundleState.Preauthorized,
      relatedBundles: [targetId],
      notes: `Fusionado en ${targetId}`,
    });
  });

  it('should require two distinct bundles', async () => {
    const error = await rejectionOf(service.merge(mergeDto([targetId, ` ${targetId} `]), ctx));

    expect(error.code).toBe(DispatchErrorCode.MergeTooFewBundles);
  });

  it('should only merge bundles of the same region and origin', async () => {
    await harness.module.get(IngestService).ingest(
      [makeRow({ VEHICLE_PLATE: 'MED001', ORDER_CONSECUTIVE: '501' })],
      ctxFor(USERS.operator),
    );

    const error = await rejectionOf(service.merge(mergeDto([targetId, vehicleId('MED001', 'MEDELLIN')]), ctxFor(USERS.admin)));

    expect(error.kind).toBe(DispatchErrorKind.Validation);
    expect(error.code).toBe(DispatchErrorCode.MergeHomogeneity);
    expect(harness.store.bundles.get(targetId)?.version).toBe(1);
  });

  it('should not merge authorized bundles', async () => {
    await harness.module.get(DispatchWorkflowService).confirmPreauthorized(targetId, undefined, ctx);

    const error = await rejectionOf(service.merge(mergeDto([targetId, sourceId]), ctx));

    expect(error.code).toBe(DispatchErrorCode.InvalidState);
    expect(error.message).toBe(`[CELTA] No se puede fusionar el vehículo ${targetId} en estado AUTHORIZED`);
    expect(harness.store.bundles.has(sourceId)).toBe(true);
  });

  it('should fail when a bundle does not exist', async () => {
    const error = await rejectionOf(service.merge(mergeDto([targetId, vehicleId('NOPE00')]), ctx));

    expect(error.kind).toBe(DispatchErrorKind.NotFound);
    expect(error.code).toBe(DispatchErrorCode.BundleNotFound);
  });
});
