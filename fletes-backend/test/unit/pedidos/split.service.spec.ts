import { BundleState, DispatchErrorCode, DispatchEvent, SplitBundleDto } from '@fletes/shared';
import { IngestService } from '../../../src/pedidos/ingest.service';
import { SplitService, peelCajas, splitLineKilos } from '../../../src/pedidos/split.service';
import {
  DispatchHarness,
  FIXED_NOW,
  USERS,
  createDispatchHarness,
  ctxFor,
  integraId,
  makeRow,
  rejectionOf,
  vehicleId,
} from '../../support/dispatch-fixtures';

describe('SplitService', () => {
  let harness: DispatchHarness;
  let service: SplitService;
  const ctx = ctxFor(USERS.dispatcher);
  const heavyId = vehicleId('ABC123');
  const multiId = vehicleId('DEF456');

  const kiloSplit = (kilos: number): SplitBundleDto => ({
    destination: 'Medellin',
    groupB: { kiloSplit: { integraConsecutive: integraId('101'), kilos } },
  });

  beforeEach(async () => {
    harness = await createDispatchHarness();
    service = harness.module.get(SplitService);
    const consignee = (order: string, realDestination: string) =>
      makeRow({
        VEHICLE_PLATE: 'DEF456',
        ORDER_CONSECUTIVE: order,
        REAL_DESTINATION: realDestination,
        NUM_KILOS: 1000,
        NUM_CAJAS: 10,
        REQUESTED_FREIGHT: 400_000,
        LOAD_UNLOAD: 0,
      });

    await harness.module.get(IngestService).ingest(
      [
        makeRow({ VEHICLE_TYPE: 'SENCILLO', NUM_KILOS: 9800, NUM_CAJAS: 50, REQUESTED_FREIGHT: 2_000_000 }),
        consignee('301', 'Medellin'),
        consignee('302', 'Envigado'),
        consignee('303', 'Itagui'),
      ],
      ctx,
    );
  });

  describe('splitLineKilos', () => {
    it('should move quantities and money in proportion to the kilos', () => {
      const { peeled, remainder } = splitLineKilos(
        {
          cajas: 50,
          kilos: 9800,
          kilosSicetac: 9800,
          requestedFreight: 2_000_000,
          realFreight: 900_000,
          declaredValue: 5_000_000,
          insurance: 15_000,
        },
        3920,
      );

      expect(peeled).toEqual({
        cajas: 20,
        kilos: 3920,
        kilosSicetac: 3920,
        requestedFreight: 800_000,
        realFreight: 360_000,
        declaredValue: 2_000_000,
        insurance: 6000,
      });
      expect(remainder).toEqual({
        cajas: 30,
        kilos: 5880,
        kilosSicetac: 5880,
        requestedFreight: 1_200_000,
        realFreight: 540_000,
        declaredValue: 3_000_000,
        insurance: 9000,
      });
    });

    it('should never peel zero boxes from a line that has some', () => {
      expect(peelCajas(3, 0.1)).toBe(1);
      expect(peelCajas(0, 0.5)).toBe(0);
      expect(peelCajas(50, 0.4)).toBe(20);
    });
  });

  describe('kilo split', () => {
    it('should bill each part by its own SICETAC kilos', async () => {
      const [retained, child] = await service.split(heavyId, kiloSplit(3920), ctx);
      const childId = `${heavyId}B`;

      expect(retained.vehicleConsecutive).toBe(heavyId);
      expect(child.vehicleConsecutive).toBe(childId);

      expect(child.lines).toHaveLength(1);
      expect(child.lines[0]).toMatchObject({
        integraConsecutive: `${integraId('101')}B`,
        orderConsecutive: '101B',
        destination: 'MEDELLIN',
        kilosSicetac: 3920,
        cajas: 20,
        requestedFreight: 800_000,
        loadUnload: 0,
        billingVehicleType: 'TURBO',
        state: BundleState.Preauthorized,
      });
      expect(retained.lines[0]).toMatchObject({
        integraConsecutive: integraId('101'),
        kilosSicetac: 5880,
        cajas: 30,
        requestedFreight: 1_200_000,
        loadUnload: 100_000,
        billingVehicleType: 'NIES',
        vehicleTypeSicetac: 'NIES',
      });

      // NIES 1,400,000 + 120,000 against 1,200,000 + 100,000 requested
      expect(harness.store.bundles.get(heavyId)).toMatchObject({
        state: BundleState.Preauthorized,
        splitBy: 'DESPACHO1',
        splitAt: FIXED_NOW,
        version: 2,
      });
      expect(harness.store.bundles.get(childId)).toMatchObject({ createdBy: 'DESPACHO1', version: 1 });
    });

    it('should conserve kilos and freight across the parts', async () => {
      await service.split(heavyId, kiloSplit(3920), ctx);

      const parts = [...harness.store.allLines(heavyId), ...harness.store.allLines(`${heavyId}B`)];
      expect(parts.reduce((acc, l) => acc + l.kilos, 0)).toBe(9800);
      expect(parts.reduce((acc, l) => acc + l.requestedFreight, 0)).toBe(2_000_000);
      expect(parts.reduce((acc, l) => acc + l.cajas, 0)).toBe(50);
    });

    it('should record the split on the source and the new bundle', async () => {
      await service.split(heavyId, kiloSplit(3920), ctx);

      const [, sourceEntry] = await harness.store.getAuditTrail(heavyId);
      const [childEntry] = await harness.store.getAuditTrail(`${heavyId}B`);
      expect(sourceEntry).toMatchObject({
        event: DispatchEvent.Split,
        previousState: BundleState.RequiresControl,
        relatedBundles: [`${heavyId}B`],
      });
      expect(childEntry).toMatchObject({
        event: DispatchEvent.Split,
        notes: `Dividido de ${heavyId}`,
        automaticChange: true,
      });
    });

    it('should reject kilos outside the line', async () => {
      const error = await rejectionOf(service.split(heavyId, kiloSplit(9800), ctx));

      expect(error.code).toBe(DispatchErrorCode.SplitKilos);
      expect(harness.store.bundles.has(`${heavyId}B`)).toBe(false);
    });

    it('should not reuse an existing child id', async () => {
      await service.split(heavyId, kiloSplit(3920), ctx);

      const error = await rejectionOf(service.split(heavyId, kiloSplit(1000), ctx));

      expect(error.code).toBe(DispatchErrorCode.BundleAlreadyExists);
    });
  });

  describe('consignee split', () => {
    it('should move consignees to B and C by consecutive or city', async () => {
      const listings = await service.split(
        multiId,
        {
          destination: 'Medellin',
          groupB: { consignees: [integraId('302')] },
          groupC: { consignees: ['itagüí'] },
        },
        ctx,
      );

      expect(listings.map(l => l.vehicleConsecutive)).toEqual([multiId, `${multiId}B`, `${multiId}C`]);
      expect(listings[0].lines.map(l => l.integraConsecutive)).toEqual([integraId('301')]);
      expect(listings[1].lines.map(l => l.integraConsecutive)).toEqual([`${integraId('302')}B`]);
      expect(listings[2].lines.map(l => l.integraConsecutive)).toEqual([`${integraId('303')}C`]);
      expect(listings[1].lines[0].billingVehicleType).toBe('NHR');

      expect(harness.store.allLines(multiId)).toHaveLength(1);
      expect(harness.store.allLines(`${multiId}C`)[0].vehicleConsecutive).toBe(`${multiId}C`);
    });

    it('should not leave the source without lines', async () => {
      const error = await rejectionOf(
        service.split(multiId, { destination: 'Medellin', groupB: { consignees: ['Medellin', 'Envigado', 'Itagui'] } }, ctx),
      );

      expect(error.code).toBe(DispatchErrorCode.SplitEmptyGroup);
      expect(harness.store.allLines(multiId)).toHaveLength(3);
    });

    it('should reject consignees that are not on the bundle', async () => {
      const error = await rejectionOf(
        service.split(multiId, { destination: 'Medellin', groupB: { consignees: ['Cali'] } }, ctx),
      );

      expect(error.code).toBe(DispatchErrorCode.LineNotFound);
    });
  });

  describe('group validation', () => {
    it.each<[SplitBundleDto, DispatchErrorCode]>([
      [{ destination: 'Medellin' }, DispatchErrorCode.SplitInvalidGroups],
      [{ destination: 'Medellin', groupC: { consignees: ['Itagui'] } }, DispatchErrorCode.SplitInvalidGroups],
      [{ destination: 'Medellin', groupB: { consignees: [] } }, DispatchErrorCode.SplitEmptyGroup],
      [{ destination: ' ', groupB: { consignees: ['Itagui'] } }, DispatchErrorCode.EmptyDestination],
    ])('should reject %j', async (dto, code) => {
      const error = await rejectionOf(service.split(multiId, dto, ctx));

      expect(error.code).toBe(code);
    });

    it('should ask for a line id when a consecutive has several lines', async () => {
      await harness.module.get(IngestService).ingest(
        [
          makeRow({ VEHICLE_PLATE: 'GHI789', ORDER_CONSECUTIVE: '401', NUM_KILOS: 3000 }),
          makeRow({ VEHICLE_PLATE: 'GHI789', ORDER_CONSECUTIVE: '401', NUM_KILOS: 2000 }),
        ],
        ctx,
      );

      const error = await rejectionOf(
        service.split(
          vehicleId('GHI789'),
          { destination: 'Medellin', groupB: { kiloSplit: { integraConsecutive: integraId('401'), kilos: 500 } } },
          ctx,
        ),
      );

      expect(error.code).toBe(DispatchErrorCode.AmbiguousLine);
      expect(error.context.lineIds).toHaveLength(2);
    });
  });
});
