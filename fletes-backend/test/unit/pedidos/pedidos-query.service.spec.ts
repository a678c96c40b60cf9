import { BundleState, DispatchErrorCode, DispatchEvent } from '@fletes/shared';
import { DispatchWorkflowService } from '../../../src/pedidos/dispatch-workflow.service';
import { IngestService } from '../../../src/pedidos/ingest.service';
import { PedidosQueryService } from '../../../src/pedidos/pedidos-query.service';
import {
  DispatchHarness,
  USERS,
  createDispatchHarness,
  ctxFor,
  makeRow,
  rejectionOf,
  vehicleId,
} from '../../support/dispatch-fixtures';

describe('PedidosQueryService', () => {
  let harness: DispatchHarness;
  let service: PedidosQueryService;
  const dispatcher = ctxFor(USERS.dispatcher);
  const celtaId = vehicleId('ABC123');
  const controlId = vehicleId('CTL222');
  const medellinId = vehicleId('MED001', 'MEDELLIN');

  beforeEach(async () => {
    harness = await createDispatchHarness();
    service = harness.module.get(PedidosQueryService);
    const ingest = harness.module.get(IngestService);
    await ingest.ingest(
      [makeRow(), makeRow({ VEHICLE_PLATE: 'CTL222', ORDER_CONSECUTIVE: '301', REQUESTED_FREIGHT: 1_500_000 })],
      dispatcher,
    );
    await ingest.ingest([makeRow({ VEHICLE_PLATE: 'MED001', ORDER_CONSECUTIVE: '501' })], ctxFor(USERS.operator));
  });

  describe('listBundles', () => {
    it('should scope region bound roles to their own and paired regions', async () => {
      const celta = await service.listBundles({}, dispatcher);
      const medellin = await service.listBundles({}, ctxFor(USERS.operator));

      expect(celta.map(b => b.vehicleConsecutive)).toEqual([celtaId, controlId]);
      expect(medellin.map(b => b.vehicleConsecutive)).toEqual([medellinId]);
    });

    it('should show every region to approvers', async () => {
      const listings = await service.listBundles({}, ctxFor(USERS.control));

      expect(listings.map(b => b.vehicleConsecutive).sort()).toEqual([celtaId, controlId, medellinId].sort());
    });

    it('should filter by state and region', async () => {
      const control = await service.listBundles({ state: BundleState.RequiresControl }, ctxFor(USERS.admin));
      const medellin = await service.listBundles({ region: 'medellin' }, ctxFor(USERS.admin));

      expect(control.map(b => b.vehicleConsecutive)).toEqual([controlId]);
      expect(medellin.map(b => b.vehicleConsecutive)).toEqual([medellinId]);
    });

    it('should reject a region filter outside the user scope', async () => {
      const error = await rejectionOf(service.listBundles({ region: 'medellin' }, dispatcher));

      expect(error.code).toBe(DispatchErrorCode.RegionNotAllowed);
      expect(error.message).toBe('[CELTA] El usuario DESPACHO1 no puede operar sobre la regional MEDELLIN');
    });
  });

  describe('getBundle', () => {
    it('should project bundle fields onto each line', async () => {
      const listing = await service.getBundle(celtaId, dispatcher);

      expect(listing).toMatchObject({ vehicleConsecutive: celtaId, state: BundleState.Preauthorized, multistate: false });
      expect(listing.lines[0]).toMatchObject({
        vehicleConsecutive: celtaId,
        destination: 'MEDELLIN',
        billingVehicleType: 'TURBO',
        state: BundleState.Preauthorized,
        authorizedBy: 'SYSTEM',
      });
    });

    it('should hide bundles of other regions', async () => {
      const error = await rejectionOf(service.getBundle(celtaId, ctxFor(USERS.operator)));

      expect(error.code).toBe(DispatchErrorCode.RegionNotAllowed);
    });

    it('should report unknown bundles', async () => {
      const error = await rejectionOf(service.getBundle(vehicleId('NOPE00'), dispatcher));

      expect(error.code).toBe(DispatchErrorCode.BundleNotFound);
      expect(error.message).toBe(`[CELTA] El vehículo ${vehicleId('NOPE00')} no existe`);
    });
  });

  describe('getAuditTrail', () => {
    it('should keep the history of deleted bundles', async () => {
      await harness.module.get(DispatchWorkflowService).deleteBundle(celtaId, dispatcher);

      const trail = await service.getAuditTrail(celtaId, dispatcher);

      expect(trail.vehicleConsecutive).toBe(celtaId);
      expect(trail.entries.map(e => e.event)).toEqual([DispatchEvent.Ingest, DispatchEvent.Delete]);
    });

    it('should scope deleted bundles by the region in their consecutive', async () => {
      await harness.module.get(DispatchWorkflowService).deleteBundle(celtaId, dispatcher);

      const error = await rejectionOf(service.getAuditTrail(celtaId, ctxFor(USERS.operator)));

      expect(error.code).toBe(DispatchErrorCode.RegionNotAllowed);
    });

    it('should report bundles that never existed', async () => {
      const error = await rejectionOf(service.getAuditTrail(vehicleId('NOPE00'), dispatcher));

      expect(error.code).toBe(DispatchErrorCode.BundleNotFound);
    });
  });
});
