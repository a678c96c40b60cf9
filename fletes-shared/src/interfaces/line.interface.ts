import { TripType } from '../enums/trip-type.enum';
import { BundleState } from '../enums/bundle-state.enum';
import { BundleAuditStamps, BundleTotals } from './bundle.interface';

/**
 * A single shipper/consignee/cargo tuple loaded on a vehicle (a "pedido").
 * Bundle-scope values are not stored here; see ProjectedLine.
 */
export interface DispatchLine {
  lineId: string;
  vehicleConsecutive: string;
  integraConsecutive: string;
  orderConsecutive: string;
  pedidoNumber?: string;

  clientNit: string;
  realDestination: string;
  loadLocation: string;
  loadAddress: string;
  unloadLocation: string;
  unloadAddress: string;
  observations: string;
  trackingDocument: string;

  cajas: number;
  kilos: number;
  kilosSicetac: number;
  declaredValue: number;
  insurance: number;

  tripType: TripType;

  requestedFreight: number;
  realFreight: number;
  detour: number;
  loadUnload: number;
  loadUnloadKabi: number;
  extraPoint: number;
  totalPoints: number;

  createdBy: string;
  createdAt: string;
  pedidoUpdatedBy?: string;
  pedidoUpdatedAt?: string;
}

/**
 * Line as seen by readers: the stored line plus every bundle-scope field of
 * the bundle it belongs to.
 */
export interface ProjectedLine extends DispatchLine, BundleTotals, BundleAuditStamps {
  region: string;
  origin: string;
  destination: string;
  vehiclePlate: string;
  vehicleType: string;
  vehicleTypeSicetac?: string;
  state: BundleState;
  authorizedBy: string;
  authorizationTs: string;
  approverObservations?: string;
  adjustmentObservations?: string;
}
