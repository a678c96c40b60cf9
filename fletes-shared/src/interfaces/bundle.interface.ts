import { BundleState } from '../enums/bundle-state.enum';
import { DispatchLine, ProjectedLine } from './line.interface';

/** Bundle-scope totals, mirrored onto every projected line */
export interface BundleTotals {
  billingVehicleType: string;
  costCenterCode: string;
  totalCajasVehicle: number;
  totalKilosVehicle: number;
  totalKilosVehicleSicetac: number;
  totalPointsVehicle: number;
  systemFreight: number;
  theoreticalExtraPoint: number;
  theoreticalLoadUnload: number;
  theoreticalCostVehicle: number;
  totalRequestedFreight: number;
  totalLoadUnload: number;
  totalLoadUnloadKabi: number;
  totalExtraPoint: number;
  totalDetourVehicle: number;
  totalVehicleFreight: number;
  freightDifference: number;
  percentOverTheoretical: number;
}

/** Operator-entered amounts that replace the per-line sums when present */
export interface CostOverrides {
  freight?: number;
  loadUnload?: number;
  extraPoint?: number;
  detour?: number;
}

export interface BundleAuditStamps {
  adjustedBy?: string;
  adjustedAt?: string;
  mergedBy?: string;
  mergedAt?: string;
  mergeObservations?: string;
  splitBy?: string;
  splitAt?: string;
  splitObservations?: string;
}

/** All lines sharing a vehicle consecutive, i.e. one truck dispatch */
export interface Bundle extends BundleAuditStamps {
  vehicleConsecutive: string;
  region: string;
  origin: string;
  destination: string;
  vehiclePlate: string;
  vehicleType: string;
  vehicleTypeSicetac?: string;
  state: BundleState;
  totals: BundleTotals;
  totalKilosSicetacOverride?: number;
  costOverrides?: CostOverrides;
  authorizedBy: string;
  authorizationTs: string;
  approverObservations?: string;
  adjustmentObservations?: string;
  version: number;
  createdBy: string;
  createdAt: string;
  updatedAt: string;
}

export interface BundleSnapshot {
  bundle: Bundle;
  lines: DispatchLine[];
}

export interface BundleListing {
  vehicleConsecutive: string;
  region: string;
  state: BundleState;
  multistate: boolean;
  lines: ProjectedLine[];
}

export interface BulkOperationResult {
  successful: string[];
  failed: Array<{ id: string; error: string }>;
  totalProcessed: number;
  successCount: number;
  failureCount: number;
}
