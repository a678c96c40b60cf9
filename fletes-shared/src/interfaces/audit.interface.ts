import { BundleState } from '../enums/bundle-state.enum';
import { DispatchEvent } from './workflow-rules.interface';

/** One entry of a bundle's change history */
export interface BundleAuditEntry {
  auditId: string;
  vehicleConsecutive: string;
  event: DispatchEvent;
  previousState?: BundleState;
  newState?: BundleState;
  changedBy: string;
  changedAt: string;
  notes?: string;
  relatedBundles?: string[];
  automaticChange: boolean;
}

export interface BundleAuditTrail {
  vehicleConsecutive: string;
  entries: BundleAuditEntry[];
}
