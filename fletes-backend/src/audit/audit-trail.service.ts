import { Injectable } from '@nestjs/common';
import {
  BundleAuditEntry,
  BundleAuditTrail,
  BundleState,
  DispatchErrorCode,
  DispatchEvent,
} from '@fletes/shared';
import { v4 as uuidv4 } from 'uuid';
import { BundleStore } from '../bundles/bundle-store';
import { Clock } from '../common/clock';
import { notFoundError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';

export interface AuditEntryInit {
  vehicleConsecutive: string;
  event: DispatchEvent;
  changedBy: string;
  previousState?: BundleState;
  newState?: BundleState;
  notes?: string;
  relatedBundles?: string[];
  automaticChange?: boolean;
}

/**
 * History of state-changing operations per bundle. Entries are built here
 * and written by the caller inside the same change set as the operation.
 */
@Injectable()
export class AuditTrailService {
  constructor(
    private readonly bundleStore: BundleStore,
    private readonly clock: Clock,
  ) {}

  createEntry(init: AuditEntryInit, changedAt: string = this.clock.isoNow()): BundleAuditEntry {
    return {
      auditId: uuidv4(),
      vehicleConsecutive: init.vehicleConsecutive,
      event: init.event,
      previousState: init.previousState,
      newState: init.newState,
      changedBy: init.changedBy,
      changedAt,
      notes: init.notes || undefined,
      relatedBundles: init.relatedBundles && init.relatedBundles.length > 0 ? init.relatedBundles : undefined,
      automaticChange: init.automaticChange ?? false,
    };
  }

  async getAuditTrail(vehicleConsecutive: string, ctx: OperationContext): Promise<BundleAuditTrail> {
    const entries = await this.bundleStore.getAuditTrail(vehicleConsecutive, ctx);
    if (entries.length === 0 && !(await this.bundleStore.exists(vehicleConsecutive, ctx))) {
      throw notFoundError({
        code: DispatchErrorCode.BundleNotFound,
        message: `El vehículo ${vehicleConsecutive} no existe`,
        context: { bundleId: vehicleConsecutive },
        region: ctx.actor.region,
      });
    }
    return {
      vehicleConsecutive,
      entries: [...entries].sort((a, b) => a.changedAt.localeCompare(b.changedAt)),
    };
  }
}
