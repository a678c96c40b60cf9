import {
  Bundle,
  BundleAuditEntry,
  BundleSnapshot,
  BundleState,
  DispatchErrorCode,
  DispatchLine,
} from '@fletes/shared';
import { v4 as uuidv4 } from 'uuid';
import { notFoundError } from '../common/dispatch-errors';
import { OperationContext } from '../common/operation-context';

type StoreContext = Pick<OperationContext, 'signal'>;

/**
 * A bundle write. Without `expectedVersion` the bundle must not exist yet;
 * with it, the stored version must still match. The stored version becomes
 * `expectedVersion + 1` (or 1 on create).
 */
export interface BundleWrite {
  bundle: Bundle;
  expectedVersion?: number;
}

export interface BundleDeletion {
  vehicleConsecutive: string;
  expectedVersion: number;
}

export interface LineKey {
  vehicleConsecutive: string;
  lineId: string;
}

/** Line writes that re-home lines under another bundle */
export interface LineMove {
  deleteLines: LineKey[];
  putLines: DispatchLine[];
}

/** Everything one engine operation writes; applied all-or-nothing */
export interface BundleChangeSet {
  bundles?: BundleWrite[];
  deleteBundles?: BundleDeletion[];
  putLines?: DispatchLine[];
  deleteLines?: LineKey[];
  audit?: BundleAuditEntry[];
}

/**
 * Last write of a completed bundle. The bundle and its lines land in the
 * completed store and leave the active one in a single transaction; audit
 * entries stay in the active history.
 */
export interface BundleArchival {
  bundle: Bundle;
  expectedVersion: number;
  /** Every line of the bundle, as it should be archived */
  lines: DispatchLine[];
  audit?: BundleAuditEntry[];
}

export interface BundleQuery {
  states?: BundleState[];
  /** Restrict to these regions; undefined means all */
  regions?: string[];
}

export const ACTIVE_BUNDLE_STATES: readonly BundleState[] = [
  BundleState.Preauthorized,
  BundleState.RequiresCoordinator,
  BundleState.RequiresControl,
  BundleState.Authorized,
];

/**
 * Persistence boundary for bundles and their lines. Implementations provide
 * the reads, `commit` and `archiveBundle`; the remaining operations are
 * expressed as change sets on top of them.
 */
export abstract class BundleStore {
  abstract getSnapshot(vehicleConsecutive: string, ctx?: StoreContext): Promise<BundleSnapshot | undefined>;

  abstract findLinesByIntegraConsecutive(integraConsecutive: string, ctx?: StoreContext): Promise<DispatchLine[]>;

  abstract listBundles(query: BundleQuery, ctx?: StoreContext): Promise<BundleSnapshot[]>;

  abstract getAuditTrail(vehicleConsecutive: string, ctx?: StoreContext): Promise<BundleAuditEntry[]>;

  abstract commit(changes: BundleChangeSet, ctx?: StoreContext): Promise<void>;

  abstract archiveBundle(archival: BundleArchival, ctx?: StoreContext): Promise<void>;

  async getBundle(vehicleConsecutive: string, ctx?: StoreContext): Promise<Bundle | undefined> {
    const snapshot = await this.getSnapshot(vehicleConsecutive, ctx);
    return snapshot?.bundle;
  }

  async requireSnapshot(vehicleConsecutive: string, ctx: OperationContext): Promise<BundleSnapshot> {
    const snapshot = await this.getSnapshot(vehicleConsecutive, ctx);
    if (!snapshot) {
      throw notFoundError({
        code: DispatchErrorCode.BundleNotFound,
        message: `El vehículo ${vehicleConsecutive} no existe`,
        context: { bundleId: vehicleConsecutive },
        region: ctx.actor.region,
      });
    }
    return snapshot;
  }

  async exists(vehicleConsecutive: string, ctx?: StoreContext): Promise<boolean> {
    return (await this.getBundle(vehicleConsecutive, ctx)) !== undefined;
  }

  /** Single write of every bundle-scope field */
  updateBundle(bundle: Bundle, expectedVersion: number, audit: BundleAuditEntry[] = [], ctx?: StoreContext): Promise<void> {
    return this.commit({ bundles: [{ bundle, expectedVersion }], audit }, ctx);
  }

  /** Re-home lines under another bundle id; the line ids are kept */
  moveLinesChanges(lines: readonly DispatchLine[], targetVehicleConsecutive: string): LineMove {
    return {
      deleteLines: lines
        .filter(line => line.vehicleConsecutive !== targetVehicleConsecutive)
        .map(line => ({ vehicleConsecutive: line.vehicleConsecutive, lineId: line.lineId })),
      putLines: lines.map(line => ({ ...line, vehicleConsecutive: targetVehicleConsecutive })),
    };
  }

  deleteBundle(snapshot: BundleSnapshot, audit: BundleAuditEntry[] = [], ctx?: StoreContext): Promise<void> {
    return this.commit(this.deleteBundleChanges(snapshot, audit), ctx);
  }

  deleteBundleChanges(snapshot: BundleSnapshot, audit: BundleAuditEntry[] = []): BundleChangeSet {
    const { bundle, lines } = snapshot;
    return {
      deleteBundles: [{ vehicleConsecutive: bundle.vehicleConsecutive, expectedVersion: bundle.version }],
      deleteLines: lines.map(line => ({ vehicleConsecutive: bundle.vehicleConsecutive, lineId: line.lineId })),
      audit,
    };
  }

  /** New line with a fresh id, copied from `source` with `changes` applied */
  cloneLine(source: DispatchLine, changes: Partial<Omit<DispatchLine, 'lineId'>>): DispatchLine {
    return { ...source, ...changes, lineId: uuidv4() };
  }
}
