import {
  Bundle,
  BundleAuditEntry,
  BundleState,
  BundleTotals,
  CostOverrides,
  DispatchEvent,
  DispatchLine,
  TripType,
} from '@fletes/shared';
import {
  DynamoItem,
  readBoolean,
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readRecord,
  readString,
  readStringArray,
} from '../common/dynamo-item.util';
import {
  BUNDLE_METADATA_SK,
  auditSk,
  bundlePk,
  integraGsiPk,
  integraGsiSk,
  lineSk,
  stateGsiPk,
  stateGsiSk,
} from './bundle-keys';

function parseState(value: string): BundleState {
  const state = Object.values(BundleState).find(s => s === value);
  if (!state) {
    throw new Error(`Unknown bundle state "${value}"`);
  }
  return state;
}

function parseEvent(value: string): DispatchEvent {
  const event = Object.values(DispatchEvent).find(e => e === value);
  if (!event) {
    throw new Error(`Unknown audit event "${value}"`);
  }
  return event;
}

function parseTripType(value: string): TripType {
  return value === TripType.Parcel ? TripType.Parcel : TripType.Bulk;
}

function readTotals(item: DynamoItem): BundleTotals {
  const raw = readRecord(item, 'totals');
  return {
    billingVehicleType: readString(raw, 'billingVehicleType'),
    costCenterCode: readString(raw, 'costCenterCode'),
    totalCajasVehicle: readNumber(raw, 'totalCajasVehicle'),
    totalKilosVehicle: readNumber(raw, 'totalKilosVehicle'),
    totalKilosVehicleSicetac: readNumber(raw, 'totalKilosVehicleSicetac'),
    totalPointsVehicle: readNumber(raw, 'totalPointsVehicle'),
    systemFreight: readNumber(raw, 'systemFreight'),
    theoreticalExtraPoint: readNumber(raw, 'theoreticalExtraPoint'),
    theoreticalLoadUnload: readNumber(raw, 'theoreticalLoadUnload'),
    theoreticalCostVehicle: readNumber(raw, 'theoreticalCostVehicle'),
    totalRequestedFreight: readNumber(raw, 'totalRequestedFreight'),
    totalLoadUnload: readNumber(raw, 'totalLoadUnload'),
    totalLoadUnloadKabi: readNumber(raw, 'totalLoadUnloadKabi'),
    totalExtraPoint: readNumber(raw, 'totalExtraPoint'),
    totalDetourVehicle: readNumber(raw, 'totalDetourVehicle'),
    totalVehicleFreight: readNumber(raw, 'totalVehicleFreight'),
    freightDifference: readNumber(raw, 'freightDifference'),
    percentOverTheoretical: readNumber(raw, 'percentOverTheoretical'),
  };
}

function readOverrides(item: DynamoItem): CostOverrides | undefined {
  if (item.costOverrides === undefined || item.costOverrides === null) {
    return undefined;
  }
  const raw = readRecord(item, 'costOverrides');
  return {
    freight: readOptionalNumber(raw, 'freight'),
    loadUnload: readOptionalNumber(raw, 'loadUnload'),
    extraPoint: readOptionalNumber(raw, 'extraPoint'),
    detour: readOptionalNumber(raw, 'detour'),
  };
}

export function toBundleItem(bundle: Bundle): DynamoItem {
  return {
    PK: bundlePk(bundle.vehicleConsecutive),
    SK: BUNDLE_METADATA_SK,
    GSI1PK: stateGsiPk(bundle.state),
    GSI1SK: stateGsiSk(bundle.region, bundle.vehicleConsecutive),
    entityType: 'Bundle',
    ...bundle,
  };
}

export function fromBundleItem(item: DynamoItem): Bundle {
  return {
    vehicleConsecutive: readString(item, 'vehicleConsecutive'),
    region: readString(item, 'region'),
    origin: readString(item, 'origin'),
    destination: readString(item, 'destination'),
    vehiclePlate: readString(item, 'vehiclePlate'),
    vehicleType: readString(item, 'vehicleType'),
    vehicleTypeSicetac: readOptionalString(item, 'vehicleTypeSicetac'),
    state: parseState(readString(item, 'state')),
    totals: readTotals(item),
    totalKilosSicetacOverride: readOptionalNumber(item, 'totalKilosSicetacOverride'),
    costOverrides: readOverrides(item),
    authorizedBy: readString(item, 'authorizedBy', 'NA'),
    authorizationTs: readString(item, 'authorizationTs', 'NA'),
    approverObservations: readOptionalString(item, 'approverObservations'),
    adjustmentObservations: readOptionalString(item, 'adjustmentObservations'),
    adjustedBy: readOptionalString(item, 'adjustedBy'),
    adjustedAt: readOptionalString(item, 'adjustedAt'),
    mergedBy: readOptionalString(item, 'mergedBy'),
    mergedAt: readOptionalString(item, 'mergedAt'),
    mergeObservations: readOptionalString(item, 'mergeObservations'),
    splitBy: readOptionalString(item, 'splitBy'),
    splitAt: readOptionalString(item, 'splitAt'),
    splitObservations: readOptionalString(item, 'splitObservations'),
    version: readNumber(item, 'version'),
    createdBy: readString(item, 'createdBy'),
    createdAt: readString(item, 'createdAt'),
    updatedAt: readString(item, 'updatedAt'),
  };
}

export function toLineItem(line: DispatchLine): DynamoItem {
  return {
    PK: bundlePk(line.vehicleConsecutive),
    SK: lineSk(line.lineId),
    GSI2PK: integraGsiPk(line.integraConsecutive),
    GSI2SK: integraGsiSk(line.vehicleConsecutive, line.lineId),
    entityType: 'Line',
    ...line,
  };
}

export function fromLineItem(item: DynamoItem): DispatchLine {
  return {
    lineId: readString(item, 'lineId'),
    vehicleConsecutive: readString(item, 'vehicleConsecutive'),
    integraConsecutive: readString(item, 'integraConsecutive'),
    orderConsecutive: readString(item, 'orderConsecutive'),
    pedidoNumber: readOptionalString(item, 'pedidoNumber'),
    clientNit: readString(item, 'clientNit'),
    realDestination: readString(item, 'realDestination'),
    loadLocation: readString(item, 'loadLocation'),
    loadAddress: readString(item, 'loadAddress'),
    unloadLocation: readString(item, 'unloadLocation'),
    unloadAddress: readString(item, 'unloadAddress'),
    observations: readString(item, 'observations'),
    trackingDocument: readString(item, 'trackingDocument'),
    cajas: readNumber(item, 'cajas'),
    kilos: readNumber(item, 'kilos'),
    kilosSicetac: readNumber(item, 'kilosSicetac'),
    declaredValue: readNumber(item, 'declaredValue'),
    insurance: readNumber(item, 'insurance'),
    tripType: parseTripType(readString(item, 'tripType')),
    requestedFreight: readNumber(item, 'requestedFreight'),
    realFreight: readNumber(item, 'realFreight'),
    detour: readNumber(item, 'detour'),
    loadUnload: readNumber(item, 'loadUnload'),
    loadUnloadKabi: readNumber(item, 'loadUnloadKabi'),
    extraPoint: readNumber(item, 'extraPoint'),
    totalPoints: readNumber(item, 'totalPoints'),
    createdBy: readString(item, 'createdBy'),
    createdAt: readString(item, 'createdAt'),
    pedidoUpdatedBy: readOptionalString(item, 'pedidoUpdatedBy'),
    pedidoUpdatedAt: readOptionalString(item, 'pedidoUpdatedAt'),
  };
}

export function toAuditItem(entry: BundleAuditEntry): DynamoItem {
  return {
    PK: bundlePk(entry.vehicleConsecutive),
    SK: auditSk(entry.changedAt, entry.auditId),
    entityType: 'BundleAudit',
    ...entry,
  };
}

export function fromAuditItem(item: DynamoItem): BundleAuditEntry {
  const previousState = readOptionalString(item, 'previousState');
  const newState = readOptionalString(item, 'newState');
  const relatedBundles = readStringArray(item, 'relatedBundles');
  return {
    auditId: readString(item, 'auditId'),
    vehicleConsecutive: readString(item, 'vehicleConsecutive'),
    event: parseEvent(readString(item, 'event')),
    previousState: previousState ? parseState(previousState) : undefined,
    newState: newState ? parseState(newState) : undefined,
    changedBy: readString(item, 'changedBy'),
    changedAt: readString(item, 'changedAt'),
    notes: readOptionalString(item, 'notes'),
    relatedBundles: relatedBundles.length > 0 ? relatedBundles : undefined,
    automaticChange: readBoolean(item, 'automaticChange'),
  };
}
