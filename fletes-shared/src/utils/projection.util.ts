import { BundleState } from '../enums/bundle-state.enum';
import { Bundle, BundleListing } from '../interfaces/bundle.interface';
import { DispatchLine, ProjectedLine } from '../interfaces/line.interface';

/** A line with an assigned pedido number is completed whatever its bundle says */
export function projectedLineState(bundle: Pick<Bundle, 'state'>, line: Pick<DispatchLine, 'pedidoNumber'>): BundleState {
  return line.pedidoNumber ? BundleState.Completed : bundle.state;
}

/** Mirror every bundle-scope field onto each line, the shape readers and exports expect */
export function projectBundleLines(bundle: Bundle, lines: readonly DispatchLine[]): ProjectedLine[] {
  return lines.map(line => ({
    ...line,
    ...bundle.totals,
    region: bundle.region,
    origin: bundle.origin,
    destination: bundle.destination,
    vehiclePlate: bundle.vehiclePlate,
    vehicleType: bundle.vehicleType,
    vehicleTypeSicetac: bundle.vehicleTypeSicetac,
    state: projectedLineState(bundle, line),
    authorizedBy: bundle.authorizedBy,
    authorizationTs: bundle.authorizationTs,
    approverObservations: bundle.approverObservations,
    adjustmentObservations: bundle.adjustmentObservations,
    adjustedBy: bundle.adjustedBy,
    adjustedAt: bundle.adjustedAt,
    mergedBy: bundle.mergedBy,
    mergedAt: bundle.mergedAt,
    mergeObservations: bundle.mergeObservations,
    splitBy: bundle.splitBy,
    splitAt: bundle.splitAt,
    splitObservations: bundle.splitObservations
  }));
}

export function buildBundleListing(bundle: Bundle, lines: readonly DispatchLine[]): BundleListing {
  const projected = projectBundleLines(bundle, lines);
  const states = new Set(projected.map(line => line.state));

  return {
    vehicleConsecutive: bundle.vehicleConsecutive,
    region: bundle.region,
    state: bundle.state,
    multistate: states.size > 1,
    lines: projected
  };
}
