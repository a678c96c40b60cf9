import { BundleState } from '../enums/bundle-state.enum';
import { BundleTotals, CostOverrides } from '../interfaces/bundle.interface';
import { DispatchLine } from '../interfaces/line.interface';
import { TariffQuote } from '../interfaces/tariff.interface';
import { cityKey } from './city-key.util';
import { round2, sumBy } from './money.util';

/** Requested cost may exceed theoretical by this much before control must sign */
export const COORDINATOR_TOLERANCE_PERCENT = 7;

export type PricingLine = Pick<
  DispatchLine,
  | 'realDestination'
  | 'totalPoints'
  | 'requestedFreight'
  | 'loadUnload'
  | 'loadUnloadKabi'
  | 'detour'
  | 'extraPoint'
  | 'cajas'
  | 'kilos'
  | 'kilosSicetac'
>;

export interface TheoreticalCost {
  points: number;
  systemFreight: number;
  theoreticalExtraPoint: number;
  theoreticalLoadUnload: number;
  theoreticalCost: number;
}

export interface RequestedCost {
  freight: number;
  loadUnload: number;
  loadUnloadKabi: number;
  extraPoint: number;
  detour: number;
  total: number;
}

export interface StateDecision {
  state: BundleState;
  percentOverTheoretical: number;
}

export interface BundleClassification extends StateDecision {
  billingVehicleType: string;
  theoretical: TheoreticalCost;
  requested: RequestedCost;
  freightDifference: number;
}

/** The SICETAC type wins over the declared one when present */
export function resolveBillingVehicleType(vehicleType: string, vehicleTypeSicetac?: string | null): string {
  const sicetac = vehicleTypeSicetac?.trim();
  return (sicetac ? sicetac : vehicleType).trim().toUpperCase();
}

export function countDistinctRealDestinations(lines: readonly Pick<PricingLine, 'realDestination'>[]): number {
  const keys = new Set<string>();
  for (const line of lines) {
    const key = cityKey(line.realDestination);
    if (key) {
      keys.add(key);
    }
  }
  return keys.size;
}

/** Delivery points of a bundle, never less than one */
export function computePoints(lines: readonly Pick<PricingLine, 'realDestination' | 'totalPoints'>[]): number {
  const declared = lines.reduce((acc, line) => acc + (line.totalPoints || 0), 0);
  return Math.max(countDistinctRealDestinations(lines), declared, 1);
}

export function computeTheoretical(lines: readonly PricingLine[], quote: TariffQuote): TheoreticalCost {
  const points = computePoints(lines);
  const systemFreight = round2(quote.base);
  const theoreticalExtraPoint = round2(Math.max(0, points - 1) * quote.extraPointValue);
  const theoreticalLoadUnload = quote.paysLoadUnload ? round2(quote.loadUnloadFee) : 0;

  return {
    points,
    systemFreight,
    theoreticalExtraPoint,
    theoreticalLoadUnload,
    theoreticalCost: round2(systemFreight + theoreticalExtraPoint + theoreticalLoadUnload)
  };
}

/**
 * Requested cost: freight + detour + extra point + the larger of the declared
 * load/unload and the KABI load/unload. Overrides replace the line sums.
 */
export function computeRequested(lines: readonly PricingLine[], overrides?: CostOverrides): RequestedCost {
  const freight = overrides?.freight ?? sumBy(lines, l => l.requestedFreight);
  const loadUnload = overrides?.loadUnload ?? sumBy(lines, l => l.loadUnload);
  const extraPoint = overrides?.extraPoint ?? sumBy(lines, l => l.extraPoint);
  const detour = overrides?.detour ?? sumBy(lines, l => l.detour);
  const loadUnloadKabi = sumBy(lines, l => l.loadUnloadKabi);

  return {
    freight: round2(freight),
    loadUnload: round2(loadUnload),
    loadUnloadKabi,
    extraPoint: round2(extraPoint),
    detour: round2(detour),
    total: round2(freight + detour + extraPoint + Math.max(loadUnload, loadUnloadKabi))
  };
}

export function decideAuthorizationState(requested: number, theoretical: number): StateDecision {
  if (theoretical <= 0) {
    return { state: BundleState.RequiresControl, percentOverTheoretical: 0 };
  }

  const percent = ((requested - theoretical) / theoretical) * 100;

  if (requested <= theoretical) {
    return { state: BundleState.Preauthorized, percentOverTheoretical: Math.max(0, round2(percent)) };
  }

  // Compared without dividing so that exactly 7% stays with the coordinator
  const withinTolerance = (requested - theoretical) * 100 <= COORDINATOR_TOLERANCE_PERCENT * theoretical;

  return {
    state: withinTolerance ? BundleState.RequiresCoordinator : BundleState.RequiresControl,
    percentOverTheoretical: round2(percent)
  };
}

export function classifyBundle(
  lines: readonly PricingLine[],
  overrides: CostOverrides | undefined,
  quote: TariffQuote
): BundleClassification {
  const theoretical = computeTheoretical(lines, quote);
  const requested = computeRequested(lines, overrides);
  const decision = decideAuthorizationState(requested.total, theoretical.theoreticalCost);

  return {
    ...decision,
    billingVehicleType: quote.billingVehicleType,
    theoretical,
    requested,
    freightDifference: round2(requested.total - theoretical.theoreticalCost)
  };
}

/** Bundle-scope totals written once per bundle after classification */
export function buildBundleTotals(
  lines: readonly PricingLine[],
  classification: BundleClassification,
  costCenterCode: string,
  totalKilosSicetacOverride?: number
): BundleTotals {
  const { theoretical, requested } = classification;

  return {
    billingVehicleType: classification.billingVehicleType,
    costCenterCode,
    totalCajasVehicle: sumBy(lines, l => l.cajas),
    totalKilosVehicle: sumBy(lines, l => l.kilos),
    totalKilosVehicleSicetac: totalKilosSicetacOverride ?? sumBy(lines, l => l.kilosSicetac),
    totalPointsVehicle: theoretical.points,
    systemFreight: theoretical.systemFreight,
    theoreticalExtraPoint: theoretical.theoreticalExtraPoint,
    theoreticalLoadUnload: theoretical.theoreticalLoadUnload,
    theoreticalCostVehicle: theoretical.theoreticalCost,
    totalRequestedFreight: requested.freight,
    totalLoadUnload: requested.loadUnload,
    totalLoadUnloadKabi: requested.loadUnloadKabi,
    totalExtraPoint: requested.extraPoint,
    totalDetourVehicle: requested.detour,
    totalVehicleFreight: requested.total,
    freightDifference: classification.freightDifference,
    percentOverTheoretical: classification.percentOverTheoretical
  };
}
