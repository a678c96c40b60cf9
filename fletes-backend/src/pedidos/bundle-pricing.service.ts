import { Injectable } from '@nestjs/common';
import {
  Bundle,
  BundleClassification,
  BundleTotals,
  CostOverrides,
  DispatchLine,
  buildBundleTotals,
  classifyBundle,
  resolveBillingVehicleType,
} from '@fletes/shared';
import { TariffsService } from '../catalog/tariffs.service';
import { StatusWorkflowService } from './status-workflow.service';

export interface PricingOptions {
  /** Billing type to price with; defaults to the SICETAC or declared type of the bundle */
  billingVehicleType?: string;
  overrides?: CostOverrides;
  totalKilosSicetacOverride?: number;
}

export interface PricedBundle {
  classification: BundleClassification;
  totals: BundleTotals;
}

/** Runs the pricing kernel for a bundle with tariffs from the oracle */
@Injectable()
export class BundlePricingService {
  constructor(
    private readonly tariffsService: TariffsService,
    private readonly statusWorkflow: StatusWorkflowService,
  ) {}

  async price(
    bundle: Pick<Bundle, 'origin' | 'destination' | 'vehicleType' | 'vehicleTypeSicetac'>,
    lines: readonly DispatchLine[],
    options: PricingOptions = {},
    signal?: AbortSignal,
  ): Promise<PricedBundle> {
    const billingType =
      options.billingVehicleType ?? resolveBillingVehicleType(bundle.vehicleType, bundle.vehicleTypeSicetac);
    const quote = await this.tariffsService.quote(bundle.origin, bundle.destination, billingType, signal);
    const classification = classifyBundle(lines, options.overrides, quote);
    const totals = buildBundleTotals(lines, classification, quote.costCenterCode, options.totalKilosSicetacOverride);
    return { classification, totals };
  }

  /** Bundle with totals, state and authorization stamp from a fresh classification */
  async reclassify(
    bundle: Bundle,
    lines: readonly DispatchLine[],
    options: PricingOptions,
    at: string,
    signal?: AbortSignal,
  ): Promise<Bundle> {
    const { classification, totals } = await this.price(bundle, lines, options, signal);
    return {
      ...bundle,
      state: classification.state,
      totals,
      costOverrides: options.overrides,
      totalKilosSicetacOverride: options.totalKilosSicetacOverride,
      ...this.statusWorkflow.authorizationStamp(classification.state, at),
      approverObservations: undefined,
      updatedAt: at,
    };
  }
}
