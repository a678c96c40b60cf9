/** Route tariff keyed by origin and destination */
export interface Tariff {
  origin: string;
  destination: string;
  routeName?: string;
  tripKind?: string;
  costCenterCode: string;
  paysLoadUnload: boolean;
  rates: Record<string, number>;
}

/** Per vehicle type surcharges */
export interface OtherCosts {
  vehicleType: string;
  maxPoints?: number;
  extraPointValue: number;
  loadUnloadFee: number;
}

/** Everything the pricing kernel needs from the oracle for one bundle */
export interface TariffQuote {
  billingVehicleType: string;
  base: number;
  paysLoadUnload: boolean;
  extraPointValue: number;
  loadUnloadFee: number;
  costCenterCode: string;
}
