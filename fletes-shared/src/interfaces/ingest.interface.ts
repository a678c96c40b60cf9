import { BundleState } from '../enums/bundle-state.enum';

export const INGEST_COLUMNS = [
  'NIT_CLIENT',
  'ORIGIN',
  'DESTINATION',
  'REAL_DESTINATION',
  'NUM_CAJAS',
  'NUM_KILOS',
  'NUM_KILOS_SICETAC',
  'VEHICLE_TYPE',
  'VEHICLE_TYPE_SICETAC',
  'VEHICLE_PLATE',
  'DECLARED_VALUE',
  'TRACKING_DOCUMENT',
  'REQUESTED_FREIGHT',
  'LOAD_LOCATION',
  'LOAD_ADDRESS',
  'UNLOAD_LOCATION',
  'UNLOAD_ADDRESS',
  'OBSERVATIONS',
  'TRIP_TYPE',
  'ORDER_CONSECUTIVE',
  'DETOUR',
  'LOAD_UNLOAD',
  'LOAD_UNLOAD_KABI',
  'EXTRA_POINT',
  'TOTAL_POINTS',
  'INSURANCE',
  'REAL_FREIGHT'
] as const;

export type IngestColumn = (typeof INGEST_COLUMNS)[number];

export type IngestCell = string | number | null | undefined;

/** One normalized spreadsheet row */
export type IngestRow = Partial<Record<IngestColumn, IngestCell>>;

export const REQUIRED_INGEST_COLUMNS: readonly IngestColumn[] = [
  'NIT_CLIENT',
  'ORIGIN',
  'DESTINATION',
  'NUM_CAJAS',
  'NUM_KILOS',
  'VEHICLE_TYPE',
  'VEHICLE_PLATE',
  'REQUESTED_FREIGHT',
  'TRIP_TYPE',
  'ORDER_CONSECUTIVE'
];

export interface IngestSummary {
  message: string;
  bundles: Array<{ vehicleConsecutive: string; state: BundleState; lines: number }>;
  lines: number;
  states: Partial<Record<BundleState, number>>;
}
