export enum TripType {
  Bulk = 'BULK',
  Parcel = 'PARCEL'
}

// Spreadsheets from the regional offices still carry the Spanish labels
export const TRIP_TYPE_ALIASES: Record<string, TripType> = {
  BULK: TripType.Bulk,
  PARCEL: TripType.Parcel,
  'CARGA MASIVA': TripType.Bulk,
  PAQUETEO: TripType.Parcel
};
