/** SICETAC vehicle class by maximum kilograms, ascending */
export const VEHICLE_CLASS_BY_KILOS: ReadonlyArray<{ maxKilos: number; vehicleType: string }> = [
  { maxKilos: 2300, vehicleType: 'NHR' },
  { maxKilos: 4500, vehicleType: 'TURBO' },
  { maxKilos: 6100, vehicleType: 'NIES' },
  { maxKilos: 9000, vehicleType: 'SENCILLO' },
  { maxKilos: 17000, vehicleType: 'PATINETA' }
];

export const HEAVIEST_VEHICLE_CLASS = 'TRACTOMULA';

export function billingTypeForKilos(totalKilosSicetac: number): string {
  const match = VEHICLE_CLASS_BY_KILOS.find(c => totalKilosSicetac <= c.maxKilos);
  return match ? match.vehicleType : HEAVIEST_VEHICLE_CLASS;
}
