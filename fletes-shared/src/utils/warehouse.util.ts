import { cityKey } from './city-key.util';

/** Destinations that receive a zero-quantity warehouse line on adjust */
export const SPECIAL_WAREHOUSE_CITIES: readonly string[] = ['GIRARDOTA', 'BARRANQUILLA', 'YUMBO', 'BUCARAMANGA'];

export const WAREHOUSE_OBSERVATION_SUFFIX = ' | SE ENVIA A BODEGA';

export function specialWarehouseCity(destination: string): string | undefined {
  const key = cityKey(destination);
  return SPECIAL_WAREHOUSE_CITIES.find(city => city === key);
}

export function warehouseUnloadLocation(city: string): string {
  return `FKC_INTEGRA_${city}`;
}
