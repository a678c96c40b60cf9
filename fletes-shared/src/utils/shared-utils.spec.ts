import { cityKey, sameCity } from './city-key.util';
import {
  buildIntegraConsecutive,
  buildVehicleConsecutive,
  formatCompactDate,
  normalizePlate,
  withSplitSuffix
} from './consecutive.util';
import { billingTypeForKilos } from './vehicle-class.util';
import { ceilToMultiple, round2, sumBy } from './money.util';
import { specialWarehouseCity, warehouseUnloadLocation } from './warehouse.util';

describe('Shared dispatch utilities', () => {
  describe('cityKey', () => {
    it('should strip accents, case and punctuation', () => {
      expect(cityKey('  Bogotá, D.C. ')).toBe('BOGOTA D C');
      expect(cityKey('Ibagué')).toBe('IBAGUE');
    });

    it('should return an empty key for missing text', () => {
      expect(cityKey(undefined)).toBe('');
      expect(sameCity('', '')).toBe(false);
    });

    it('should match equivalent spellings', () => {
      expect(sameCity('medellín', 'MEDELLIN')).toBe(true);
      expect(sameCity('CALI', 'CALIMA')).toBe(false);
    });
  });

  describe('consecutives', () => {
    it('should render the date in the dispatch time zone', () => {
      // 03:00 UTC is still the previous evening in Bogota
      expect(formatCompactDate(new Date('2024-03-02T03:00:00Z'), 'America/Bogota')).toBe('20240301');
    });

    it('should compose vehicle and integra consecutives', () => {
      expect(buildVehicleConsecutive('CELTA', '20240301', 'ABC123')).toBe('CELTA-20240301-ABC123');
      expect(buildIntegraConsecutive('CELTA', '20240301', '17')).toBe('CELTA-20240301-17');
    });

    it('should append split suffixes without a separator', () => {
      expect(withSplitSuffix('CELTA-20240301-ABC123', 'B')).toBe('CELTA-20240301-ABC123B');
    });

    it('should normalize plates', () => {
      expect(normalizePlate('abc-123')).toBe('ABC123');
      expect(normalizePlate(' abc 123')).toBe('ABC123');
    });
  });

  describe('billingTypeForKilos', () => {
    it.each([
      [2300, 'NHR'],
      [2301, 'TURBO'],
      [4000, 'TURBO'],
      [6000, 'NIES'],
      [9000, 'SENCILLO'],
      [17000, 'PATINETA'],
      [17001, 'TRACTOMULA']
    ])('should classify %d kg as %s', (kilos, expected) => {
      expect(billingTypeForKilos(kilos)).toBe(expected);
    });
  });

  describe('money', () => {
    it('should round to cents', () => {
      expect(round2(4.545454)).toBe(4.55);
      expect(sumBy([{ v: 0.1 }, { v: 0.2 }], x => x.v)).toBe(0.3);
    });

    it('should ceil to the next multiple without float noise', () => {
      expect(ceilToMultiple(700_000 / 0.7, 50)).toBe(1_000_000);
      expect(ceilToMultiple(1_000_010, 50)).toBe(1_000_050);
    });
  });

  describe('special warehouses', () => {
    it('should recognize reserved cities in any spelling', () => {
      expect(specialWarehouseCity('Yumbo')).toBe('YUMBO');
      expect(specialWarehouseCity('CALI')).toBeUndefined();
      expect(warehouseUnloadLocation('YUMBO')).toBe('FKC_INTEGRA_YUMBO');
    });
  });
});
