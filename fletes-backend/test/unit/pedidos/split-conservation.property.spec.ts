import * as fc from 'fast-check';
import { peelCajas, splitLineKilos } from '../../../src/pedidos/split.service';

/**
 * A kilo split must hand back exactly what it took: the peeled part and the
 * remainder add up to the original line.
 */

const lineAndKilos = fc
  .record({
    cajas: fc.integer({ min: 0, max: 1_000 }),
    kilos: fc.integer({ min: 2, max: 40_000 }),
    requestedFreight: fc.integer({ min: 0, max: 20_000_000 }),
    realFreight: fc.integer({ min: 0, max: 20_000_000 }),
    declaredValue: fc.integer({ min: 0, max: 500_000_000 }),
    insurance: fc.integer({ min: 0, max: 1_000_000 }),
  })
  .chain(line =>
    fc.tuple(fc.constant({ ...line, kilosSicetac: line.kilos }), fc.integer({ min: 1, max: line.kilos - 1 })),
  );

describe('Kilo split conservation', () => {
  it('should conserve every quantity and amount', () => {
    fc.assert(
      fc.property(lineAndKilos, ([line, kilos]) => {
        const { peeled, remainder } = splitLineKilos(line, kilos);

        expect(peeled.cajas + remainder.cajas).toBe(line.cajas);
        expect(peeled.kilosSicetac).toBe(kilos);
        expect(peeled.kilosSicetac + remainder.kilosSicetac).toBe(line.kilosSicetac);
        expect(peeled.kilos + remainder.kilos).toBeCloseTo(line.kilos, 2);
        expect(peeled.requestedFreight + remainder.requestedFreight).toBeCloseTo(line.requestedFreight, 2);
        expect(peeled.realFreight + remainder.realFreight).toBeCloseTo(line.realFreight, 2);
        expect(peeled.declaredValue + remainder.declaredValue).toBeCloseTo(line.declaredValue, 2);
        expect(peeled.insurance + remainder.insurance).toBeCloseTo(line.insurance, 2);
      }),
    );
  });

  it('should peel at least one box from a line that has boxes', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 1_000 }), fc.double({ min: 0.0001, max: 0.9999, noNaN: true }), (cajas, ratio) => {
        const peeled = peelCajas(cajas, ratio);
        return peeled >= 1 && peeled <= cajas;
      }),
    );
  });
});
