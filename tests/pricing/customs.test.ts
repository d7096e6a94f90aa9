import { calculateCustoms, PROCESSING_FEE_USD, TARIFF_RATE } from '../../src/pricing/customs';

describe('calculateCustoms', () => {
    it('should charge 15% duty plus a flat processing fee', () => {
        const charges = calculateCustoms(200);
        expect(charges.duty).toBeCloseTo(30, 10);
        expect(charges.processingFee).toBe(5);
        expect(TARIFF_RATE).toBe(0.15);
        expect(PROCESSING_FEE_USD).toBe(5);
    });

    it('should charge nothing when there is no declared value', () => {
        expect(calculateCustoms(0)).toEqual({ duty: 0, processingFee: 0 });
    });
});
