import { calculateServiceFee, serviceFeeRate } from '../../src/pricing/service-fee';

describe('calculateServiceFee', () => {
    it('should charge 4.73% below 9,000 JPY', () => {
        expect(calculateServiceFee(8980)).toBe(425);
        expect(calculateServiceFee(8999)).toBe(426);
    });

    it('should charge 7.63% from 9,000 up to 10,000 JPY', () => {
        expect(calculateServiceFee(9000)).toBe(687);
        expect(calculateServiceFee(9500)).toBe(725);
        expect(calculateServiceFee(9999)).toBe(763);
    });

    it('should charge 7.17% from 10,000 JPY', () => {
        expect(calculateServiceFee(10000)).toBe(717);
        expect(calculateServiceFee(12500)).toBe(896);
        expect(Math.abs(calculateServiceFee(15000) - 1075)).toBeLessThanOrEqual(1);
    });

    it('should keep the middle bracket above the top one', () => {
        expect(serviceFeeRate(9500)).toBeGreaterThan(serviceFeeRate(10000));
        expect(calculateServiceFee(9999)).toBeGreaterThan(calculateServiceFee(10000));
    });

    it('should charge nothing for an unknown price', () => {
        expect(calculateServiceFee(0)).toBe(0);
    });
});
