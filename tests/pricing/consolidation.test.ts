import {
    consolidatePackages,
    consolidationFee,
    summarizeConsolidation,
} from '../../src/pricing/consolidation';
import { assembleLandedCost } from '../../src/pricing/assembler';
import { ShippingMethod } from '../../src/domain/models';
import { buildPackage } from '../helpers';

describe('consolidatePackages', () => {
    it('should sum weights and heights and keep the largest footprint', () => {
        const result = consolidatePackages([
            buildPackage({ weight: 0.4, length: 30, width: 20, height: 5 }),
            buildPackage({ weight: 0.6, length: 40, width: 25, height: 10 }),
            buildPackage({ weight: 0.3, length: 20, width: 15, height: 3 }),
        ]);

        expect(result.totalWeight).toBe(1.3);
        expect(result.maxLength).toBe(40);
        expect(result.maxWidth).toBe(25);
        expect(result.totalHeight).toBe(18);
    });

    it('should pick a box by total weight when dimensions are unknown', () => {
        const noSize = { length: 0, width: 0, height: 0 };
        const box = (weights: number[]) => consolidatePackages(weights.map(weight => buildPackage({ weight, ...noSize })));

        expect(box([0.3, 0.1])).toMatchObject({ maxLength: 30, maxWidth: 20, totalHeight: 15 });
        expect(box([0.7])).toMatchObject({ maxLength: 40, maxWidth: 30, totalHeight: 20 });
        expect(box([1.0, 0.5])).toMatchObject({ maxLength: 50, maxWidth: 40, totalHeight: 25 });
        expect(box([2.5])).toMatchObject({ totalWeight: 2.5, maxLength: 60, maxWidth: 50, totalHeight: 30 });
    });

    it('should return zeros for no packages', () => {
        expect(consolidatePackages([])).toEqual({ totalWeight: 0, maxLength: 0, maxWidth: 0, totalHeight: 0 });
    });
});

describe('consolidationFee', () => {
    it('should charge 500 JPY for every package after the first', () => {
        expect(consolidationFee(0)).toBe(0);
        expect(consolidationFee(1)).toBe(0);
        expect(consolidationFee(2)).toBe(500);
        expect(consolidationFee(4)).toBe(1500);
    });
});

describe('summarizeConsolidation', () => {
    const rate = 0.01;
    const first = buildPackage({ itemPrice: 10000, declaredValue: 10000, domesticShippingFee: 1200, weight: 1.0, length: 30, width: 20, height: 10 });
    const second = buildPackage({ itemPrice: 6000, declaredValue: 6000, domesticShippingFee: 1000, weight: 0.4, length: 30, width: 20, height: 4 });
    const entries = [first, second].map(packageInfo => ({
        packageInfo,
        landedCost: assembleLandedCost(packageInfo, 'EMS', rate),
    }));

    it('should compare one combined box against separate shipments', () => {
        const summary = summarizeConsolidation(entries, 'EMS', rate);

        expect(summary.packageCount).toBe(2);
        expect(summary.shippingMethod).toBe(ShippingMethod.Ems);
        expect(summary.dimensions).toEqual({ totalWeight: 1.4, maxLength: 30, maxWidth: 20, totalHeight: 14 });
        expect(summary.consolidationFeeJpy).toBe(500);
        expect(summary.consolidationFeeUsd).toBe(5);
        expect(summary.consolidatedShippingJpy).toBe(9450);
        expect(summary.consolidatedShippingUsd).toBeCloseTo(94.5, 2);
        // 19,417 JPY + $20 customs and 12,159 JPY + $14 customs shipped apart
        expect(summary.individualTotal).toBeCloseTo(349.76, 2);
        expect(summary.consolidatedTotal).toBeCloseTo(320.51, 2);
        expect(summary.savings).toBeCloseTo(29.25, 2);
    });

    it('should fall back to EMS for an unknown carrier', () => {
        expect(summarizeConsolidation(entries, 'Sea Mail', rate).shippingMethod).toBe(ShippingMethod.Ems);
    });
});
