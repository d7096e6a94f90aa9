import { CustomsCharges } from '../domain/models';

export const TARIFF_RATE = 0.15;
export const PROCESSING_FEE_USD = 5;

/** Import charges on the declared item value, in USD. Nothing is owed on a zero value. */
export function calculateCustoms(declaredValueUsd: number): CustomsCharges {
    if (declaredValueUsd <= 0) return { duty: 0, processingFee: 0 };
    return {
        duty: declaredValueUsd * TARIFF_RATE,
        processingFee: PROCESSING_FEE_USD,
    };
}
