import {
    ConsolidatedDimensions,
    ConsolidationSummary,
    LandedCost,
    PackageInfo,
} from '../domain/models';
import { quoteShipping, resolveShippingMethod } from './shipping';
import { calculateCustoms } from './customs';
import { roundJpy, roundUsd } from './rounding';

const FEE_PER_EXTRA_PACKAGE_JPY = 500;

// Box used when the combined dimensions cannot be derived, keyed by total weight.
const FALLBACK_BOXES: ReadonlyArray<{ below: number; length: number; width: number; height: number }> = [
    { below: 0.5, length: 30, width: 20, height: 15 },
    { below: 1.0, length: 40, width: 30, height: 20 },
    { below: 2.0, length: 50, width: 40, height: 25 },
];
const LARGEST_BOX = { length: 60, width: 50, height: 30 };

/** Packages stacked into one box: weights and heights add up, footprint is the largest. */
export function consolidatePackages(packages: readonly PackageInfo[]): ConsolidatedDimensions {
    if (packages.length === 0) {
        return { totalWeight: 0, maxLength: 0, maxWidth: 0, totalHeight: 0 };
    }

    let totalWeight = 0;
    let maxLength = 0;
    let maxWidth = 0;
    let totalHeight = 0;
    for (const pkg of packages) {
        if (pkg.weight > 0) totalWeight += pkg.weight;
        if (pkg.length > 0) maxLength = Math.max(maxLength, pkg.length);
        if (pkg.width > 0) maxWidth = Math.max(maxWidth, pkg.width);
        if (pkg.height > 0) totalHeight += pkg.height;
    }

    if (maxLength === 0 || maxWidth === 0 || totalHeight === 0) {
        const box = FALLBACK_BOXES.find(b => totalWeight < b.below) ?? LARGEST_BOX;
        console.log(`[consolidation] Using ${box.length}×${box.width}×${box.height} cm box for ${totalWeight} kg`);
        return { totalWeight, maxLength: box.length, maxWidth: box.width, totalHeight: box.height };
    }
    return { totalWeight, maxLength, maxWidth, totalHeight };
}

export function consolidationFee(count: number): number {
    if (count <= 1) return 0;
    return FEE_PER_EXTRA_PACKAGE_JPY * (count - 1);
}

export interface ConsolidationInput {
    packageInfo: PackageInfo;
    landedCost: LandedCost;
}

/**
 * Compares shipping the packages as one consolidated box against shipping
 * each one on its own. Item price, domestic shipping and service fee carry
 * over per package; international shipping and customs are recomputed for
 * the combined box.
 */
export function summarizeConsolidation(
    entries: readonly ConsolidationInput[],
    requestedMethod: string | undefined,
    exchangeRate: number,
): ConsolidationSummary {
    const shippingMethod = resolveShippingMethod(requestedMethod);
    const dimensions = consolidatePackages(entries.map(e => e.packageInfo));
    const quote = quoteShipping(
        dimensions.totalWeight,
        dimensions.maxLength,
        dimensions.maxWidth,
        dimensions.totalHeight,
        exchangeRate,
    )[shippingMethod];

    const feeJpy = consolidationFee(entries.length);
    const feeUsd = feeJpy * exchangeRate;

    let perPackageUsd = 0;
    let itemPriceUsd = 0;
    let individualTotal = 0;
    for (const { landedCost } of entries) {
        perPackageUsd += landedCost.itemPriceUsd + landedCost.domesticShippingUsd + landedCost.serviceFeeUsd;
        itemPriceUsd += landedCost.itemPriceUsd;
        individualTotal += roundUsd(landedCost.totalUsd);
    }
    const customs = calculateCustoms(itemPriceUsd);
    const consolidatedTotal = perPackageUsd + feeUsd + quote.costUsd + customs.duty + customs.processingFee;

    console.log(
        `[consolidation] ${entries.length} packages via ${shippingMethod}: ` +
        `$${roundUsd(consolidatedTotal)} consolidated vs $${roundUsd(individualTotal)} individually`,
    );

    return {
        packageCount: entries.length,
        consolidatedTotal: roundUsd(consolidatedTotal),
        individualTotal: roundUsd(individualTotal),
        savings: roundUsd(individualTotal - consolidatedTotal),
        consolidationFeeJpy: feeJpy,
        consolidationFeeUsd: roundUsd(feeUsd),
        consolidatedShippingJpy: roundJpy(quote.costJpy),
        consolidatedShippingUsd: roundUsd(quote.costUsd),
        shippingMethod,
        dimensions,
    };
}
