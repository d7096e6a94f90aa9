import {
    ExtractionReport,
    LandedCost,
    LandedCostResult,
    PackageInfo,
} from '../domain/models';
import { quoteShipping, resolveShippingMethod } from './shipping';
import { calculateServiceFee } from './service-fee';
import { calculateCustoms } from './customs';
import { roundJpy, roundUsd } from './rounding';

/**
 * Full cost of one package at one exchange rate (USD per JPY). Pure: the
 * package is not touched and the same inputs always give the same figures.
 * An unsupported carrier name resolves to the default carrier.
 */
export function assembleLandedCost(
    pkg: PackageInfo,
    requestedMethod: string | undefined,
    exchangeRate: number,
): LandedCost {
    const shippingMethod = resolveShippingMethod(requestedMethod);
    const quote = quoteShipping(pkg.weight, pkg.length, pkg.width, pkg.height, exchangeRate)[shippingMethod];

    const serviceFeeJpy = calculateServiceFee(pkg.itemPrice);
    const itemPriceUsd = pkg.itemPrice * exchangeRate;
    const domesticShippingUsd = pkg.domesticShippingFee * exchangeRate;
    const serviceFeeUsd = serviceFeeJpy * exchangeRate;
    const customs = calculateCustoms(pkg.declaredValue * exchangeRate);

    const totalJpy = pkg.itemPrice + pkg.domesticShippingFee + serviceFeeJpy + quote.costJpy;
    const totalUsd =
        itemPriceUsd + domesticShippingUsd + serviceFeeUsd + quote.costUsd + customs.duty + customs.processingFee;

    return {
        itemPriceJpy: pkg.itemPrice,
        itemPriceUsd,
        domesticShippingJpy: pkg.domesticShippingFee,
        domesticShippingUsd,
        serviceFeeJpy,
        serviceFeeUsd,
        internationalShippingJpy: quote.costJpy,
        internationalShippingUsd: quote.costUsd,
        customsDutyUsd: customs.duty,
        customsProcessingFeeUsd: customs.processingFee,
        totalJpy,
        totalUsd,
        exchangeRate,
        shippingMethod,
    };
}

export function toLandedCostResult(
    link: string,
    pkg: PackageInfo,
    cost: LandedCost,
    extraction: ExtractionReport,
    requestedShippingMethod: string,
): LandedCostResult {
    return {
        link,
        itemName: pkg.itemName,
        requestedShippingMethod,
        shippingMethod: cost.shippingMethod,
        exchangeRate: cost.exchangeRate,
        itemPriceJpy: roundJpy(cost.itemPriceJpy),
        itemPriceUsd: roundUsd(cost.itemPriceUsd),
        domesticShippingJpy: roundJpy(cost.domesticShippingJpy),
        domesticShippingUsd: roundUsd(cost.domesticShippingUsd),
        serviceFeeJpy: roundJpy(cost.serviceFeeJpy),
        serviceFeeUsd: roundUsd(cost.serviceFeeUsd),
        internationalShippingJpy: roundJpy(cost.internationalShippingJpy),
        internationalShippingUsd: roundUsd(cost.internationalShippingUsd),
        customsDutyUsd: roundUsd(cost.customsDutyUsd),
        customsProcessingFeeUsd: roundUsd(cost.customsProcessingFeeUsd),
        totalJpy: roundJpy(cost.totalJpy),
        totalUsd: roundUsd(cost.totalUsd),
        extraction,
        bestEffort: true,
    };
}
