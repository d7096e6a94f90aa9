import { ZodError } from 'zod';
import {
    BatchEntry,
    BatchResult,
    ExtractionResult,
    LandedCost,
    LandedCostResult,
    ManualOverrides,
    PackageInfo,
    LandedCostError,
    ValidationError,
    isFetchFailure,
} from '../domain';
import {
    ValidatedBatchRequest,
    ValidatedLandedCostRequest,
    validateBatchRequest,
    validateLandedCostRequest,
} from '../domain/schemas';
import { PackageExtractor } from '../extraction/extractor';
import { applyOverrides, hasAnyOverride, isCompleteOverride, packageFromOverrides } from '../extraction/overrides';
import { ExchangeRateProvider } from '../fx/exchange-rate';
import { assembleLandedCost, toLandedCostResult } from '../pricing/assembler';
import { summarizeConsolidation } from '../pricing/consolidation';
import { DEFAULT_SHIPPING_METHOD, isSupportedMethod } from '../pricing/shipping';
import { roundUsd } from '../pricing/rounding';
import { CalculationHistoryRepository } from '../db/repository';

interface LandedCostServiceDeps {
    extractor: PackageExtractor;
    exchangeRates: ExchangeRateProvider;
    historyRepo?: CalculationHistoryRepository;   // optional, the engine runs without a database
}

interface PricedLink {
    result: LandedCostResult;
    packageInfo: PackageInfo;
    landedCost: LandedCost;
}

function toValidationError(err: unknown, message: string): unknown {
    if (err instanceof ZodError) {
        return new ValidationError(message, {
            issues: err.issues.map(issue => ({
                field: issue.path.join('.'),
                message: issue.message,
            })),
        });
    }
    return err;
}

export class LandedCostService {
    private extractor: PackageExtractor;
    private exchangeRates: ExchangeRateProvider;
    private historyRepo?: CalculationHistoryRepository;

    constructor(deps: LandedCostServiceDeps) {
        this.extractor = deps.extractor;
        this.exchangeRates = deps.exchangeRates;
        this.historyRepo = deps.historyRepo;
    }

    async calculate(rawRequest: unknown): Promise<LandedCostResult> {
        let request: ValidatedLandedCostRequest;
        try {
            request = validateLandedCostRequest(rawRequest);
        } catch (err) {
            throw toValidationError(err, 'Invalid landed cost request');
        }

        const exchangeRate = await this.exchangeRates.getJpyToUsd();
        const { result } = await this.priceLink(request.link, request.shippingMethod, exchangeRate, request.overrides);

        if (request.saveToHistory) await this.saveToHistory(result, request);
        return result;
    }

    /**
     * Prices every link at one exchange rate, one after another. A failing
     * link becomes a failed entry and never aborts the rest of the batch.
     */
    async calculateBatch(rawRequest: unknown): Promise<BatchResult> {
        let request: ValidatedBatchRequest;
        try {
            request = validateBatchRequest(rawRequest);
        } catch (err) {
            throw toValidationError(err, 'Invalid batch request');
        }

        const exchangeRate = await this.exchangeRates.getJpyToUsd();
        const results: BatchEntry[] = [];
        const priced: PricedLink[] = [];

        for (const link of request.links) {
            try {
                const entry = await this.priceLink(link, request.shippingMethod, exchangeRate);
                if (request.saveToHistory) await this.saveToHistory(entry.result, request);
                priced.push(entry);
                results.push({ success: true, link, ...entry });
            } catch (err) {
                console.warn(`[landed-cost] Batch link failed: ${link}:`, err instanceof Error ? err.message : err);
                results.push({
                    success: false,
                    link,
                    error: err instanceof Error ? err.message : String(err),
                    code: err instanceof LandedCostError ? err.code : 'UNKNOWN',
                });
            }
        }

        const consolidated = request.consolidated ?? false;
        const consolidation = consolidated && priced.length > 1
            ? summarizeConsolidation(priced, request.shippingMethod, exchangeRate)
            : undefined;
        // consolidated batches report the one-box total
        const totalAll = consolidation
            ? consolidation.consolidatedTotal
            : roundUsd(priced.reduce((sum, p) => sum + p.result.totalUsd, 0));

        return {
            results,
            consolidated,
            count: results.length,
            successCount: priced.length,
            totalAll,
            exchangeRate,
            ...(consolidation ? { consolidation } : {}),
        };
    }

    // A failed save is logged; the result is returned either way.
    private async saveToHistory(
        result: LandedCostResult,
        destination: { destinationAddress: string; destinationZip: string },
    ): Promise<void> {
        if (!this.historyRepo) return;
        try {
            result.historyId = await this.historyRepo.save(result, {
                address: destination.destinationAddress,
                zip: destination.destinationZip,
            });
        } catch (err) {
            console.error('[landed-cost] Failed to save calculation history:', err instanceof Error ? err.message : err);
        }
    }

    private async priceLink(
        link: string,
        shippingMethod: string | undefined,
        exchangeRate: number,
        overrides?: ManualOverrides,
    ): Promise<PricedLink> {
        const extraction = await this.resolvePackage(link, overrides);
        const landedCost = assembleLandedCost(extraction.packageInfo, shippingMethod, exchangeRate);
        const packageInfo: PackageInfo = { ...extraction.packageInfo, serviceFee: landedCost.serviceFeeJpy };

        if (shippingMethod && !isSupportedMethod(shippingMethod)) {
            console.warn(`[landed-cost] Unsupported shipping method "${shippingMethod}", using ${landedCost.shippingMethod}`);
        }

        const result = toLandedCostResult(
            link,
            packageInfo,
            landedCost,
            extraction.report,
            shippingMethod ?? DEFAULT_SHIPPING_METHOD,
        );
        return { result, packageInfo, landedCost };
    }

    private async resolvePackage(link: string, overrides?: ManualOverrides): Promise<ExtractionResult> {
        if (overrides && isCompleteOverride(overrides)) {
            console.log(`[landed-cost] All values supplied for ${link}, skipping fetch`);
            return packageFromOverrides(link, overrides);
        }

        try {
            const extraction = await this.extractor.fetchAndAnalyze(link);
            return applyOverrides(extraction, overrides);
        } catch (err) {
            if (overrides && hasAnyOverride(overrides) && isFetchFailure(err)) {
                console.warn(`[landed-cost] Fetch failed for ${link} (${err.code}), continuing from manual values`);
                return packageFromOverrides(link, overrides);
            }
            throw err;
        }
    }
}
