export * from './domain';
export type {
    ValidatedLandedCostRequest,
    ValidatedBatchRequest,
    ValidatedSavedAddress,
} from './domain/schemas';
export { PackageExtractor, analyzePage } from './extraction/extractor';
export type { DocumentFetcher } from './extraction/fetcher';
export { HttpDocumentFetcher } from './extraction/fetcher';
export { classifyCategory, estimateForCategory } from './extraction/category';
export { classifyLink, detectMarketplace } from './extraction/link';
export {
    quoteShipping,
    volumetricWeight,
    chargeableWeight,
    resolveShippingMethod,
    getSupportedMethods,
    DEFAULT_SHIPPING_METHOD,
} from './pricing/shipping';
export { calculateServiceFee } from './pricing/service-fee';
export { calculateCustoms, TARIFF_RATE, PROCESSING_FEE_USD } from './pricing/customs';
export { consolidatePackages, consolidationFee, summarizeConsolidation } from './pricing/consolidation';
export { assembleLandedCost, toLandedCostResult } from './pricing/assembler';
export type { ExchangeRateProvider } from './fx/exchange-rate';
export { HttpExchangeRateProvider, FixedExchangeRateProvider } from './fx/exchange-rate';
export { LandedCostService } from './services/landed-cost.service';
export { CalculationHistoryRepository, SavedAddressRepository } from './db/repository';
export type { Destination, HistoryEntry, HistoryStats, SavedAddress } from './db/repository';
export { createPool, closePool } from './db/pool';
export { loadConfig } from './config';
export type { AppConfig, FetchConfig, ExchangeRateConfig, DbConfig } from './config';
