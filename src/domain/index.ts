export { ShippingMethod, Category, Marketplace } from './models';
export type {
    LinkKind,
    PriceSource,
    PhysicalSource,
    PackageInfo,
    ExtractionReport,
    ExtractionResult,
    CategoryEstimate,
    ShippingQuote,
    ShippingQuotes,
    CustomsCharges,
    ConsolidatedDimensions,
    LandedCost,
    ManualOverrides,
    LandedCostRequest,
    BatchRequest,
    LandedCostResult,
    BatchEntry,
    ConsolidationSummary,
    BatchResult,
} from './models';

export {
    overridesSchema,
    landedCostRequestSchema,
    batchRequestSchema,
    savedAddressSchema,
    validateLandedCostRequest,
    validateBatchRequest,
    validateSavedAddress,
} from './schemas';

export {
    LandedCostError,
    FetchError,
    HttpStatusError,
    RateLimitError,
    NetworkError,
    TimeoutError,
    ValidationError,
    ParseError,
    isFetchFailure,
} from './errors';
export type { ErrorCode, LandedCostErrorOptions, SerializedError } from './errors';
