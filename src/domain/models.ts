export enum ShippingMethod {
    FedExAir = 'FedEx Air',
    Ems = 'EMS',
    FedExEconomy = 'FedEx Economy',
    Dhl = 'DHL',
    AirDelivery = 'Buyee Air Delivery',
}
export enum Category {
    Footwear = 'footwear',
    Outerwear = 'outerwear',
    Pants = 'pants',
    TShirt = 't_shirt',
    Hoodie = 'hoodie',
    Dress = 'dress',
    Accessories = 'accessories',
    Jewelry = 'jewelry',
    General = 'general',
}
export enum Marketplace {
    Rakuma = 'rakuma',
    Yahoo = 'yahoo',
    Mercari = 'mercari',
    Generic = 'generic',
}
export type LinkKind = 'item' | 'shipment';

export type PriceSource =
    | 'structured_data'
    | 'meta_tag'
    | 'data_attribute'
    | 'selector'
    | 'free_text'
    | 'manual'
    | 'none';

export type PhysicalSource = 'page' | 'category' | 'manual';
// All money in JPY, weight in kg, dimensions in cm. 0 means "not determined yet".
export interface PackageInfo {
    itemPrice: number;
    declaredValue: number;       // customs basis, normally the item price
    weight: number;
    length: number;
    width: number;
    height: number;
    domesticShippingFee: number;
    serviceFee: number;
    itemName: string;
    sourceId: string;            // listing or package id parsed from the link
}
export interface ExtractionReport {
    linkKind: LinkKind;
    marketplace: Marketplace;
    priceSource: PriceSource;
    weightSource: PhysicalSource;
    dimensionSource: PhysicalSource;
    category?: Category;         // set only when the classifier was consulted
}

export interface ExtractionResult {
    packageInfo: PackageInfo;
    report: ExtractionReport;
}
export interface CategoryEstimate {
    weight: number;
    length: number;
    width: number;
    height: number;
}
export interface ShippingQuote {
    carrier: ShippingMethod;
    costJpy: number;
    costUsd: number;             // 0 until converted
    estimatedDays: number;
}

export type ShippingQuotes = Readonly<Record<ShippingMethod, ShippingQuote>>;

export interface CustomsCharges {
    duty: number;
    processingFee: number;
}
export interface ConsolidatedDimensions {
    totalWeight: number;
    maxLength: number;
    maxWidth: number;
    totalHeight: number;
}
export interface LandedCost {
    itemPriceJpy: number;
    itemPriceUsd: number;
    domesticShippingJpy: number;
    domesticShippingUsd: number;
    serviceFeeJpy: number;
    serviceFeeUsd: number;
    internationalShippingJpy: number;
    internationalShippingUsd: number;
    customsDutyUsd: number;
    customsProcessingFeeUsd: number;
    totalJpy: number;             // customs excluded, it is billed in USD only
    totalUsd: number;
    exchangeRate: number;         // USD per 1 JPY
    shippingMethod: ShippingMethod;
}
export interface ManualOverrides {
    weight?: number;
    length?: number;
    width?: number;
    height?: number;
    price?: number;
}
export interface LandedCostRequest {
    link: string;
    shippingMethod?: string;
    destinationAddress: string;
    destinationZip: string;
    overrides?: ManualOverrides;
    saveToHistory?: boolean;
}
export interface BatchRequest {
    links: string[];
    shippingMethod?: string;
    destinationAddress: string;
    destinationZip: string;
    consolidated?: boolean;
    saveToHistory?: boolean;
}
// Flat, rounded view of a LandedCost: JPY to whole yen, USD to cents.
export interface LandedCostResult {
    link: string;
    itemName: string;
    requestedShippingMethod: string;
    shippingMethod: ShippingMethod;
    exchangeRate: number;
    itemPriceJpy: number;
    itemPriceUsd: number;
    domesticShippingJpy: number;
    domesticShippingUsd: number;
    serviceFeeJpy: number;
    serviceFeeUsd: number;
    internationalShippingJpy: number;
    internationalShippingUsd: number;
    customsDutyUsd: number;
    customsProcessingFeeUsd: number;
    totalJpy: number;
    totalUsd: number;
    extraction: ExtractionReport;
    bestEffort: true;
    historyId?: number;
}

export type BatchEntry =
    | { success: true; link: string; result: LandedCostResult; packageInfo: PackageInfo; landedCost: LandedCost }
    | { success: false; link: string; error: string; code: string };

export interface ConsolidationSummary {
    packageCount: number;
    consolidatedTotal: number;
    individualTotal: number;
    savings: number;
    consolidationFeeJpy: number;
    consolidationFeeUsd: number;
    consolidatedShippingJpy: number;
    consolidatedShippingUsd: number;
    shippingMethod: ShippingMethod;
    dimensions: ConsolidatedDimensions;
}
export interface BatchResult {
    results: BatchEntry[];
    consolidated: boolean;
    count: number;
    successCount: number;
    totalAll: number;
    exchangeRate: number;
    consolidation?: ConsolidationSummary;
}
