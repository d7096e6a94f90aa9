import { ShippingMethod, ShippingQuote, ShippingQuotes } from '../domain/models';

export const DEFAULT_SHIPPING_METHOD = ShippingMethod.Ems;

const VOLUMETRIC_DIVISOR = 5000;      // cm³ per kg

// FedEx Air price per chargeable-weight band, JPY. Taken from real invoices.
const BASE_RATE_BANDS: ReadonlyArray<{ maxKg: number; rate: number }> = [
    { maxKg: 0.3, rate: 5400 },
    { maxKg: 0.5, rate: 6500 },
    { maxKg: 1.0, rate: 8278 },
    { maxKg: 1.5, rate: 10000 },
    { maxKg: 2.0, rate: 12600 },
];
const SURCHARGE_PER_EXTRA_KG = 3000;

interface CarrierInfo {
    factor: number;          // share of the FedEx Air base rate
    estimatedDays: number;
}
// Carriers move together with weight, so everything hangs off one base rate.
const CARRIERS: Readonly<Record<ShippingMethod, CarrierInfo>> = Object.freeze({
    [ShippingMethod.FedExAir]: { factor: 1.0, estimatedDays: 3 },
    [ShippingMethod.Ems]: { factor: 0.75, estimatedDays: 5 },
    [ShippingMethod.FedExEconomy]: { factor: 0.85, estimatedDays: 7 },
    [ShippingMethod.Dhl]: { factor: 0.95, estimatedDays: 4 },
    [ShippingMethod.AirDelivery]: { factor: 0.9, estimatedDays: 4 },
});

export function volumetricWeight(length: number, width: number, height: number): number {
    if (length <= 0 || width <= 0 || height <= 0) return 0;
    return (length * width * height) / VOLUMETRIC_DIVISOR;
}

export function chargeableWeight(weight: number, length: number, width: number, height: number): number {
    return Math.max(weight, volumetricWeight(length, width, height));
}

export function baseRate(chargeableKg: number): number {
    const band = BASE_RATE_BANDS.find(b => chargeableKg <= b.maxKg);
    if (band) return band.rate;
    const top = BASE_RATE_BANDS[BASE_RATE_BANDS.length - 1];
    return top.rate + (chargeableKg - top.maxKg) * SURCHARGE_PER_EXTRA_KG;
}

/** Quotes every carrier; `exchangeRate` (USD per JPY) fills costUsd when given. */
export function quoteShipping(
    weight: number,
    length: number,
    width: number,
    height: number,
    exchangeRate: number = 0,
): ShippingQuotes {
    const base = baseRate(chargeableWeight(weight, length, width, height));
    const quote = (carrier: ShippingMethod): ShippingQuote => {
        const costJpy = base * CARRIERS[carrier].factor;
        return {
            carrier,
            costJpy,
            costUsd: costJpy * exchangeRate,
            estimatedDays: CARRIERS[carrier].estimatedDays,
        };
    };
    return Object.freeze({
        [ShippingMethod.FedExAir]: quote(ShippingMethod.FedExAir),
        [ShippingMethod.Ems]: quote(ShippingMethod.Ems),
        [ShippingMethod.FedExEconomy]: quote(ShippingMethod.FedExEconomy),
        [ShippingMethod.Dhl]: quote(ShippingMethod.Dhl),
        [ShippingMethod.AirDelivery]: quote(ShippingMethod.AirDelivery),
    });
}

export function getSupportedMethods(): ShippingMethod[] {
    return Object.values(ShippingMethod);
}

/** Case-insensitive lookup; anything unknown or missing becomes the default carrier. */
export function resolveShippingMethod(requested?: string): ShippingMethod {
    const wanted = requested?.trim().toLowerCase();
    if (!wanted) return DEFAULT_SHIPPING_METHOD;
    return getSupportedMethods().find(m => m.toLowerCase() === wanted) ?? DEFAULT_SHIPPING_METHOD;
}

export function isSupportedMethod(requested: string): boolean {
    const wanted = requested.trim().toLowerCase();
    return getSupportedMethods().some(m => m.toLowerCase() === wanted);
}
