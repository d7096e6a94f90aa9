// Proxy fee brackets in JPY. The middle bracket is higher than the top one;
// that matches what the service actually charges.
const FEE_BRACKETS: ReadonlyArray<{ below: number; rate: number }> = [
    { below: 9000, rate: 0.0473 },
    { below: 10000, rate: 0.0763 },
];
const TOP_RATE = 0.0717;

export function serviceFeeRate(itemPrice: number): number {
    return FEE_BRACKETS.find(b => itemPrice < b.below)?.rate ?? TOP_RATE;
}

export function calculateServiceFee(itemPrice: number): number {
    if (itemPrice <= 0) return 0;
    return Math.round(itemPrice * serviceFeeRate(itemPrice));
}
