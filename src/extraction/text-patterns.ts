export const MIN_PLAUSIBLE_PRICE = 100;
export const MAX_PLAUSIBLE_PRICE = 10_000_000;

const MIN_WEIGHT_KG = 0.01;
const MAX_WEIGHT_KG = 50;
const MIN_DIMENSION_CM = 0.1;
const MAX_DIMENSION_CM = 200;

// "13,000", "13，000" (full-width comma) or plain "13000"
const YEN_NUMBER = '(?:\\d{1,3}(?:[,，]\\d{3})+|\\d+)';
// keeps "13000円" from being read as "000円"
const NOT_MID_NUMBER = '(?<![\\d,，.])';

const ELEMENT_YEN_FIGURE = new RegExp(`${NOT_MID_NUMBER}(${YEN_NUMBER})\\s*(?:円|YEN|JPY)`, 'i');

const PAGE_YEN_FIGURES: readonly RegExp[] = [
    new RegExp(`${NOT_MID_NUMBER}(${YEN_NUMBER})\\s*円`, 'g'),
    new RegExp(`[¥￥]\\s*(${YEN_NUMBER})`, 'g'),
    new RegExp(`JPY\\s*(${YEN_NUMBER})`, 'gi'),
    new RegExp(`${NOT_MID_NUMBER}(${YEN_NUMBER})\\s*YEN`, 'gi'),
];

const SHIPMENT_YEN_FIGURES: readonly RegExp[] = [
    new RegExp(`${NOT_MID_NUMBER}(${YEN_NUMBER})\\s*円`, 'g'),
    new RegExp(`JPY\\s*(${YEN_NUMBER})`, 'gi'),
];

// "1,200g" as well as "1.5kg"
const WEIGHT_NUMBER = '((?:\\d{1,3}(?:[,，]\\d{3})+|\\d+)(?:\\.\\d+)?)';

// labelled weight first, then any kg figure, then grams
const WEIGHT_PATTERNS: readonly RegExp[] = [
    new RegExp(`(?:重量|重さ)\\s*[：:]\\s*${WEIGHT_NUMBER}\\s*(kg|g|キロ|グラム)`, 'gi'),
    new RegExp(`(?<![\\d.,，])${WEIGHT_NUMBER}\\s*(kg|キロ)`, 'gi'),
    new RegExp(`(?<![\\d.,，])${WEIGHT_NUMBER}\\s*(g|グラム)(?![a-zA-Z])`, 'g'),
];

const DIMENSION_SEPARATOR = '\\s*[×xX*＊]\\s*';
const DIMENSION_NUMBER = '(\\d+(?:\\.\\d+)?)';
const DIMENSION_TRIPLET = [DIMENSION_NUMBER, DIMENSION_NUMBER, DIMENSION_NUMBER].join(DIMENSION_SEPARATOR);
const DIMENSION_PATTERNS: readonly RegExp[] = [
    new RegExp(`サイズ\\s*[：:]\\s*${DIMENSION_TRIPLET}`, 'g'),
    new RegExp(`${DIMENSION_TRIPLET}\\s*(?:cm|センチ)`, 'gi'),
];

export interface Dimensions {
    length: number;
    width: number;
    height: number;
}

export function isPlausiblePrice(value: number): boolean {
    return Number.isFinite(value) && value >= MIN_PLAUSIBLE_PRICE && value <= MAX_PLAUSIBLE_PRICE;
}
/**
 * Reads a price out of structured data or an attribute: numbers pass through,
 * strings may carry thousands separators. Returns null for anything else.
 */
export function parsePriceValue(raw: unknown): number | null {
    if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
    if (typeof raw !== 'string') return null;
    const cleaned = raw.replace(/[,，\s]/g, '');
    if (!cleaned) return null;
    const value = Number(cleaned);
    return Number.isFinite(value) ? value : null;
}

function parseYenNumber(raw: string): number {
    return Number(raw.replace(/[,，]/g, ''));
}

// First yen-suffixed figure in an element's text, if it is plausible.
export function yenFigureFromText(text: string): number | null {
    const match = text.match(ELEMENT_YEN_FIGURE);
    if (!match) return null;
    const value = parseYenNumber(match[1]);
    return isPlausiblePrice(value) ? value : null;
}

/** Every plausible yen figure on the page, deduplicated and sorted ascending. */
export function collectYenFigures(text: string): number[] {
    const found = new Set<number>();
    for (const re of PAGE_YEN_FIGURES) {
        for (const match of text.matchAll(re)) {
            const value = parseYenNumber(match[1]);
            if (isPlausiblePrice(value)) found.add(value);
        }
    }
    return Array.from(found).sort((a, b) => a - b);
}

export function firstShipmentPrice(text: string): number | null {
    for (const re of SHIPMENT_YEN_FIGURES) {
        for (const match of text.matchAll(re)) {
            const value = parseYenNumber(match[1]);
            if (isPlausiblePrice(value)) return value;
        }
    }
    return null;
}

function toKg(value: number, unit: string): number {
    const u = unit.toLowerCase();
    return u === 'kg' || u === 'キロ' ? value : value / 1000;
}

export function findWeightKg(text: string): number | null {
    for (const re of WEIGHT_PATTERNS) {
        for (const match of text.matchAll(re)) {
            const kg = toKg(parseYenNumber(match[1]), match[2]);
            if (kg >= MIN_WEIGHT_KG && kg <= MAX_WEIGHT_KG) return kg;
        }
    }
    return null;
}

export function findDimensionsCm(text: string): Dimensions | null {
    for (const re of DIMENSION_PATTERNS) {
        for (const match of text.matchAll(re)) {
            const [length, width, height] = [match[1], match[2], match[3]].map(Number);
            const inRange = [length, width, height].every(d => d >= MIN_DIMENSION_CM && d <= MAX_DIMENSION_CM);
            if (inRange) return { length, width, height };
        }
    }
    return null;
}
