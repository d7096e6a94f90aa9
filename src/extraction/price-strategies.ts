import type { CheerioAPI } from 'cheerio';
import { PriceSource } from '../domain/models';
import { GENERIC_PRICE_SELECTORS, MarketplaceProfile } from './marketplaces';
import { removeRecommendedItems, visibleText } from './dom';
import {
    collectYenFigures,
    isPlausiblePrice,
    parsePriceValue,
    yenFigureFromText,
} from './text-patterns';

export interface ExtractionContext {
    $: CheerioAPI;
    profile: MarketplaceProfile;
}

export interface PriceStrategy {
    readonly source: PriceSource;
    extract(ctx: ExtractionContext): number | null;
}

export interface PriceMatch {
    price: number;
    source: PriceSource;
}

function plausible(value: number | null): number | null {
    return value !== null && isPlausiblePrice(value) ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// A JSON-LD block may hold one node, an array of nodes, or an @graph.
function flattenJsonLd(data: unknown): Record<string, unknown>[] {
    if (Array.isArray(data)) return data.flatMap(flattenJsonLd);
    if (!isRecord(data)) return [];
    const graph = data['@graph'];
    return Array.isArray(graph) ? [data, ...graph.flatMap(flattenJsonLd)] : [data];
}

function offerPrice(offers: unknown): number | null {
    const list = Array.isArray(offers) ? offers : [offers];
    for (const offer of list) {
        if (!isRecord(offer) || !('price' in offer)) continue;
        const price = plausible(parsePriceValue(offer.price));
        if (price !== null) return price;
    }
    return null;
}

export const structuredDataPrice: PriceStrategy = {
    source: 'structured_data',
    extract({ $ }) {
        for (const script of $('script[type="application/ld+json"]').toArray()) {
            const raw = $(script).text().trim();
            if (!raw) continue;
            let data: unknown;
            try {
                data = JSON.parse(raw);
            } catch (err) {
                console.warn('[extractor] Skipping malformed JSON-LD block:', err instanceof Error ? err.message : err);
                continue;
            }
            for (const node of flattenJsonLd(data)) {
                if (!('offers' in node)) continue;
                const price = offerPrice(node.offers);
                if (price !== null) return price;
            }
        }
        return null;
    },
};

export const metaTagPrice: PriceStrategy = {
    source: 'meta_tag',
    extract({ $ }) {
        const content = $('meta[property="product:price:amount"]').first().attr('content');
        return plausible(parsePriceValue(content));
    },
};

export const dataAttributePrice: PriceStrategy = {
    source: 'data_attribute',
    extract({ $ }) {
        for (const el of $('[data-price]').toArray()) {
            const price = plausible(parsePriceValue($(el).attr('data-price')));
            if (price !== null) return price;
        }
        return null;
    },
};

export const selectorPrice: PriceStrategy = {
    source: 'selector',
    extract({ $, profile }) {
        removeRecommendedItems($);

        for (const selector of profile.priceSelectors) {
            const matched = $(selector);
            const scoped = profile.selectorScope === 'first' ? matched.first() : matched;
            for (const el of scoped.toArray()) {
                const price = yenFigureFromText($(el).text());
                if (price !== null) return price;
            }
        }
        if (!profile.scanGenericSelectors) return null;

        // The listing price is usually the biggest figure left once carousels are gone.
        const found: number[] = [];
        for (const selector of GENERIC_PRICE_SELECTORS) {
            for (const el of $(selector).toArray()) {
                const price = yenFigureFromText($(el).text());
                if (price !== null) found.push(price);
            }
        }
        return found.length > 0 ? Math.max(...found) : null;
    },
};

/**
 * Best-effort: picks the largest yen figure that clears the marketplace's
 * minimum, or the largest overall if none does.
 */
export function pickListingPrice(candidates: readonly number[], minPrice: number): number | null {
    if (candidates.length === 0) return null;
    const filtered = candidates.filter(p => p >= minPrice);
    return Math.max(...(filtered.length > 0 ? filtered : candidates));
}

export const freeTextPrice: PriceStrategy = {
    source: 'free_text',
    extract({ $, profile }) {
        removeRecommendedItems($);
        const candidates = collectYenFigures(visibleText($));
        return pickListingPrice(candidates, profile.minFreeTextPrice);
    },
};

export const ITEM_PRICE_CHAIN: readonly PriceStrategy[] = [
    structuredDataPrice,
    metaTagPrice,
    dataAttributePrice,
    selectorPrice,
    freeTextPrice,
];

export function runPriceChain(
    chain: readonly PriceStrategy[],
    ctx: ExtractionContext,
): PriceMatch | null {
    for (const strategy of chain) {
        const price = strategy.extract(ctx);
        if (price !== null) {
            return { price, source: strategy.source };
        }
    }
    return null;
}
