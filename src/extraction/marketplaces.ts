import { Marketplace } from '../domain/models';

export interface MarketplaceProfile {
    marketplace: Marketplace;
    /** Tried in order; the first element carrying a plausible yen figure wins. */
    priceSelectors: readonly string[];
    /** 'first' looks only at the first element each selector matches. */
    selectorScope: 'first' | 'all';
    /** Scan the generic selectors afterwards and keep the largest figure. */
    scanGenericSelectors: boolean;
    /**
     * Free-text candidates below this are assumed to be shipping or fee lines.
     * Observed thresholds, not guarantees: bundle and multi-variant listings can
     * still fool the "largest figure is the item price" rule.
     */
    minFreeTextPrice: number;
}

export const RECOMMENDED_ITEMS_SELECTOR =
    '.recommendItem, .recommend-item, [class*="recommendItem"], [class*="recommend-item"], [class*="recommend"], [class*="similar"]';

export const GENERIC_PRICE_SELECTORS: readonly string[] = [
    '.item-price',
    '.product-price',
    '[data-testid="price"]',
    '.price-value',
    'div[class*="itemDetail"]',
    'div[class*="ItemDetail"]',
];

const PROFILES: Readonly<Record<Marketplace, MarketplaceProfile>> = Object.freeze({
    [Marketplace.Rakuma]: {
        marketplace: Marketplace.Rakuma,
        priceSelectors: [
            '.attrContainer__price',
            'dl.attrContainer__priceCompo',
            'div[class*="attrContainer__price"]',
            'span[class*="price"]',
            'div[class*="price"]',
            '.item-price',
            '.product-price',
        ],
        selectorScope: 'all',
        scanGenericSelectors: false,
        minFreeTextPrice: 2000,
    },
    [Marketplace.Yahoo]: {
        marketplace: Marketplace.Yahoo,
        priceSelectors: [
            '.current_price',
            'div.current_price',
            '.price-tax',
            'div[class*="auction"] div[class*="price"]',
            'div[class*="goodsDetail"] div[class*="price"]',
        ],
        selectorScope: 'first',
        scanGenericSelectors: true,
        minFreeTextPrice: 5000,     // buyout price is the big one; bids and fees sit well below
    },
    [Marketplace.Mercari]: {
        marketplace: Marketplace.Mercari,
        priceSelectors: [
            '.m-goodsDetail__price',
            'div.m-goodsDetail__price',
            'div.itemDetail__price',
            'div[class*="itemDetail"] div[class*="price"]:not([class*="recommend"])',
            '.itemDetail__priceValue',
            'div.itemDetail__inner div[class*="price"]',
        ],
        selectorScope: 'first',
        scanGenericSelectors: true,
        minFreeTextPrice: 1000,
    },
    [Marketplace.Generic]: {
        marketplace: Marketplace.Generic,
        priceSelectors: [],
        selectorScope: 'first',
        scanGenericSelectors: true,
        minFreeTextPrice: 1000,
    },
});

export function profileFor(marketplace: Marketplace): MarketplaceProfile {
    return PROFILES[marketplace];
}
