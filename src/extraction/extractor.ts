import {
    ExtractionResult,
    Marketplace,
    PackageInfo,
    PriceSource,
} from '../domain/models';
import { DocumentFetcher } from './fetcher';
import { classifyLink, detectMarketplace, parseSourceId } from './link';
import { profileFor } from './marketplaces';
import { firstText, loadDocument, visibleText } from './dom';
import { ITEM_PRICE_CHAIN, runPriceChain } from './price-strategies';
import { findDimensionsCm, findWeightKg, firstShipmentPrice } from './text-patterns';
import { domesticShippingFor, fillFromCategory } from './estimates';

const ITEM_TITLE_SELECTORS = [
    'h1.product-title',
    'h1.item-title',
    '.rakuma-item-title',
    '.item-title',
    'h1',
    '.product-name',
    '.item-name',
    '[data-testid="item-title"]',
    'title',
];
const SHIPMENT_TITLE_SELECTORS = ['h1', 'title'];
const SITE_SUFFIX = /\s*-\s*Buyee.*$/i;

export function emptyPackage(sourceId: string = ''): PackageInfo {
    return {
        itemPrice: 0,
        declaredValue: 0,
        weight: 0,
        length: 0,
        width: 0,
        height: 0,
        domesticShippingFee: 0,
        serviceFee: 0,
        itemName: '',
        sourceId,
    };
}

function sourceName(link: string): string {
    try {
        return new URL(link).hostname;
    } catch {
        return 'page';
    }
}

/**
 * Turns a fetched page into a best-effort PackageInfo. Missing signals come
 * back as zeros (then category estimates); only an unloadable page throws.
 */
export function analyzePage(link: string, html: string): ExtractionResult {
    const linkKind = classifyLink(link);
    const marketplace = linkKind === 'item' ? detectMarketplace(link) : Marketplace.Generic;
    const $ = loadDocument(html, sourceName(link));

    let itemName: string;
    let price = 0;
    let priceSource: PriceSource = 'none';

    if (linkKind === 'item') {
        itemName = firstText($, ITEM_TITLE_SELECTORS).replace(SITE_SUFFIX, '').trim();
        const match = runPriceChain(ITEM_PRICE_CHAIN, { $, profile: profileFor(marketplace) });
        if (match) {
            price = match.price;
            priceSource = match.source;
        }
    } else {
        itemName = firstText($, SHIPMENT_TITLE_SELECTORS).replace(SITE_SUFFIX, '').trim();
        const shipmentPrice = firstShipmentPrice(visibleText($));
        if (shipmentPrice !== null) {
            price = shipmentPrice;
            priceSource = 'free_text';
        }
    }

    const text = visibleText($);
    const weight = findWeightKg(text) ?? 0;
    const dimensions = findDimensionsCm(text);

    const resolved = fillFromCategory({
        ...emptyPackage(parseSourceId(link, linkKind)),
        itemName,
        itemPrice: price,
        declaredValue: price,
        weight,
        length: dimensions?.length ?? 0,
        width: dimensions?.width ?? 0,
        height: dimensions?.height ?? 0,
    });
    const packageInfo: PackageInfo = {
        ...resolved.packageInfo,
        domesticShippingFee: domesticShippingFor(resolved.packageInfo),
    };

    console.log(
        `[extractor] ${linkKind} link (${marketplace}): price ${price} JPY via ${priceSource}, ` +
        `${packageInfo.weight} kg (${resolved.weightSource}), ` +
        `${packageInfo.length}×${packageInfo.width}×${packageInfo.height} cm (${resolved.dimensionSource})`,
    );

    return {
        packageInfo,
        report: {
            linkKind,
            marketplace,
            priceSource,
            weightSource: resolved.weightSource,
            dimensionSource: resolved.dimensionSource,
            ...(resolved.category ? { category: resolved.category } : {}),
        },
    };
}

export class PackageExtractor {
    private fetcher: DocumentFetcher;

    constructor(fetcher: DocumentFetcher) {
        this.fetcher = fetcher;
    }

    // Fetch failures propagate untouched; the caller decides whether overrides can stand in.
    async fetchAndAnalyze(link: string): Promise<ExtractionResult> {
        const html = await this.fetcher.fetch(link);
        return analyzePage(link, html);
    }

    async fetchAndExtract(link: string): Promise<PackageInfo> {
        return (await this.fetchAndAnalyze(link)).packageInfo;
    }

    analyze(link: string, html: string): ExtractionResult {
        return analyzePage(link, html);
    }

    extract(link: string, html: string): PackageInfo {
        return analyzePage(link, html).packageInfo;
    }
}
