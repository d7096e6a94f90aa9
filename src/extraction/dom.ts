import * as cheerio from 'cheerio';
import { ParseError } from '../domain/errors';
import { RECOMMENDED_ITEMS_SELECTOR } from './marketplaces';

export function loadDocument(html: string, source: string): cheerio.CheerioAPI {
    if (!html.trim()) {
        throw new ParseError(source, 'Page body is empty');
    }
    try {
        return cheerio.load(html);
    } catch (err) {
        throw new ParseError(
            source,
            `Could not parse page: ${err instanceof Error ? err.message : 'unknown error'}`,
            err instanceof Error ? err : undefined,
        );
    }
}

export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

// Page text a shopper would see; script and style bodies are left out.
export function visibleText($: cheerio.CheerioAPI): string {
    const root = $.root().clone();
    root.find('script, style, noscript, template').remove();
    return root.text();
}

// Listing pages embed "recommended" / "similar items" carousels whose prices
// must never be mistaken for the listing's own.
export function removeRecommendedItems($: cheerio.CheerioAPI): void {
    $(RECOMMENDED_ITEMS_SELECTOR).remove();
}

export function firstText($: cheerio.CheerioAPI, selectors: readonly string[]): string {
    for (const selector of selectors) {
        for (const el of $(selector).toArray()) {
            const text = collapseWhitespace($(el).text());
            if (text) return text;
        }
    }
    return '';
}
