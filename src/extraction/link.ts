import { LinkKind, Marketplace } from '../domain/models';

function pathOf(link: string): string {
    try {
        return new URL(link).pathname;
    } catch {
        return '';
    }
}

/**
 * Item links point at a listing that hasn't been bought yet; anything else is
 * treated as a shipment page for a package already sitting in the warehouse.
 */
export function classifyLink(link: string): LinkKind {
    const path = pathOf(link).toLowerCase();
    const lower = link.toLowerCase();
    if (path.includes('/item/') || path.includes('/auction/')) return 'item';
    if (lower.includes('yahoo') || lower.includes('mercari') || lower.includes('rakuma')) return 'item';
    return 'shipment';
}

export function detectMarketplace(link: string): Marketplace {
    const lower = link.toLowerCase();
    if (lower.includes('rakuma')) return Marketplace.Rakuma;
    if (lower.includes('yahoo') || lower.includes('auction')) return Marketplace.Yahoo;
    if (lower.includes('mercari')) return Marketplace.Mercari;
    return Marketplace.Generic;
}

export function parseSourceId(link: string, kind: LinkKind): string {
    const path = pathOf(link);
    if (kind === 'item') {
        if (!path.includes('/item/')) return '';
        if (path.includes('/rakuma/item/')) {
            return path.match(/\/rakuma\/item\/([^/?]+)/)?.[1] ?? '';
        }
        // last segment under /item/: /item/<id>, /item/<platform>/<id>, /item/jdirectitems/auction/<id>
        return path.match(/\/item\/(?:[^/]+\/)*([^/]+)\/?$/)?.[1] ?? '';
    }
    if (!path.includes('package')) return '';
    return path.match(/package[/-]?(\d+)/)?.[1] ?? '';
}
