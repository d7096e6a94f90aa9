import { ExtractionResult, ManualOverrides, Marketplace, PackageInfo } from '../domain/models';
import { classifyLink, detectMarketplace, parseSourceId } from './link';
import { emptyPackage } from './extractor';
import { domesticShippingFor, fillFromCategory } from './estimates';

export function hasAnyOverride(overrides?: ManualOverrides): boolean {
    if (!overrides) return false;
    return Object.values(overrides).some(v => typeof v === 'number' && v > 0);
}

// Price, weight and every dimension supplied: nothing left to scrape.
export function isCompleteOverride(overrides?: ManualOverrides): boolean {
    if (!overrides) return false;
    const { price, weight, length, width, height } = overrides;
    return [price, weight, length, width, height].every(v => typeof v === 'number' && v > 0);
}

/**
 * Layers caller-supplied values over an extraction. Domestic shipping is
 * re-estimated when the weight changes.
 */
export function applyOverrides(result: ExtractionResult, overrides?: ManualOverrides): ExtractionResult {
    if (!hasAnyOverride(overrides) || !overrides) return result;

    const pkg: PackageInfo = { ...result.packageInfo };
    const report = { ...result.report };

    if (overrides.weight) {
        pkg.weight = overrides.weight;
        pkg.domesticShippingFee = domesticShippingFor(pkg);
        report.weightSource = 'manual';
    }
    if (overrides.length || overrides.width || overrides.height) {
        pkg.length = overrides.length ?? pkg.length;
        pkg.width = overrides.width ?? pkg.width;
        pkg.height = overrides.height ?? pkg.height;
        report.dimensionSource = 'manual';
    }
    if (overrides.price) {
        pkg.itemPrice = overrides.price;
        pkg.declaredValue = overrides.price;
        report.priceSource = 'manual';
    }

    return { packageInfo: pkg, report };
}

/** Builds a package from overrides alone, estimating whatever they leave out. */
export function packageFromOverrides(link: string, overrides: ManualOverrides): ExtractionResult {
    const linkKind = classifyLink(link);
    const base: PackageInfo = {
        ...emptyPackage(parseSourceId(link, linkKind)),
        itemPrice: overrides.price ?? 0,
        declaredValue: overrides.price ?? 0,
        weight: overrides.weight ?? 0,
        length: overrides.length ?? 0,
        width: overrides.width ?? 0,
        height: overrides.height ?? 0,
    };
    const resolved = fillFromCategory(base, { weight: 'manual', dimensions: 'manual' });

    return {
        packageInfo: {
            ...resolved.packageInfo,
            domesticShippingFee: domesticShippingFor(resolved.packageInfo),
        },
        report: {
            linkKind,
            marketplace: linkKind === 'item' ? detectMarketplace(link) : Marketplace.Generic,
            priceSource: overrides.price ? 'manual' : 'none',
            weightSource: resolved.weightSource,
            dimensionSource: resolved.dimensionSource,
            ...(resolved.category ? { category: resolved.category } : {}),
        },
    };
}
