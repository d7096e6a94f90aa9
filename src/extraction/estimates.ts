import { Category, PackageInfo, PhysicalSource } from '../domain/models';
import { classifyCategory, estimateForCategory } from './category';

export interface ResolvedPackage {
    packageInfo: PackageInfo;
    weightSource: PhysicalSource;
    dimensionSource: PhysicalSource;
    category?: Category;
}

function hasDimensions(pkg: PackageInfo): boolean {
    return pkg.length > 0 && pkg.width > 0 && pkg.height > 0;
}

/**
 * Fills a zero weight and/or incomplete dimensions from the category table.
 * Values already present are never replaced; weight and dimensions are
 * resolved independently.
 */
export function fillFromCategory(
    pkg: PackageInfo,
    sources: { weight: PhysicalSource; dimensions: PhysicalSource } = { weight: 'page', dimensions: 'page' },
): ResolvedPackage {
    const needsWeight = pkg.weight <= 0;
    const needsDimensions = !hasDimensions(pkg);
    if (!needsWeight && !needsDimensions) {
        return { packageInfo: pkg, weightSource: sources.weight, dimensionSource: sources.dimensions };
    }

    const category = classifyCategory(pkg.itemName);
    const estimate = estimateForCategory(category);
    const packageInfo: PackageInfo = { ...pkg };

    if (needsWeight) {
        packageInfo.weight = estimate.weight;
        console.log(`[extractor] Estimated weight ${estimate.weight} kg (category: ${category})`);
    }
    if (needsDimensions) {
        packageInfo.length = pkg.length > 0 ? pkg.length : estimate.length;
        packageInfo.width = pkg.width > 0 ? pkg.width : estimate.width;
        packageInfo.height = pkg.height > 0 ? pkg.height : estimate.height;
        console.log(
            `[extractor] Estimated dimensions ${packageInfo.length}×${packageInfo.width}×${packageInfo.height} cm (category: ${category})`,
        );
    }

    return {
        packageInfo,
        weightSource: needsWeight ? 'category' : sources.weight,
        dimensionSource: needsDimensions ? 'category' : sources.dimensions,
        category,
    };
}

// Seller-to-warehouse postage inside Japan, in JPY.
export function estimateDomesticShipping(weightKg: number): number {
    if (weightKg < 0.3) return 800;
    if (weightKg < 0.5) return 1000;
    return 1200;
}

export function domesticShippingFor(pkg: PackageInfo): number {
    const weight = pkg.weight > 0
        ? pkg.weight
        : estimateForCategory(classifyCategory(pkg.itemName)).weight;
    return estimateDomesticShipping(weight);
}
