import fs from 'fs';
import path from 'path';
import { PackageInfo } from '../src/domain/models';
import { DocumentFetcher } from '../src/extraction/fetcher';
import { PackageExtractor } from '../src/extraction/extractor';
import { FixedExchangeRateProvider } from '../src/fx/exchange-rate';
import { LandedCostService } from '../src/services/landed-cost.service';

export const TEST_RATE = 0.0067;

export function loadFixture(name: string): string {
    return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf8');
}

export function buildPackage(overrides?: Partial<PackageInfo>): PackageInfo {
    return {
        itemPrice: 8980,
        declaredValue: 8980,
        weight: 0.5,
        length: 30,
        width: 20,
        height: 5,
        domesticShippingFee: 1200,
        serviceFee: 0,
        itemName: 'Test Item',
        sourceId: '',
        ...overrides,
    };
}

/** Serves pages from memory; links without a page reject with the given error. */
export class FakeFetcher implements DocumentFetcher {
    public calls: string[] = [];

    constructor(private pages: Record<string, string>, private failure?: Error) { }

    async fetch(link: string): Promise<string> {
        this.calls.push(link);
        const page = this.pages[link];
        if (page === undefined) {
            throw this.failure ?? new Error(`No page for ${link}`);
        }
        return page;
    }
}

export function buildService(fetcher: DocumentFetcher, rate: number = TEST_RATE): LandedCostService {
    return new LandedCostService({
        extractor: new PackageExtractor(fetcher),
        exchangeRates: new FixedExchangeRateProvider(rate),
    });
}

export const DESTINATION = {
    destinationAddress: '1 Test Street, Springfield',
    destinationZip: '12345',
};
