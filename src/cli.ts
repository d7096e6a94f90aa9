#!/usr/bin/env node
import { loadConfig, AppConfig } from './config';
import { HttpDocumentFetcher } from './extraction/fetcher';
import { PackageExtractor } from './extraction/extractor';
import { HttpExchangeRateProvider } from './fx/exchange-rate';
import { LandedCostService } from './services/landed-cost.service';
import { CalculationHistoryRepository } from './db/repository';
import { createPool, closePool } from './db/pool';
import { LandedCostError } from './domain/errors';
import { BatchResult, LandedCostResult, ManualOverrides } from './domain/models';
import { getSupportedMethods } from './pricing/shipping';

const USAGE = `Usage: landed-cost <link...> --address <address> --zip <zip> [options]

Options:
  --method <name>       ${getSupportedMethods().join(', ')} (default EMS)
  --consolidate         quote several links as one consolidated shipment
  --weight <kg>         override weight
  --length <cm>         override length
  --width <cm>          override width
  --height <cm>         override height
  --price <jpy>         override item price
  --save                store the result in calculation history
  --json                print the raw result`;

export interface CliOptions {
    links: string[];
    method?: string;
    address?: string;
    zip?: string;
    consolidate: boolean;
    save: boolean;
    json: boolean;
    overrides: ManualOverrides;
}

const OVERRIDE_FLAGS = ['weight', 'length', 'width', 'height', 'price'] as const;

export function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = { links: [], consolidate: false, save: false, json: false, overrides: {} };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            options.links.push(arg);
            continue;
        }
        const flag = arg.slice(2);
        if (flag === 'consolidate') { options.consolidate = true; continue; }
        if (flag === 'save') { options.save = true; continue; }
        if (flag === 'json') { options.json = true; continue; }

        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
            throw new Error(`Missing value for --${flag}`);
        }
        i++;

        const overrideFlag = OVERRIDE_FLAGS.find(f => f === flag);
        if (overrideFlag) {
            const n = Number(value);
            if (!Number.isFinite(n)) throw new Error(`--${flag} expects a number, got "${value}"`);
            options.overrides[overrideFlag] = n;
        } else if (flag === 'method') {
            options.method = value;
        } else if (flag === 'address') {
            options.address = value;
        } else if (flag === 'zip') {
            options.zip = value;
        } else {
            throw new Error(`Unknown option --${flag}`);
        }
    }
    return options;
}

export function formatResult(result: LandedCostResult): string {
    const row = (label: string, jpy: number | null, usd: number) =>
        `  ${label.padEnd(24)}${jpy === null ? ''.padStart(12) : `¥${jpy.toLocaleString('en-US')}`.padStart(12)}  $${usd.toFixed(2)}`;

    return [
        `${result.itemName || result.link}`,
        `  via ${result.shippingMethod}, 1 JPY = ${result.exchangeRate} USD`,
        row('Item price', result.itemPriceJpy, result.itemPriceUsd),
        row('Domestic shipping', result.domesticShippingJpy, result.domesticShippingUsd),
        row('Service fee', result.serviceFeeJpy, result.serviceFeeUsd),
        row('International shipping', result.internationalShippingJpy, result.internationalShippingUsd),
        row('Customs duty', null, result.customsDutyUsd),
        row('Customs processing', null, result.customsProcessingFeeUsd),
        row('Total', result.totalJpy, result.totalUsd),
        `  price: ${result.extraction.priceSource}, weight: ${result.extraction.weightSource}, ` +
        `dimensions: ${result.extraction.dimensionSource}`,
    ].join('\n');
}

function printBatch(batch: BatchResult): void {
    for (const entry of batch.results) {
        if (entry.success) {
            console.log(formatResult(entry.result));
        } else {
            console.log(`${entry.link}\n  failed (${entry.code}): ${entry.error}`);
        }
        console.log('');
    }
    console.log(`${batch.successCount}/${batch.count} links priced, total $${batch.totalAll.toFixed(2)}`);
    if (batch.consolidation) {
        const c = batch.consolidation;
        console.log(
            `Consolidated: $${c.consolidatedTotal.toFixed(2)} vs $${c.individualTotal.toFixed(2)} separately ` +
            `(saves $${c.savings.toFixed(2)}, fee $${c.consolidationFeeUsd.toFixed(2)})`,
        );
    }
}

async function run(options: CliOptions, config: AppConfig): Promise<void> {
    const address = options.address ?? config.destination.address;
    const zip = options.zip ?? config.destination.zip;

    const pool = options.save ? createPool(config.db) : undefined;
    const service = new LandedCostService({
        extractor: new PackageExtractor(new HttpDocumentFetcher(config.fetch)),
        exchangeRates: new HttpExchangeRateProvider(config.exchangeRate),
        historyRepo: pool ? new CalculationHistoryRepository(pool) : undefined,
    });

    try {
        if (options.links.length === 1 && !options.consolidate) {
            const result = await service.calculate({
                link: options.links[0],
                shippingMethod: options.method,
                destinationAddress: address,
                destinationZip: zip,
                overrides: Object.keys(options.overrides).length > 0 ? options.overrides : undefined,
                saveToHistory: options.save,
            });
            console.log(options.json ? JSON.stringify(result, null, 2) : formatResult(result));
        } else {
            const batch = await service.calculateBatch({
                links: options.links,
                shippingMethod: options.method,
                destinationAddress: address,
                destinationZip: zip,
                consolidated: options.consolidate,
                saveToHistory: options.save,
            });
            if (options.json) console.log(JSON.stringify(batch, null, 2));
            else printBatch(batch);
        }
        console.log('\nAll figures are estimates from scraped page data; the final invoice may differ.');
    } finally {
        if (pool) await closePool(pool);
    }
}

async function main(): Promise<void> {
    let options: CliOptions;
    let config: AppConfig;
    try {
        options = parseArgs(process.argv.slice(2));
        config = loadConfig();
    } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        console.error(`\n${USAGE}`);
        process.exit(1);
    }
    if (options.links.length === 0) {
        console.error(USAGE);
        process.exit(1);
    }

    try {
        await run(options, config);
    } catch (err) {
        if (err instanceof LandedCostError) {
            console.error(JSON.stringify(err.toJSON(), null, 2));
        } else {
            console.error('Unexpected error:', err);
        }
        process.exitCode = 1;
    }
}

if (require.main === module) {
    main().catch((err) => {
        console.error('[cli] Fatal error:', err);
        process.exit(1);
    });
}
