import { z } from 'zod';
import { HttpClient } from '../http/client';
import { ExchangeRateConfig } from '../config';

// USD per 1 JPY.
export interface ExchangeRateProvider {
    getJpyToUsd(): Promise<number>;
}

const ratesResponseSchema = z.object({
    rates: z.object({
        USD: z.number().positive(),
    }).passthrough(),
}).passthrough();

/**
 * Reads the live JPY→USD rate. Never rejects: any failure, including a
 * response without a usable USD rate, yields the configured fallback.
 */
export class HttpExchangeRateProvider implements ExchangeRateProvider {
    private http: HttpClient;
    private config: ExchangeRateConfig;

    constructor(config: ExchangeRateConfig) {
        this.config = config;
        this.http = new HttpClient('exchange-rate', { timeoutMs: config.timeoutMs });
    }

    async getJpyToUsd(): Promise<number> {
        try {
            const response = await this.http.getJson(this.config.url, ratesResponseSchema);
            return response.data.rates.USD;
        } catch (err) {
            console.warn(
                `[fx] Exchange rate unavailable, using fallback ${this.config.fallbackRate}:`,
                err instanceof Error ? err.message : err,
            );
            return this.config.fallbackRate;
        }
    }
}

export class FixedExchangeRateProvider implements ExchangeRateProvider {
    constructor(private rate: number) { }

    async getJpyToUsd(): Promise<number> {
        return this.rate;
    }
}
