import { HttpClient } from '../http/client';
import { FetchConfig } from '../config';

export interface DocumentFetcher {
    fetch(link: string): Promise<string>;
}

function hostOf(link: string): string {
    try {
        return new URL(link).hostname;
    } catch {
        return 'page';
    }
}

export class HttpDocumentFetcher implements DocumentFetcher {
    private clients = new Map<string, HttpClient>();
    private config: FetchConfig;

    constructor(config: FetchConfig) {
        this.config = config;
    }

    async fetch(link: string): Promise<string> {
        const response = await this.clientFor(hostOf(link)).getText(link);
        console.log(`[fetcher] GET ${link} -> ${response.status} (${response.durationMs}ms)`);
        return response.data;
    }
    // One client per host so errors name the site that failed.
    private clientFor(host: string): HttpClient {
        let client = this.clients.get(host);
        if (!client) {
            client = new HttpClient(host, {
                timeoutMs: this.config.timeoutMs,
                defaultHeaders: { 'User-Agent': this.config.userAgent },
            });
            this.clients.set(host, client);
        }
        return client;
    }
}
