import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponseHeaders, RawAxiosResponseHeaders } from 'axios';
import { ZodType, ZodTypeDef } from 'zod';
import {
    FetchError,
    HttpStatusError,
    NetworkError,
    ParseError,
    RateLimitError,
    TimeoutError,
} from '../domain/errors';

export interface HttpClientOptions {
    timeoutMs: number;
    defaultHeaders?: Record<string, string>;
}

export interface HttpResponse<T = unknown> {
    status: number;
    data: T;
    headers: Record<string, string>;
    durationMs: number;
}

const HTML_ACCEPT = 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8';

function flattenHeaders(raw: RawAxiosResponseHeaders | AxiosResponseHeaders | undefined): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw ?? {})) {
        if (typeof value === 'string') headers[key] = value;
    }
    return headers;
}

// Short, log-friendly reason taken from an error body.
function describeBody(data: unknown): string {
    if (typeof data === 'string') {
        const trimmed = data.trim();
        if (trimmed.startsWith('<')) return 'error page returned';
        return trimmed.slice(0, 200) || 'empty response';
    }
    if (data && typeof data === 'object') {
        const obj = data as Record<string, unknown>;
        if (typeof obj.message === 'string') return obj.message;
        if (typeof obj.error === 'string') return obj.error;
    }
    return 'no error details';
}

/**
 * Thin axios wrapper. Every failure leaves as a FetchError subclass named
 * after `source`, so callers never see raw axios errors.
 */
export class HttpClient {
    private client: AxiosInstance;
    private source: string;
    private timeoutMs: number;

    constructor(source: string, options: HttpClientOptions) {
        this.source = source;
        this.timeoutMs = options.timeoutMs;
        this.client = axios.create({
            timeout: options.timeoutMs,
            headers: {
                'Accept': 'application/json',
                ...options.defaultHeaders,
            },
        });
    }

    async get<T>(url: string, config?: AxiosRequestConfig): Promise<HttpResponse<T>> {
        const started = Date.now();
        try {
            const response = await this.client.get<T>(url, config);
            return {
                status: response.status,
                data: response.data,
                headers: flattenHeaders(response.headers),
                durationMs: Date.now() - started,
            };
        } catch (err) {
            throw this.toFetchError(err);
        }
    }

    // Pages come back as raw text so axios never tries to JSON-parse them.
    async getText(url: string): Promise<HttpResponse<string>> {
        const response = await this.get<unknown>(url, {
            responseType: 'text',
            headers: { 'Accept': HTML_ACCEPT },
        });
        const data = typeof response.data === 'string' ? response.data : String(response.data ?? '');
        return { ...response, data };
    }

    /** GET and validate the body; a body that does not fit the schema is a ParseError. */
    async getJson<T>(url: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<HttpResponse<T>> {
        const response = await this.get<unknown>(url);
        const parsed = schema.safeParse(response.data);
        if (!parsed.success) {
            throw new ParseError(this.source, `Unexpected response shape from ${this.source}`, parsed.error);
        }
        return { ...response, data: parsed.data };
    }

    private toFetchError(err: unknown): FetchError {
        if (!axios.isAxiosError(err)) {
            return new NetworkError(
                this.source,
                `Unexpected error: ${err instanceof Error ? err.message : 'unknown'}`,
                err instanceof Error ? err : undefined,
            );
        }
        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
            return new TimeoutError(this.source, this.timeoutMs);
        }
        if (!err.response) {
            return new NetworkError(this.source, `Network error: ${err.message}`, err);
        }

        const { status, data, headers } = err.response;
        if (status === 429) {
            const retrySec = parseInt(String(headers?.['retry-after'] ?? ''), 10);
            return new RateLimitError(this.source, Number.isNaN(retrySec) ? undefined : retrySec * 1000);
        }
        return new HttpStatusError(this.source, status, describeBody(data));
    }
}
