export type ErrorCode =
    | 'VALIDATION_ERROR'
    | 'RATE_LIMITED'
    | 'UPSTREAM_HTTP_ERROR'
    | 'NETWORK_ERROR'
    | 'TIMEOUT'
    | 'PARSE_ERROR'
    | 'UNKNOWN';

export interface LandedCostErrorOptions {
    message: string;
    code: ErrorCode;
    /** What failed: a host name, 'exchange-rate', or 'engine' for local failures. */
    source?: string;
    retryable?: boolean;
    statusCode?: number;
    details?: Record<string, unknown>;
    cause?: Error;
}

export interface SerializedError {
    error: {
        code: ErrorCode;
        message: string;
        source: string;
        retryable: boolean;
        statusCode?: number;
        details?: Record<string, unknown>;
    };
}

export class LandedCostError extends Error {
    public readonly code: ErrorCode;
    public readonly source: string;
    public readonly retryable: boolean;
    public readonly statusCode?: number;
    public readonly details?: Record<string, unknown>;

    constructor(opts: LandedCostErrorOptions) {
        super(opts.message, opts.cause ? { cause: opts.cause } : undefined);
        this.name = 'LandedCostError';
        this.code = opts.code;
        this.source = opts.source ?? 'engine';
        this.retryable = opts.retryable ?? false;
        this.statusCode = opts.statusCode;
        this.details = opts.details;
    }

    toJSON(): SerializedError {
        const body: SerializedError['error'] = {
            code: this.code,
            message: this.message,
            source: this.source,
            retryable: this.retryable,
        };
        if (this.statusCode !== undefined) body.statusCode = this.statusCode;
        if (this.details) body.details = this.details;
        return { error: body };
    }
}

/**
 * The page or rate source could not be reached, or answered with an error.
 * Manual overrides may stand in for a page that failed this way.
 */
export class FetchError extends LandedCostError {
    constructor(opts: LandedCostErrorOptions & { source: string }) {
        super(opts);
        this.name = 'FetchError';
    }
}

export class HttpStatusError extends FetchError {
    constructor(source: string, status: number, reason: string) {
        super({
            message: `${source} responded with HTTP ${status}: ${reason}`,
            code: 'UPSTREAM_HTTP_ERROR',
            source,
            statusCode: status,
            retryable: status >= 500,
        });
        this.name = 'HttpStatusError';
    }
}

export class RateLimitError extends FetchError {
    public readonly retryAfterMs?: number;

    constructor(source: string, retryAfterMs?: number) {
        const wait = retryAfterMs ? `retry after ${retryAfterMs}ms` : 'try again later';
        super({
            message: `${source} is rate limiting requests, ${wait}`,
            code: 'RATE_LIMITED',
            source,
            statusCode: 429,
            retryable: true,
        });
        this.name = 'RateLimitError';
        this.retryAfterMs = retryAfterMs;
    }
}

export class NetworkError extends FetchError {
    constructor(source: string, message: string, cause?: Error) {
        super({ message, code: 'NETWORK_ERROR', source, retryable: true, cause });
        this.name = 'NetworkError';
    }
}

export class TimeoutError extends FetchError {
    constructor(source: string, timeoutMs: number) {
        super({
            message: `No response from ${source} within ${timeoutMs}ms`,
            code: 'TIMEOUT',
            source,
            retryable: true,
        });
        this.name = 'TimeoutError';
    }
}

// Raised before anything is fetched; details.issues lists the offending fields.
export class ValidationError extends LandedCostError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({ message, code: 'VALIDATION_ERROR', details });
        this.name = 'ValidationError';
    }
}

export class ParseError extends LandedCostError {
    constructor(source: string, message: string, cause?: Error) {
        super({ message, code: 'PARSE_ERROR', source, cause });
        this.name = 'ParseError';
    }
}

export function isFetchFailure(err: unknown): err is FetchError {
    return err instanceof FetchError;
}
