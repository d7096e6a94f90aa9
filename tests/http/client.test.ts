import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { HttpClient } from '../../src/http/client';
import {
    LandedCostError,
    NetworkError,
    ParseError,
    RateLimitError,
    TimeoutError,
} from '../../src/domain/errors';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

function axiosError(fields: { code?: string; response?: { status: number; data: unknown; headers: Record<string, string> } }) {
    return Object.assign(new Error('Request failed'), { isAxiosError: true, ...fields });
}

describe('HttpClient', () => {
    let get: jest.Mock;

    beforeEach(() => {
        jest.clearAllMocks();
        get = jest.fn();
        mockedAxios.create.mockReturnValue({ get } as unknown as AxiosInstance);
        mockedAxios.isAxiosError.mockReturnValue(false);
    });

    function createClient(): HttpClient {
        return new HttpClient('buyee.jp', { timeoutMs: 5000, defaultHeaders: { 'User-Agent': 'test-agent' } });
    }

    it('should create its axios instance with the timeout and headers', () => {
        createClient();
        expect(mockedAxios.create).toHaveBeenCalledWith(expect.objectContaining({
            timeout: 5000,
            headers: { 'Accept': 'application/json', 'User-Agent': 'test-agent' },
        }));
    });

    it('should return status, data and string headers', async () => {
        get.mockResolvedValue({ status: 200, data: { ok: true }, headers: { 'content-type': 'application/json', 'x-count': 3 } });

        const response = await createClient().get<{ ok: boolean }>('/status');

        expect(response.status).toBe(200);
        expect(response.data).toEqual({ ok: true });
        expect(response.headers).toEqual({ 'content-type': 'application/json' });
        expect(response.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should request pages as text', async () => {
        get.mockResolvedValue({ status: 200, data: '<html></html>', headers: {} });

        const response = await createClient().getText('https://buyee.jp/item/a/1');

        expect(response.data).toBe('<html></html>');
        expect(get).toHaveBeenCalledWith('https://buyee.jp/item/a/1', expect.objectContaining({ responseType: 'text' }));
    });

    describe('error mapping', () => {
        beforeEach(() => {
            mockedAxios.isAxiosError.mockReturnValue(true);
        });

        it('should map HTTP 429 to RateLimitError with the retry delay', async () => {
            get.mockRejectedValue(axiosError({ response: { status: 429, data: {}, headers: { 'retry-after': '30' } } }));

            await expect(createClient().get('/x')).rejects.toMatchObject({
                name: 'RateLimitError',
                retryAfterMs: 30000,
                retryable: true,
            });
        });

        it('should map server errors to a retryable upstream error', async () => {
            get.mockRejectedValue(axiosError({ response: { status: 503, data: '<html><body>down</body></html>', headers: {} } }));

            const err = await createClient().get('/x').catch((e: unknown) => e);

            expect(err).toBeInstanceOf(LandedCostError);
            expect(err).toMatchObject({
                code: 'UPSTREAM_HTTP_ERROR',
                statusCode: 503,
                retryable: true,
                message: 'buyee.jp responded with HTTP 503: error page returned',
            });
        });

        it('should map client errors to a non-retryable upstream error', async () => {
            get.mockRejectedValue(axiosError({ response: { status: 404, data: { message: 'Not found' }, headers: {} } }));

            await expect(createClient().get('/x')).rejects.toMatchObject({
                code: 'UPSTREAM_HTTP_ERROR',
                retryable: false,
                message: 'buyee.jp responded with HTTP 404: Not found',
            });
        });

        it('should map timeouts to TimeoutError', async () => {
            get.mockRejectedValue(axiosError({ code: 'ECONNABORTED' }));

            await expect(createClient().get('/x')).rejects.toThrow(TimeoutError);
        });

        it('should map missing responses to NetworkError', async () => {
            get.mockRejectedValue(axiosError({ code: 'ECONNREFUSED' }));

            await expect(createClient().get('/x')).rejects.toThrow(NetworkError);
        });
    });

    it('should validate JSON bodies against a schema', async () => {
        get.mockResolvedValue({ status: 200, data: { rates: { USD: 'n/a' } }, headers: {} });
        const schema = z.object({ rates: z.object({ USD: z.number() }) });

        await expect(createClient().getJson('/rates', schema)).rejects.toThrow(ParseError);

        get.mockResolvedValue({ status: 200, data: { rates: { USD: 0.0068 } }, headers: {} });
        const response = await createClient().getJson('/rates', schema);
        expect(response.data.rates.USD).toBe(0.0068);
    });

    it('should wrap non-axios failures in NetworkError', async () => {
        get.mockRejectedValue(new Error('boom'));

        await expect(createClient().get('/x')).rejects.toThrow('Unexpected error: boom');
    });

    it('should keep RateLimitError distinct from other upstream errors', () => {
        expect(new RateLimitError('buyee.jp')).toBeInstanceOf(LandedCostError);
        expect(new RateLimitError('buyee.jp').code).toBe('RATE_LIMITED');
    });
});
