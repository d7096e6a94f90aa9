import axios, { AxiosInstance } from 'axios';
import { FixedExchangeRateProvider, HttpExchangeRateProvider } from '../../src/fx/exchange-rate';
import successFixture from '../fixtures/exchange-rate-success.json';
import malformedFixture from '../fixtures/exchange-rate-malformed.json';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

const CONFIG = {
    url: 'https://rates.example.test/latest/JPY',
    timeoutMs: 2000,
    fallbackRate: 0.0067,
};

describe('HttpExchangeRateProvider', () => {
    let get: jest.Mock;

    beforeEach(() => {
        jest.clearAllMocks();
        get = jest.fn();
        mockedAxios.create.mockReturnValue({ get } as unknown as AxiosInstance);
        mockedAxios.isAxiosError.mockReturnValue(false);
    });

    it('should return the live USD rate', async () => {
        get.mockResolvedValue({ status: 200, data: successFixture, headers: {} });

        const rate = await new HttpExchangeRateProvider(CONFIG).getJpyToUsd();

        expect(rate).toBe(0.0068);
        expect(get).toHaveBeenCalledWith(CONFIG.url, undefined);
    });

    it('should fall back when the response has no USD rate', async () => {
        get.mockResolvedValue({ status: 200, data: malformedFixture, headers: {} });

        await expect(new HttpExchangeRateProvider(CONFIG).getJpyToUsd()).resolves.toBe(0.0067);
        expect(console.warn).toHaveBeenCalled();
    });

    it('should fall back when the rate is not positive', async () => {
        get.mockResolvedValue({ status: 200, data: { rates: { USD: 0 } }, headers: {} });

        await expect(new HttpExchangeRateProvider(CONFIG).getJpyToUsd()).resolves.toBe(0.0067);
    });

    it('should fall back when the request fails', async () => {
        get.mockRejectedValue(new Error('socket hang up'));

        await expect(new HttpExchangeRateProvider({ ...CONFIG, fallbackRate: 0.007 }).getJpyToUsd()).resolves.toBe(0.007);
    });
});

describe('FixedExchangeRateProvider', () => {
    it('should always return its rate', async () => {
        await expect(new FixedExchangeRateProvider(0.005).getJpyToUsd()).resolves.toBe(0.005);
    });
});
