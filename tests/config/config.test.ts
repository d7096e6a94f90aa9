import { loadConfig } from '../../src/config';

describe('loadConfig', () => {
    const saved = { ...process.env };

    afterEach(() => {
        process.env = { ...saved };
    });

    it('should apply defaults', () => {
        delete process.env.FETCH_TIMEOUT_MS;
        delete process.env.EXCHANGE_RATE_URL;
        delete process.env.FALLBACK_EXCHANGE_RATE;
        delete process.env.DESTINATION_ZIP;

        const config = loadConfig();

        expect(config.fetch.timeoutMs).toBe(30000);
        expect(config.exchangeRate.url).toBe('https://api.exchangerate-api.com/v4/latest/JPY');
        expect(config.exchangeRate.fallbackRate).toBe(0.0067);
        expect(config.destination.zip).toBeUndefined();
    });

    it('should read overrides from the environment', () => {
        process.env.FALLBACK_EXCHANGE_RATE = '0.0071';
        process.env.DESTINATION_ADDRESS = '  1 Test Street ';

        const config = loadConfig();

        expect(config.exchangeRate.fallbackRate).toBe(0.0071);
        expect(config.destination.address).toBe('1 Test Street');
    });

    it('should reject malformed numbers', () => {
        process.env.FETCH_TIMEOUT_MS = 'soon';
        expect(() => loadConfig()).toThrow('FETCH_TIMEOUT_MS must be a positive number');
    });
});
