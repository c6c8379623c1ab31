import { loadConfig, resetConfig, getConfig, validateConfig } from '../../src/config/index';

describe('ConfigLoader', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('falls back to web-remix defaults', () => {
        const config = loadConfig();

        expect(config.port).toBe(3000);
        expect(config.testMode).toBe(false);
        expect(config.innertube.baseUrl).toBe('https://music.youtube.com/youtubei/v1');
        expect(config.innertube.clientName).toBe('WEB_REMIX');
        expect(config.innertube.clientId).toBe('67');
        expect(config.innertube.hl).toBe('en');
        expect(config.innertube.gl).toBe('US');
        expect(config.transport).toEqual({
            timeoutMs: 15000,
            maxAttempts: 3,
            initialBackoffMs: 500,
            maxBackoffMs: 8000,
            backoffMultiplier: 2,
            jitter: 0.1,
        });
        expect(config.pagination).toEqual({ maxPages: 20, maxConsecutiveEmptyPages: 3 });
    });

    it('strips double quotes from environment variables', () => {
        process.env.INNERTUBE_CLIENT_VERSION = '"1.20250101.00.00"';

        expect(loadConfig().innertube.clientVersion).toBe('1.20250101.00.00');
    });

    it('strips single quotes from environment variables', () => {
        process.env.INNERTUBE_HL = "'de'";

        expect(loadConfig().innertube.hl).toBe('de');
    });

    it('trims whitespace from environment variables', () => {
        process.env.INNERTUBE_GL = '  DE  ';

        expect(loadConfig().innertube.gl).toBe('DE');
    });

    it('handles numeric variables with quotes', () => {
        process.env.PORT = '"4000"';
        process.env.TRANSPORT_MAX_ATTEMPTS = '5';

        const config = loadConfig();
        expect(config.port).toBe(4000);
        expect(config.transport.maxAttempts).toBe(5);
    });

    it('rejects non-numeric values for numeric variables', () => {
        process.env.TRANSPORT_TIMEOUT_MS = 'soon';

        expect(() => loadConfig()).toThrow('Environment variable TRANSPORT_TIMEOUT_MS must be a number, got: soon');
    });

    it('treats empty optional session seeds as absent', () => {
        process.env.INNERTUBE_COOKIE = '';
        process.env.INNERTUBE_VISITOR_DATA = '"visitor-seed"';

        const config = loadConfig();
        expect(config.innertube.cookie).toBeUndefined();
        expect(config.innertube.visitorData).toBe('visitor-seed');
    });

    it('reads TEST_MODE as a boolean', () => {
        process.env.TEST_MODE = 'TRUE';

        expect(loadConfig().testMode).toBe(true);
    });

    it('caches the config until reset', () => {
        process.env.PORT = '4100';
        const first = getConfig();
        process.env.PORT = '4200';

        expect(getConfig()).toBe(first);
        resetConfig();
        expect(getConfig().port).toBe(4200);
    });

    describe('validateConfig', () => {
        it('accepts the defaults', () => {
            expect(validateConfig(loadConfig())).toEqual([]);
        });

        it('reports every invalid value', () => {
            process.env.INNERTUBE_BASE_URL = 'music.test';
            process.env.TRANSPORT_MAX_ATTEMPTS = '0';
            process.env.TRANSPORT_INITIAL_BACKOFF_MS = '1000';
            process.env.TRANSPORT_MAX_BACKOFF_MS = '100';
            process.env.TRANSPORT_JITTER = '2';
            process.env.PAGINATION_MAX_PAGES = '0';

            expect(validateConfig(loadConfig())).toEqual([
                'INNERTUBE_BASE_URL must be an http(s) URL',
                'TRANSPORT_MAX_ATTEMPTS must be at least 1',
                'TRANSPORT_MAX_BACKOFF_MS must not be below TRANSPORT_INITIAL_BACKOFF_MS',
                'TRANSPORT_JITTER must be between 0 and 1',
                'PAGINATION_MAX_PAGES and PAGINATION_MAX_EMPTY_PAGES must be at least 1',
            ]);
        });
    });
});
