import dotenv from 'dotenv';
import { FixtureLoader } from '../infrastructure/fixtures/FixtureLoader';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    testMode: boolean; // When true, serve recorded responses instead of calling the upstream
    fixturesDir: string;

    // Upstream client identity and session seed
    innertube: {
        baseUrl: string;
        origin: string;
        clientName: string;
        clientVersion: string;
        clientId: string;
        userAgent: string;
        hl: string;
        gl: string;
        visitorData?: string;
        cookie?: string;
    };

    // Transport
    transport: {
        timeoutMs: number;
        maxAttempts: number;
        initialBackoffMs: number;
        maxBackoffMs: number;
        backoffMultiplier: number;
        jitter: number;
    };

    // Pagination guard
    pagination: {
        maxPages: number;
        maxConsecutiveEmptyPages: number;
    };

    // Metrics
    metrics: {
        enabled: boolean;
        prefix: string;
    };
}

const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value ? value : undefined;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value.trim().toLowerCase() === 'true';
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),
        testMode: getEnvVarBoolean('TEST_MODE', false),
        fixturesDir: getEnvVar('FIXTURES_DIR', FixtureLoader.defaultDirectory()),

        innertube: {
            baseUrl: getEnvVar('INNERTUBE_BASE_URL', 'https://music.youtube.com/youtubei/v1'),
            origin: getEnvVar('INNERTUBE_ORIGIN', 'https://music.youtube.com'),
            clientName: getEnvVar('INNERTUBE_CLIENT_NAME', 'WEB_REMIX'),
            clientVersion: getEnvVar('INNERTUBE_CLIENT_VERSION', '1.20241118.01.00'),
            clientId: getEnvVar('INNERTUBE_CLIENT_ID', '67'),
            userAgent: getEnvVar('INNERTUBE_USER_AGENT', DEFAULT_USER_AGENT),
            hl: getEnvVar('INNERTUBE_HL', 'en'),
            gl: getEnvVar('INNERTUBE_GL', 'US'),
            visitorData: getOptionalEnvVar('INNERTUBE_VISITOR_DATA'),
            cookie: getOptionalEnvVar('INNERTUBE_COOKIE'),
        },

        transport: {
            timeoutMs: getEnvVarNumber('TRANSPORT_TIMEOUT_MS', 15000),
            maxAttempts: getEnvVarNumber('TRANSPORT_MAX_ATTEMPTS', 3),
            initialBackoffMs: getEnvVarNumber('TRANSPORT_INITIAL_BACKOFF_MS', 500),
            maxBackoffMs: getEnvVarNumber('TRANSPORT_MAX_BACKOFF_MS', 8000),
            backoffMultiplier: getEnvVarNumber('TRANSPORT_BACKOFF_MULTIPLIER', 2),
            jitter: getEnvVarNumber('TRANSPORT_JITTER', 0.1),
        },

        pagination: {
            maxPages: getEnvVarNumber('PAGINATION_MAX_PAGES', 20),
            maxConsecutiveEmptyPages: getEnvVarNumber('PAGINATION_MAX_EMPTY_PAGES', 3),
        },

        metrics: {
            enabled: getEnvVarBoolean('METRICS_ENABLED', true),
            prefix: getEnvVar('METRICS_PREFIX', 'innertube'),
        },
    };
}

/**
 * Validates configuration values. Returns one message per problem.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];
    const { innertube, transport, pagination } = config;

    if (!/^https?:\/\//.test(innertube.baseUrl)) {
        errors.push('INNERTUBE_BASE_URL must be an http(s) URL');
    }
    if (!innertube.hl || !innertube.gl) {
        errors.push('INNERTUBE_HL and INNERTUBE_GL must not be empty');
    }
    if (transport.timeoutMs < 1) {
        errors.push('TRANSPORT_TIMEOUT_MS must be at least 1');
    }
    if (transport.maxAttempts < 1) {
        errors.push('TRANSPORT_MAX_ATTEMPTS must be at least 1');
    }
    if (transport.maxBackoffMs < transport.initialBackoffMs) {
        errors.push('TRANSPORT_MAX_BACKOFF_MS must not be below TRANSPORT_INITIAL_BACKOFF_MS');
    }
    if (transport.jitter < 0 || transport.jitter > 1) {
        errors.push('TRANSPORT_JITTER must be between 0 and 1');
    }
    if (pagination.maxPages < 1 || pagination.maxConsecutiveEmptyPages < 1) {
        errors.push('PAGINATION_MAX_PAGES and PAGINATION_MAX_EMPTY_PAGES must be at least 1');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
