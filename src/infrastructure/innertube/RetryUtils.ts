/**
 * Retry Utilities
 *
 * Exponential backoff for transient transport failures. The delay before a
 * retry may be lengthened by the failure itself (a rate limit's Retry-After),
 * but never beyond maxBackoffMs.
 */

export interface RetryOptions {
    /** Maximum number of attempts including the first (default: 3) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 500) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 8000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Optional jitter to add randomness (0-1, default: 0.1) */
    jitter?: number;
    /** Function to determine if error is retryable (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Server-requested minimum wait for this error, if any */
    retryAfterMs?: (error: unknown) => number | undefined;
    /** Callback for each retry attempt */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
    /** Aborting cuts the wait between attempts short */
    signal?: AbortSignal;
}

/**
 * Thrown when the signal aborts while waiting to retry.
 */
export class RetryAbortedError extends Error {
    constructor(public readonly lastError: unknown) {
        super('Retry aborted');
        this.name = 'RetryAbortedError';
    }
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
    maxAttempts: 3,
    initialBackoffMs: 500,
    maxBackoffMs: 8000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: () => true,
    retryAfterMs: () => undefined,
    onRetry: () => { },
};

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @returns The result of the first successful attempt
 * @throws The last error if all attempts fail or the error is not retryable
 * @throws RetryAbortedError if the signal aborts during a backoff wait
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const maxAttempts = Math.max(1, opts.maxAttempts);
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error: unknown) {
            if (attempt >= maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
            const requested = opts.retryAfterMs(error) ?? 0;
            const delay = Math.min(Math.max(currentBackoff + jitterAmount, requested), opts.maxBackoffMs);

            opts.onRetry(attempt, error, delay);

            if (await sleep(delay, options?.signal)) {
                throw new RetryAbortedError(error);
            }

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Parses a Retry-After header given either as seconds or as an HTTP date.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
    if (!value) return undefined;
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
        return parseInt(trimmed, 10) * 1000;
    }
    const date = Date.parse(trimmed);
    if (isNaN(date)) return undefined;
    return Math.max(0, date - now);
}

/**
 * Resolves to true when the signal aborted before the delay elapsed.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise(resolve => {
        if (signal?.aborted) {
            resolve(true);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve(true);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve(false);
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
