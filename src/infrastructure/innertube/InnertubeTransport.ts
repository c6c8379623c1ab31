import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { SessionUpdate } from '../../domain/entities/SessionContext';
import {
    AuthRequired,
    InnertubeError,
    TransportFailure,
} from '../../domain/errors/InnertubeErrors';
import {
    IInnertubeTransport,
    OutboundRequest,
    RawResponse,
    TransportCallOptions,
} from '../../domain/ports/IInnertubeTransport';
import { IMetricsPort, METRICS } from '../../domain/ports/IMetricsPort';
import { NoOpMetricsAdapter } from '../metrics/ConsoleMetricsAdapter';
import { stringAt } from '../renderers/json';
import { parseRetryAfter, RetryAbortedError, withRetry } from './RetryUtils';

/**
 * Receives the server-issued session changes of a fully received response.
 */
export interface SessionSink {
    commit(update: SessionUpdate): boolean;
}

export interface TransportPolicy {
    timeoutMs: number;
    maxAttempts: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
    backoffMultiplier: number;
    jitter: number;
}

export const DEFAULT_TRANSPORT_POLICY: TransportPolicy = {
    timeoutMs: 15000,
    maxAttempts: 3,
    initialBackoffMs: 500,
    maxBackoffMs: 8000,
    backoffMultiplier: 2,
    jitter: 0.1,
};

type ResponseHeaders = RawResponse['headers'];

function headerValue(headers: ResponseHeaders, name: string): string | undefined {
    const value = headers[name];
    return Array.isArray(value) ? value[0] : value;
}

function normalizeHeaders(source: AxiosResponse['headers']): ResponseHeaders {
    const headers: ResponseHeaders = {};
    for (const [name, value] of Object.entries(source)) {
        const key = name.toLowerCase();
        if (typeof value === 'string') {
            headers[key] = value;
        } else if (Array.isArray(value)) {
            headers[key] = value.filter((entry): entry is string => typeof entry === 'string');
        } else if (typeof value === 'number' || typeof value === 'boolean') {
            headers[key] = String(value);
        }
    }
    return headers;
}

/**
 * Maps any failure of one HTTP exchange onto the client's error model.
 */
export function classifyError(error: unknown, endpoint: string): InnertubeError {
    if (error instanceof InnertubeError) return error;

    if (axios.isCancel(error) || error instanceof RetryAbortedError) {
        return new TransportFailure('cancelled', endpoint, `Request to ${endpoint} was cancelled`);
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;

        if (status === undefined) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                return new TransportFailure('timeout', endpoint, `Request to ${endpoint} timed out`);
            }
            if (error.code === 'ERR_CANCELED') {
                return new TransportFailure('cancelled', endpoint, `Request to ${endpoint} was cancelled`);
            }
            return new TransportFailure('network', endpoint, `Network error calling ${endpoint}: ${error.message}`);
        }

        if (status === 401 || status === 403) {
            return new AuthRequired(endpoint, `Upstream rejected ${endpoint} with status ${status}`, status);
        }

        if (status === 429) {
            const headers = normalizeHeaders(error.response?.headers ?? {});
            return new TransportFailure('rate-limited', endpoint, `Rate limited on ${endpoint}`, {
                status,
                retryAfterMs: parseRetryAfter(headerValue(headers, 'retry-after')),
            });
        }

        return new TransportFailure('http', endpoint, `Upstream returned ${status} for ${endpoint}`, { status });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransportFailure('network', endpoint, `Request to ${endpoint} failed: ${message}`);
}

function isTransient(error: unknown): boolean {
    return error instanceof TransportFailure && error.transient;
}

/**
 * Server-issued session changes carried by one response.
 */
export function extractSessionUpdate(response: RawResponse): SessionUpdate {
    const update: SessionUpdate = {};

    const visitorData = stringAt(response.data, 'responseContext', 'visitorData')
        || headerValue(response.headers, 'x-goog-visitor-id');
    if (visitorData) update.visitorData = visitorData;

    const setCookie = response.headers['set-cookie'];
    if (setCookie !== undefined) {
        update.setCookies = Array.isArray(setCookie) ? setCookie : [setCookie];
    }

    return update;
}

/**
 * Innertube HTTP transport backed by axios.
 *
 * Retries transient failures with bounded backoff and applies session
 * updates only once a response has been received in full.
 */
export class InnertubeTransport implements IInnertubeTransport {
    private readonly session: SessionSink;
    private readonly policy: TransportPolicy;
    private readonly metrics: IMetricsPort;
    private readonly http: AxiosInstance;

    constructor(
        session: SessionSink,
        policy: Partial<TransportPolicy> = {},
        metrics: IMetricsPort = new NoOpMetricsAdapter(),
        http: AxiosInstance = axios.create()
    ) {
        this.session = session;
        this.policy = { ...DEFAULT_TRANSPORT_POLICY, ...policy };
        this.metrics = metrics;
        this.http = http;
    }

    async execute(request: OutboundRequest, options: TransportCallOptions = {}): Promise<RawResponse> {
        const requestId = uuidv4();
        const tags = { endpoint: request.endpoint };
        const stopTimer = this.metrics.startTimer(METRICS.REQUEST_DURATION, tags);

        try {
            const response = await withRetry(
                attempt => this.attempt(request, requestId, attempt, options),
                {
                    maxAttempts: this.policy.maxAttempts,
                    initialBackoffMs: this.policy.initialBackoffMs,
                    maxBackoffMs: this.policy.maxBackoffMs,
                    backoffMultiplier: this.policy.backoffMultiplier,
                    jitter: this.policy.jitter,
                    isRetryable: isTransient,
                    signal: options.signal,
                    retryAfterMs: error => error instanceof TransportFailure ? error.retryAfterMs : undefined,
                    onRetry: (attempt, error, delay) => {
                        const reason = error instanceof InnertubeError ? error.message : String(error);
                        console.warn(`[Transport] ${requestId} ${request.endpoint} attempt ${attempt} failed (${reason}), retrying in ${Math.round(delay)}ms`);
                        this.metrics.incrementCounter(METRICS.RETRIES_TOTAL, tags);
                    },
                }
            );

            this.commitSessionUpdate(response);
            return response;
        } catch (error: unknown) {
            const failure = classifyError(error, request.endpoint);
            this.metrics.incrementCounter(METRICS.REQUEST_FAILURES_TOTAL, { ...tags, code: failure.code });
            throw failure;
        } finally {
            stopTimer();
        }
    }

    private async attempt(
        request: OutboundRequest,
        requestId: string,
        attempt: number,
        options: TransportCallOptions
    ): Promise<RawResponse> {
        this.metrics.incrementCounter(METRICS.REQUESTS_TOTAL, { endpoint: request.endpoint });
        if (attempt === 1) {
            console.debug(`[Transport] ${requestId} POST ${request.endpoint}`);
        }

        try {
            const response = await this.http.post<unknown>(request.url, request.body, {
                params: request.query,
                headers: request.headers,
                timeout: this.policy.timeoutMs,
                signal: options.signal,
                responseType: 'json',
            });

            return {
                status: response.status,
                data: response.data,
                headers: normalizeHeaders(response.headers),
            };
        } catch (error: unknown) {
            throw classifyError(error, request.endpoint);
        }
    }

    private commitSessionUpdate(response: RawResponse): void {
        const update = extractSessionUpdate(response);
        if (update.visitorData === undefined && update.setCookies === undefined) return;

        if (this.session.commit(update)) {
            this.metrics.incrementCounter(METRICS.SESSION_UPDATES_TOTAL);
        }
    }
}
