/**
 * Failures surfaced to callers of the catalog. Dropped items are not errors
 * and never appear here; see {@link ItemDropped}.
 */
export type InnertubeErrorCode =
    | 'TRANSPORT_FAILURE'
    | 'SCHEMA_MISMATCH'
    | 'AUTH_REQUIRED'
    | 'INVALID_PARAMETERS';

export abstract class InnertubeError extends Error {
    abstract readonly code: InnertubeErrorCode;
}

export type TransportFailureKind = 'network' | 'timeout' | 'http' | 'rate-limited' | 'cancelled';

/**
 * Network error, timeout or non-2xx status. Raised after retries are exhausted.
 */
export class TransportFailure extends InnertubeError {
    readonly code = 'TRANSPORT_FAILURE' as const;
    readonly kind: TransportFailureKind;
    readonly status?: number;
    /** Server-requested wait, from Retry-After */
    readonly retryAfterMs?: number;
    readonly endpoint: string;

    constructor(
        kind: TransportFailureKind,
        endpoint: string,
        message: string,
        details: { status?: number; retryAfterMs?: number } = {}
    ) {
        super(message);
        this.name = 'TransportFailure';
        this.kind = kind;
        this.endpoint = endpoint;
        this.status = details.status;
        this.retryAfterMs = details.retryAfterMs;
    }

    /**
     * Network errors, timeouts, rate limits and 5xx are worth another attempt.
     */
    get transient(): boolean {
        switch (this.kind) {
            case 'network':
            case 'timeout':
            case 'rate-limited':
                return true;
            case 'http':
                return this.status !== undefined && this.status >= 500 && this.status < 600;
            case 'cancelled':
                return false;
        }
    }
}

/**
 * A required top-level section of a response is absent or mis-shaped.
 */
export class SchemaMismatch extends InnertubeError {
    readonly code = 'SCHEMA_MISMATCH' as const;

    constructor(
        public readonly endpoint: string,
        public readonly section: string,
        message?: string
    ) {
        super(message ?? `Response from ${endpoint} is missing required section: ${section}`);
        this.name = 'SchemaMismatch';
    }
}

/**
 * The upstream rejected the request, or the operation needs credentials the
 * session does not hold.
 */
export class AuthRequired extends InnertubeError {
    readonly code = 'AUTH_REQUIRED' as const;

    constructor(
        public readonly endpoint: string,
        message: string = `Authentication required for ${endpoint}`,
        public readonly status?: number
    ) {
        super(message);
        this.name = 'AuthRequired';
    }
}

/**
 * Logical parameters that cannot form a request.
 */
export class InvalidParameters extends InnertubeError {
    readonly code = 'INVALID_PARAMETERS' as const;

    constructor(message: string) {
        super(message);
        this.name = 'InvalidParameters';
    }
}

/** 'invalid-entity': the fields were present but the entity factory rejected them */
export type DropReason = 'unclassified' | 'missing-field' | 'invalid-entity';

/**
 * A renderer node that produced no entity. Reported through telemetry only.
 */
export interface ItemDropped {
    renderer: string;
    reason: DropReason;
    /** Entity kind the node was classified as, when classification succeeded */
    kind?: string;
    /** First required field found missing */
    field?: string;
}
