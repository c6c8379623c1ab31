import { Request, Response, NextFunction } from 'express';
import {
    AuthRequired,
    InnertubeError,
    InvalidParameters,
    SchemaMismatch,
    TransportFailure,
} from '../../domain/errors/InnertubeErrors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly code: string = 'APP_ERROR'
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message, 'NOT_FOUND');
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message, 'BAD_REQUEST');
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        details?: unknown;
    };
}

/**
 * HTTP status for a catalog failure.
 */
export function statusForInnertubeError(err: InnertubeError): number {
    if (err instanceof AuthRequired) return 401;
    if (err instanceof InvalidParameters) return 400;
    if (err instanceof SchemaMismatch) return 502;
    if (err instanceof TransportFailure) {
        return err.kind === 'timeout' ? 504 : 503;
    }
    return 500;
}

function detailsFor(err: InnertubeError): Record<string, unknown> | undefined {
    if (err instanceof TransportFailure) {
        return { kind: err.kind, endpoint: err.endpoint, status: err.status };
    }
    if (err instanceof SchemaMismatch) {
        return { endpoint: err.endpoint, section: err.section };
    }
    if (err instanceof AuthRequired) {
        return { endpoint: err.endpoint };
    }
    return undefined;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    if (err instanceof NotFoundError || err instanceof BadRequestError || err instanceof InvalidParameters) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (err instanceof InnertubeError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.code,
                details: detailsFor(err),
            },
        };
        res.status(statusForInnertubeError(err)).json(response);
        return;
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.code,
            },
        };
        res.status(err.statusCode).json(response);
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
