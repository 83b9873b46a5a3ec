// Errors
// Application error classes and the JSON error body the API answers with

import { createLogger } from './logger.js';

const logger = createLogger('errors');

/**
 * Error with an HTTP status and a stable code. Operational errors are expected
 * failures (bad input, unknown ids, provider outages); their context reaches the client.
 */
export class AppError extends Error {
    constructor(
        message: string,
        readonly statusCode: number = 500,
        readonly code: string = 'INTERNAL_ERROR',
        readonly isOperational: boolean = true,
        readonly context?: Record<string, unknown>
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 400, 'VALIDATION_ERROR', true, context);
    }
}

export class NotFoundError extends AppError {
    constructor(resource: string, id?: string) {
        const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
        super(message, 404, 'NOT_FOUND', true, { resource, id });
    }
}

export class ConflictError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 409, 'CONFLICT', true, context);
    }
}

/** A provider we depend on is not configured or not reachable */
export class ServiceUnavailableError extends AppError {
    constructor(service: string, message?: string) {
        super(message || `${service} service is temporarily unavailable`, 503, 'SERVICE_UNAVAILABLE', true, { service });
    }
}

/**
 * A provider (Deepgram, OpenAI) answered with a failure or an unusable body.
 * `upstreamStatus` is the provider's HTTP status when there was one.
 */
export class ExternalServiceError extends AppError {
    constructor(service: string, message: string, readonly upstreamStatus?: number) {
        super(message, 502, 'EXTERNAL_SERVICE_ERROR', true, { service, upstreamStatus });
    }

    /** Timeouts, rate limits and provider 5xx may succeed on another attempt */
    get transient(): boolean {
        const status = this.upstreamStatus;
        if (status === undefined) return false;
        return status === 408 || status === 429 || status >= 500;
    }
}

export interface ErrorResponse {
    ok: false;
    error: string;
    code: string;
    statusCode: number;
    context?: Record<string, unknown>;
    timestamp: string;
    requestId?: string;
}

/**
 * Error body for any thrown value. Anything that is not an AppError is reported
 * as a bare INTERNAL_ERROR so its message never leaves the process.
 */
export function formatErrorResponse(error: unknown, requestId?: string): ErrorResponse {
    const timestamp = new Date().toISOString();

    if (!(error instanceof AppError)) {
        return {
            ok: false,
            error: 'An unexpected error occurred',
            code: 'INTERNAL_ERROR',
            statusCode: 500,
            timestamp,
            requestId,
        };
    }

    return {
        ok: false,
        error: error.message,
        code: error.code,
        statusCode: error.statusCode,
        context: error.isOperational ? error.context : undefined,
        timestamp,
        requestId,
    };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Operational errors log one warn line with their context; anything else logs
 * as an error with its stack at debug level.
 */
export function logError(error: unknown, where: string): void {
    if (error instanceof AppError && error.isOperational) {
        logger.warn(`${where} ${error.code}: ${error.message}`, error.context);
        return;
    }
    logger.error(`${where} failed`, undefined, error);
}
