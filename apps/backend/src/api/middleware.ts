// Error Middleware
// Global error handling middleware for Express
// Catches all errors and returns consistent JSON responses

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError, ValidationError, formatErrorResponse, logError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('api');

/**
 * Async handler wrapper - catches errors from async route handlers
 *
 * Example:
 *   router.get('/resource', asyncHandler(async (req, res) => {
 *       const data = await fetchData();
 *       res.json(data);
 *   }));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

/**
 * 404 Not Found handler - catches unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({
        ok: false,
        error: `Route not found: ${req.method} ${req.path}`,
        code: 'NOT_FOUND',
        statusCode: 404,
        timestamp: new Date().toISOString(),
    });
}

/**
 * Body parser failures carry a `type` such as entity.parse.failed
 */
function normalizeError(error: unknown): unknown {
    if (typeof error !== 'object' || error === null || !('type' in error)) {
        return error;
    }
    if (error.type === 'entity.parse.failed') {
        return new ValidationError('Request body is not valid JSON');
    }
    if (error.type === 'entity.too.large') {
        return new AppError('Request body too large', 413, 'PAYLOAD_TOO_LARGE');
    }
    return error;
}

/**
 * Global error handler - catches all errors passed to next()
 * Must be registered LAST in the middleware chain
 */
export function globalErrorHandler(
    error: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' && header.length > 0
        ? header
        : `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;

    const normalized = normalizeError(error);
    logError(normalized, `${req.method} ${req.path}`);

    const response = formatErrorResponse(normalized, requestId);
    res.status(response.statusCode).json(response);
}

/**
 * Request logging middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const message = `${req.method} ${req.path} ${res.statusCode} ${duration}ms`;

        if (res.statusCode >= 400) {
            logger.warn(message);
        } else {
            logger.info(message);
        }
    });

    next();
}
