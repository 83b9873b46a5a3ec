// Retry
// Exponential backoff with jitter around provider calls (Deepgram, OpenAI)

import { AppError, ExternalServiceError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('retry');

export interface BackoffOptions {
    initialDelayMs?: number;
    maxDelayMs?: number;
    backoffMultiplier?: number;
    /** Up to this share of the delay is added at random, so parallel callers spread out */
    jitterRatio?: number;
}

export interface RetryOptions extends BackoffOptions {
    /** Names the call in retry log lines */
    label?: string;
    maxAttempts?: number;
    shouldRetry?: (error: unknown) => boolean;
    random?: () => number;
}

const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Provider errors retry when their upstream status is transient. Our own errors
 * retry only when they are 5xx. Anything else is a rejected fetch (connection
 * refused or reset, DNS, abort on timeout) and is retried.
 */
export function defaultShouldRetry(error: unknown): boolean {
    if (error instanceof ExternalServiceError) return error.transient;
    if (error instanceof AppError) return error.statusCode >= 500;
    return true;
}

/**
 * Delay before the retry that follows the given failed attempt (1-based)
 */
export function computeBackoffDelay(
    attempt: number,
    options: BackoffOptions = {},
    random: () => number = Math.random
): number {
    const initial = options.initialDelayMs ?? 1000;
    const cap = options.maxDelayMs ?? 30000;
    const multiplier = options.backoffMultiplier ?? 2;
    const jitterRatio = options.jitterRatio ?? 0.2;

    const base = Math.min(initial * multiplier ** (attempt - 1), cap);
    return Math.min(Math.round(base * (1 + jitterRatio * random())), cap);
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    const shouldRetry = options.shouldRetry ?? defaultShouldRetry;
    const label = options.label ?? 'call';

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= maxAttempts || !shouldRetry(error)) {
                throw error;
            }
            const delay = computeBackoffDelay(attempt, options, options.random);
            logger.warn(`${label} attempt ${attempt}/${maxAttempts} failed (${errorMessage(error)}), retrying in ${delay}ms`);
            await sleep(delay);
        }
    }
}
