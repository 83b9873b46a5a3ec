import { describe, it, expect, vi } from 'vitest';
import { computeBackoffDelay, defaultShouldRetry, withRetry } from './retry.js';
import { ExternalServiceError, ServiceUnavailableError, ValidationError } from './errors.js';

describe('retry', () => {
    describe('defaultShouldRetry', () => {
        it('should retry transient provider statuses', () => {
            expect(defaultShouldRetry(new ExternalServiceError('openai', 'rate limited', 429))).toBe(true);
            expect(defaultShouldRetry(new ExternalServiceError('openai', 'overloaded', 503))).toBe(true);
            expect(defaultShouldRetry(new ExternalServiceError('deepgram', 'slow', 408))).toBe(true);
        });

        it('should not retry provider client errors or unusable bodies', () => {
            expect(defaultShouldRetry(new ExternalServiceError('deepgram', 'bad audio', 400))).toBe(false);
            expect(defaultShouldRetry(new ExternalServiceError('openai', 'bad key', 401))).toBe(false);
            expect(defaultShouldRetry(new ExternalServiceError('openai', 'Empty response from OpenAI'))).toBe(false);
        });

        it('should retry rejected fetches', () => {
            expect(defaultShouldRetry(new TypeError('fetch failed'))).toBe(true);
        });

        it('should decide our own errors by status code', () => {
            expect(defaultShouldRetry(new ValidationError('timeout must be positive'))).toBe(false);
            expect(defaultShouldRetry(new ServiceUnavailableError('deepgram'))).toBe(true);
        });
    });

    describe('computeBackoffDelay', () => {
        it('should grow exponentially up to the cap', () => {
            const options = { initialDelayMs: 100, backoffMultiplier: 2, maxDelayMs: 350, jitterRatio: 0 };
            expect(computeBackoffDelay(1, options)).toBe(100);
            expect(computeBackoffDelay(2, options)).toBe(200);
            expect(computeBackoffDelay(3, options)).toBe(350);
        });

        it('should add jitter without passing the cap', () => {
            const options = { initialDelayMs: 100, backoffMultiplier: 2, maxDelayMs: 350, jitterRatio: 0.5 };
            expect(computeBackoffDelay(1, options, () => 0.5)).toBe(125);
            expect(computeBackoffDelay(2, options, () => 1)).toBe(300);
            expect(computeBackoffDelay(3, options, () => 1)).toBe(350);
        });
    });

    describe('withRetry', () => {
        it('should return the first successful result', async () => {
            const fn = vi.fn()
                .mockRejectedValueOnce(new TypeError('fetch failed'))
                .mockResolvedValueOnce('done');

            await expect(withRetry(fn, { initialDelayMs: 1 })).resolves.toBe('done');
            expect(fn).toHaveBeenCalledTimes(2);
        });

        it('should give up after maxAttempts and rethrow the last error', async () => {
            const fn = vi.fn().mockRejectedValue(new ExternalServiceError('openai', 'upstream down', 503));

            await expect(withRetry(fn, { maxAttempts: 3, initialDelayMs: 1 })).rejects.toThrow('upstream down');
            expect(fn).toHaveBeenCalledTimes(3);
        });

        it('should stop at once when the error is not retryable', async () => {
            const fn = vi.fn().mockRejectedValue(new ValidationError('bad input'));

            await expect(withRetry(fn, { initialDelayMs: 1 })).rejects.toThrow('bad input');
            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('should use a custom retry condition', async () => {
            const fn = vi.fn().mockRejectedValue(new TypeError('fetch failed'));

            await expect(withRetry(fn, { initialDelayMs: 1, shouldRetry: () => false })).rejects.toThrow('fetch failed');
            expect(fn).toHaveBeenCalledTimes(1);
        });
    });
});
