/**
 * Retry Utility
 * Retry wrapper over ScraperResult with linear / exponential backoff and jitter.
 */

import { ScraperErrorCode, type ScraperResult, createError, isRetryable } from '@/core/scrapers/types';
import { randomSleep, systemClock, type Clock } from '@/lib/http/anti-ban';

export type BackoffStrategy = 'linear' | 'exponential' | 'none';

export interface RetryOptions {
    maxRetries?: number;
    baseDelay?: number;
    backoff?: BackoffStrategy;
    /** Extra random delay added on top of each backoff step */
    jitter?: number;
    onRetry?: (attempt: number, error: ScraperErrorCode) => void;
    clock?: Clock;
}

export async function withRetry<T>(
    fn: () => Promise<ScraperResult<T>>,
    options: RetryOptions = {}
): Promise<ScraperResult<T>> {
    const {
        maxRetries = 2,
        baseDelay = 1000,
        backoff = 'linear',
        jitter = 500,
        onRetry,
        clock = systemClock,
    } = options;

    for (let attempt = 0; ; attempt++) {
        let result: ScraperResult<T>;
        try {
            result = await fn();
        } catch (error) {
            const errorMsg = error instanceof Error ? error.message : 'Unknown error';
            return createError(ScraperErrorCode.UNKNOWN, errorMsg);
        }

        if (result.success) return result;
        if (!isRetryable(result.errorCode) || attempt >= maxRetries) return result;

        onRetry?.(attempt + 1, result.errorCode);
        const delay = calculateDelay(attempt, baseDelay, backoff);
        await randomSleep(delay, delay + jitter, clock);
    }
}

export function calculateDelay(
    attempt: number,
    baseDelay: number,
    backoff: BackoffStrategy
): number {
    switch (backoff) {
        case 'exponential': return baseDelay * Math.pow(2, attempt);
        case 'linear': return baseDelay * (attempt + 1);
        case 'none':
        default: return baseDelay;
    }
}
