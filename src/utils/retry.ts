/**
 * Retry Utility
 *
 * Provides retry logic with exponential backoff for failed operations.
 * Used by weather providers reading files that another process rewrites.
 */

export interface RetryOptions {
    maxRetries?: number;
    initialDelay?: number;
    maxDelay?: number;
    /** Errors for which this returns false are rethrown at once */
    shouldRetry?: (error: Error) => boolean;
    onRetry?: (attempt: number, error: Error) => void;
}

/**
 * Retry a function with exponential backoff
 *
 * @example
 * ```typescript
 * const weather = await retryWithBackoff(
 *     async () => await readFile(forecastFile, 'utf8'),
 *     {
 *         maxRetries: 3,
 *         initialDelay: 200,
 *         shouldRetry: isRetryableError,
 *     },
 * );
 * ```
 */
export async function retryWithBackoff<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<T> {
    const {
        maxRetries = 3,
        initialDelay = 1000,
        maxDelay = 10000,
        shouldRetry = () => true,
        onRetry,
    } = options;

    for (let attempt = 0; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            const lastError = toError(error);

            if (attempt >= maxRetries || !shouldRetry(lastError)) {
                throw lastError;
            }

            const delay = Math.min(
                initialDelay * Math.pow(2, attempt),
                maxDelay,
            );

            onRetry?.(attempt + 1, lastError);
            await new Promise(resolve => setTimeout(resolve, delay));
        }
    }
}

const RETRYABLE_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'ETIMEDOUT']);

/**
 * Check if an error is retryable
 *
 * Transient file-system errors and files caught mid-write (truncated JSON) are retried.
 */
export function isRetryableError(error: unknown): boolean {
    if (error instanceof SyntaxError) {
        return true;
    }

    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return RETRYABLE_CODES.has(error.code);
    }

    return false;
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
