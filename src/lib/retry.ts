export interface RetryOptions {
    attempts: number;
    baseDelayMs: number;
    maxDelayMs?: number;
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const NO_RETRY: RetryOptions = { attempts: 1, baseDelayMs: 0 };

export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = NO_RETRY): Promise<T> {
    const { attempts, baseDelayMs, maxDelayMs = 30_000, shouldRetry, onRetry } = options;

    let lastError: unknown;
    for (let attempt = 1; attempt <= Math.max(1, attempts); attempt += 1) {
        try {
            return await fn();
        } catch (error) {
            lastError = error;
            const allowRetry = attempt < attempts && (shouldRetry ? shouldRetry(error) : true);
            if (!allowRetry) {
                throw error;
            }
            const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
            onRetry?.(error, attempt, delay);
            await new Promise((resolve) => setTimeout(resolve, delay));
        }
    }
    throw lastError;
}
