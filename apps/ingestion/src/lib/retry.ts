import pRetry from 'p-retry';
import type { Logger } from 'pino';
import { errorMessage } from './ingestion-errors';

export interface StorageRetryOptions {
    retries: number;
    minTimeoutMs?: number;
    maxTimeoutMs?: number;
    logger: Logger;
    operation: string;
}

// Bounded exponential retry around a storage call; rejects with the last error
export async function withStorageRetry<T>(action: () => Promise<T>, options: StorageRetryOptions): Promise<T> {
    return pRetry(action, {
        retries: options.retries,
        factor: 2,
        minTimeout: options.minTimeoutMs ?? 200,
        maxTimeout: options.maxTimeoutMs ?? 2000,
        onFailedAttempt: (error) => {
            options.logger.warn(
                {
                    event: 'storage_retry',
                    operation: options.operation,
                    attempt: error.attemptNumber,
                    retriesLeft: error.retriesLeft,
                    error: errorMessage(error),
                },
                'Storage operation failed'
            );
        },
    });
}
