import { OperationTimeoutError } from '../errors';

export interface TimeoutOptions {
    /** Milliseconds before the operation is aborted. Zero or undefined disables the timer. */
    timeoutMs?: number;
    operation: string;
}

/**
 * Runs `fn` with an AbortSignal and rejects with OperationTimeoutError once
 * `timeoutMs` elapses. The signal is aborted on timeout so the underlying
 * request can be cancelled.
 */
export async function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    options: TimeoutOptions
): Promise<T> {
    const controller = new AbortController();
    const { timeoutMs, operation } = options;

    if (!timeoutMs || timeoutMs <= 0) {
        return fn(controller.signal);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new OperationTimeoutError(operation, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
    }
}
