import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout } from '../../src/patterns/timeout';
import { OperationTimeoutError } from '../../src/errors';

describe('withTimeout', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('resolves with the result of a fast operation', async () => {
        await expect(withTimeout(async () => 'done', { timeoutMs: 1000, operation: 'fast' })).resolves.toBe('done');
    });

    it('rejects and aborts when the operation is too slow', async () => {
        vi.useFakeTimers();
        let received: AbortSignal | undefined;
        const pending = withTimeout((signal) => {
            received = signal;
            return new Promise<string>(() => undefined);
        }, { timeoutMs: 50, operation: 'LLM request' });
        const assertion = expect(pending).rejects.toThrow('LLM request timed out after 50ms');

        await vi.advanceTimersByTimeAsync(50);

        await assertion;
        await expect(pending).rejects.toBeInstanceOf(OperationTimeoutError);
        expect(received?.aborted).toBe(true);
    });

    it('runs without a timer when no timeout is set', async () => {
        await expect(withTimeout(async (signal) => signal.aborted, { operation: 'untimed' })).resolves.toBe(false);
    });

    it('propagates errors of the operation', async () => {
        await expect(withTimeout(async () => {
            throw new Error('boom');
        }, { timeoutMs: 1000, operation: 'failing' })).rejects.toThrow('boom');
    });
});
