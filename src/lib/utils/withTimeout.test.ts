import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout } from './withTimeout';

describe('withTimeout', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('passes through a promise that settles in time', async () => {
        await expect(withTimeout(Promise.resolve(7), 100, () => new Error('late'))).resolves.toBe(7);
    });

    it('passes through a rejection that arrives in time', async () => {
        await expect(
            withTimeout(Promise.reject(new Error('denied')), 100, () => new Error('late'))
        ).rejects.toThrow('denied');
    });

    it('rejects with the timeout error once the deadline passes', async () => {
        vi.useFakeTimers();
        const pending = withTimeout(new Promise<number>(() => {}), 100, () => new Error('late'));
        const assertion = expect(pending).rejects.toThrow('late');

        await vi.advanceTimersByTimeAsync(100);

        await assertion;
    });

    it('clears its timer when the promise wins', async () => {
        vi.useFakeTimers();

        await withTimeout(Promise.resolve('done'), 100, () => new Error('late'));

        expect(vi.getTimerCount()).toBe(0);
    });
});
