import { describe, it, expect } from 'vitest';
import { AsyncMutex } from './AsyncMutex';

describe('AsyncMutex', () => {
    it('runs tasks one at a time in request order', async () => {
        const mutex = new AsyncMutex();
        const order: string[] = [];
        let release: () => void = () => {};
        const held = new Promise<void>((resolve) => { release = resolve; });

        const first = mutex.runExclusive(async () => {
            order.push('first:start');
            await held;
            order.push('first:end');
        });
        const second = mutex.runExclusive(async () => {
            order.push('second');
        });

        await Promise.resolve();
        expect(order).toEqual(['first:start']);

        release();
        await Promise.all([first, second]);
        expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('keeps the queue moving after a task rejects', async () => {
        const mutex = new AsyncMutex();

        const failing = mutex.runExclusive(async () => {
            throw new Error('boom');
        });
        const next = mutex.runExclusive(async () => 'ok');

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe('ok');
    });
});
