import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DiagnosticsChannel, runInBackground } from './diagnostics';
import { MAX_DIAGNOSTICS } from './constants';

describe('DiagnosticsChannel', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(console, 'debug').mockImplementation(() => {});
    });

    it('logs not-found at debug level only', () => {
        const channel = new DiagnosticsChannel();
        channel.report({ kind: 'not-found', backend: 'remote-directory', message: 'none' });

        expect(console.debug).toHaveBeenCalledWith('[IdentityDiagnostics] not-found (remote-directory): none', '');
        expect(console.error).not.toHaveBeenCalled();
    });

    it('keeps only the most recent events', () => {
        const channel = new DiagnosticsChannel();
        for (let i = 0; i < MAX_DIAGNOSTICS + 5; i++) {
            channel.report({ kind: 'backend-unavailable', backend: 'local-store', message: `event ${i}` });
        }

        const recent = channel.recent();
        expect(recent).toHaveLength(MAX_DIAGNOSTICS);
        expect(recent[0].message).toBe('event 5');
        expect(recent[recent.length - 1].message).toBe(`event ${MAX_DIAGNOSTICS + 4}`);
    });

    it('delivers events to subscribers until they unsubscribe', () => {
        const channel = new DiagnosticsChannel();
        const listener = vi.fn();
        const unsubscribe = channel.subscribe(listener);

        channel.report({ kind: 'superseded', backend: 'local-store', message: 'first' });
        unsubscribe();
        channel.report({ kind: 'superseded', backend: 'local-store', message: 'second' });

        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener.mock.calls[0][0]).toMatchObject({ kind: 'superseded', message: 'first' });
    });

    it('keeps delivering when a listener throws', () => {
        const channel = new DiagnosticsChannel();
        const after = vi.fn();
        channel.subscribe(() => {
            throw new Error('boom');
        });
        channel.subscribe(after);

        channel.report({ kind: 'superseded', backend: 'local-store', message: 'x' });

        expect(after).toHaveBeenCalledTimes(1);
    });

    it('turns a background rejection into a persistence failure', async () => {
        const channel = new DiagnosticsChannel();
        const error = new Error('keychain locked');

        runInBackground(channel, 'cloud-secure-store', 'Mirror', async () => {
            throw error;
        });
        await vi.waitFor(() => expect(channel.recent()).toHaveLength(1));

        expect(channel.recent()[0]).toMatchObject({
            kind: 'persistence-failure',
            backend: 'cloud-secure-store',
            message: 'Mirror failed',
            error
        });
    });
});
