import { describe, it, expect } from 'vitest';
import { loadIdentityConfig } from './config';
import { IdentityError } from '../../types/errors';

describe('loadIdentityConfig', () => {
    it('applies defaults', () => {
        expect(loadIdentityConfig()).toEqual({
            collection: 'users',
            hardwareIdField: 'deviceHardwareId',
            remoteTimeoutMs: 8000
        });
    });

    it('merges overrides', () => {
        expect(loadIdentityConfig({ remoteTimeoutMs: 3000 }).remoteTimeoutMs).toBe(3000);
    });

    it('rejects an invalid timeout', () => {
        expect(() => loadIdentityConfig({ remoteTimeoutMs: -1 })).toThrow(IdentityError);
        expect(() => loadIdentityConfig({ remoteTimeoutMs: -1 })).toThrow(/remoteTimeoutMs/);
    });

    it('rejects an empty collection name', () => {
        try {
            loadIdentityConfig({ collection: '' });
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(IdentityError);
            expect(e).toMatchObject({ code: 'INVALID_CONFIG' });
        }
    });
});
