import { describe, it, expect, vi } from 'vitest';
import { Capacitor } from '@capacitor/core';
import { detectCapabilities } from './platform';

vi.mock('@capacitor/core', () => ({
    Capacitor: {
        getPlatform: vi.fn(),
    }
}));

describe('detectCapabilities', () => {
    it('uses the hardware id on Android', () => {
        vi.mocked(Capacitor.getPlatform).mockReturnValue('android');
        expect(detectCapabilities()).toEqual({ hasHardwareId: true, hasCloudSecureStore: false });
    });

    it('uses the synchronized keychain on iOS', () => {
        vi.mocked(Capacitor.getPlatform).mockReturnValue('ios');
        expect(detectCapabilities()).toEqual({ hasHardwareId: false, hasCloudSecureStore: true });
    });

    it('has neither on the web', () => {
        vi.mocked(Capacitor.getPlatform).mockReturnValue('web');
        expect(detectCapabilities()).toEqual({ hasHardwareId: false, hasCloudSecureStore: false });
    });
});
