import { Capacitor } from '@capacitor/core';
import type { PlatformCapabilities } from '../../types/identity';

/**
 * Maps the running Capacitor platform to its identity capabilities.
 */
export const detectCapabilities = (): PlatformCapabilities => {
    switch (Capacitor.getPlatform()) {
        case 'android':
            return { hasHardwareId: true, hasCloudSecureStore: false };
        case 'ios':
            return { hasHardwareId: false, hasCloudSecureStore: true };
        default:
            return { hasHardwareId: false, hasCloudSecureStore: false };
    }
};
