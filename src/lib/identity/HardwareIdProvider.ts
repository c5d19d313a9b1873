import { Device } from '@capacitor/device';
import { createLogger } from '../logger';

const logger = createLogger('HardwareId');

/**
 * Platform identifier that survives reinstall. Best-effort: never throws.
 */
export interface HardwareIdProvider {
    getId(): Promise<string | null>;
}

/**
 * Reads `Device.getId()`. On Android this is ANDROID_ID, which is stable
 * across reinstall for the same signing key.
 */
export class CapacitorHardwareIdProvider implements HardwareIdProvider {
    async getId(): Promise<string | null> {
        try {
            const { identifier } = await Device.getId();
            return identifier ? identifier : null;
        } catch (e) {
            logger.warn('Device.getId failed', e);
            return null;
        }
    }
}

export class NullHardwareIdProvider implements HardwareIdProvider {
    async getId(): Promise<string | null> {
        return null;
    }
}
