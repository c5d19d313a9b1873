/**
 * Storage keys and namespaces for device identity.
 *
 * The secure-store namespaces are baked into every install that has ever
 * stored an id. Changing them orphans those ids.
 */

export const LOCAL_KEYS = {
    deviceId: 'mystic_device_id_v2',
    legacyDeviceId: 'mystic_device_id',
    backupDeviceId: 'mystic_device_id_backup',
    firstLaunch: 'mystic_first_launch',
    // Owned by onboarding; listed so nothing else reuses the name.
    onboardingComplete: 'mystic_onboarding_complete',
} as const;

export const SECURE_NAMESPACES = {
    device: 'com.mystic.identity.v1.device',
    cloud: 'com.mystic.identity.v1.cloud',
} as const;

export const SECURE_ID_KEY = 'device_id';

export const DEFAULT_COLLECTION = 'users';
export const DEFAULT_HARDWARE_ID_FIELD = 'deviceHardwareId';
export const DEFAULT_REMOTE_TIMEOUT_MS = 8000;

export const MAX_DIAGNOSTICS = 50;
