/**
 * Where the currently held device id came from.
 * Diagnostics only: behavior never branches on it once resolution is done.
 */
export type IdentitySource =
    | 'local-store'
    | 'local-secure-store'
    | 'cloud-secure-store'
    | 'hardware-id-lookup'
    | 'remote-directory-lookup'
    | 'generated'
    | 'in-memory'; // generated, but no durable backend accepted it

export interface DeviceIdentity {
    id: string;
    source: IdentitySource;
    isFirstLaunch: boolean;
}

export type ResolverState = 'uninitialized' | 'resolving' | 'resolved';

/**
 * Capability descriptor used to pick a resolution strategy once at startup.
 */
export interface PlatformCapabilities {
    /** Platform supplies an identifier that survives uninstall/reinstall. */
    hasHardwareId: boolean;
    /** Platform offers an OS-synchronized secure store (iCloud Keychain). */
    hasCloudSecureStore: boolean;
}

export type IdentityBackend =
    | 'local-store'
    | 'device-secure-store'
    | 'cloud-secure-store'
    | 'hardware-id'
    | 'remote-directory';

/**
 * A user record in the remote identity directory.
 */
export interface IdentityRecord {
    id: string;
    hardwareId: string | null;
}

/**
 * Outcome of one strategy run.
 */
export interface ResolvedIdentity {
    id: string;
    source: IdentitySource;
}
