import { SecureStorage } from '@aparajita/capacitor-secure-storage';

/**
 * Encrypted key-value storage provided by the OS.
 * All calls may reject; callers decide whether a failure matters.
 */
export interface SecureStore {
    read(namespace: string, key: string): Promise<string | null>;
    write(namespace: string, key: string, value: string): Promise<void>;
    delete(namespace: string, key: string): Promise<void>;
}

export interface CapacitorSecureStoreOptions {
    /**
     * Store items in the iCloud-synchronized keychain. Synchronized items
     * survive uninstall; device-local ones do not.
     */
    synchronize: boolean;
}

/**
 * SecureStore over the Keychain (iOS) / Keystore (Android) plugin.
 */
export class CapacitorSecureStore implements SecureStore {
    private synchronize: boolean;

    constructor(options: CapacitorSecureStoreOptions) {
        this.synchronize = options.synchronize;
    }

    async read(namespace: string, key: string): Promise<string | null> {
        const value = await SecureStorage.get(itemKey(namespace, key), false, this.synchronize);
        return typeof value === 'string' && value.length > 0 ? value : null;
    }

    async write(namespace: string, key: string, value: string): Promise<void> {
        await SecureStorage.set(itemKey(namespace, key), value, false, this.synchronize);
    }

    async delete(namespace: string, key: string): Promise<void> {
        await SecureStorage.remove(itemKey(namespace, key), this.synchronize);
    }
}

const itemKey = (namespace: string, key: string): string => `${namespace}.${key}`;
