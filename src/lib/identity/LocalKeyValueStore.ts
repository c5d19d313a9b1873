/**
 * Synchronous, durable key-value storage for a handful of identity values.
 * Implementations may throw on write (quota, storage disabled).
 */
export interface KeyValueStore {
    getString(key: string): string | null;
    setString(key: string, value: string): void;
    getBool(key: string): boolean | null;
    setBool(key: string, value: boolean): void;
    remove(key: string): void;
}

/**
 * KeyValueStore over the Web Storage API. In the app this is the WebView's
 * `localStorage`, which Capacitor keeps across app updates.
 */
export class WebStorageKeyValueStore implements KeyValueStore {
    constructor(private storage: Storage = localStorage) {}

    getString(key: string): string | null {
        return this.storage.getItem(key);
    }

    setString(key: string, value: string): void {
        this.storage.setItem(key, value);
    }

    getBool(key: string): boolean | null {
        const raw = this.storage.getItem(key);
        if (raw === 'true') return true;
        if (raw === 'false') return false;
        return null;
    }

    setBool(key: string, value: boolean): void {
        this.storage.setItem(key, value ? 'true' : 'false');
    }

    remove(key: string): void {
        this.storage.removeItem(key);
    }
}
