/**
 * In-process stand-ins for the identity backends.
 */
import type { IdentityRecord } from '../types/identity';
import type { SecureStore } from '../lib/identity/SecureStore';
import type { IdentityDirectory } from '../lib/identity/IdentityDirectory';
import type { HardwareIdProvider } from '../lib/identity/HardwareIdProvider';
import type { KeyValueStore } from '../lib/identity/LocalKeyValueStore';
import { WebStorageKeyValueStore } from '../lib/identity/LocalKeyValueStore';

export class MemorySecureStore implements SecureStore {
    items = new Map<string, string>();
    writes: Array<{ namespace: string; key: string; value: string }> = [];
    failReads = false;
    failWrites = false;

    async read(namespace: string, key: string): Promise<string | null> {
        if (this.failReads) throw new Error('keychain unavailable');
        return this.items.get(`${namespace}/${key}`) ?? null;
    }

    async write(namespace: string, key: string, value: string): Promise<void> {
        if (this.failWrites) throw new Error('keychain unavailable');
        this.writes.push({ namespace, key, value });
        this.items.set(`${namespace}/${key}`, value);
    }

    async delete(namespace: string, key: string): Promise<void> {
        if (this.failWrites) throw new Error('keychain unavailable');
        this.items.delete(`${namespace}/${key}`);
    }

    /** Value in the slot the identity layer uses. */
    idIn(namespace: string): string | null {
        return this.items.get(`${namespace}/device_id`) ?? null;
    }
}

export class FakeIdentityDirectory implements IdentityDirectory {
    records = new Map<string, IdentityRecord>();
    upserts: Array<{ id: string; hardwareId: string }> = [];
    offline = false;
    /** Resolves pending calls when set; lets a test hold a call open. */
    gate: Promise<void> | null = null;

    seed(id: string, hardwareId: string | null = null): this {
        this.records.set(id, { id, hardwareId });
        return this;
    }

    async getUser(id: string): Promise<IdentityRecord | null> {
        await this.enter();
        return this.records.get(id) ?? null;
    }

    async findByHardwareId(hardwareId: string): Promise<IdentityRecord | null> {
        await this.enter();
        for (const record of this.records.values()) {
            if (record.hardwareId === hardwareId) return record;
        }
        return null;
    }

    async upsertHardwareId(id: string, hardwareId: string): Promise<void> {
        await this.enter();
        this.upserts.push({ id, hardwareId });
        this.records.set(id, { id, hardwareId });
    }

    private async enter(): Promise<void> {
        if (this.gate) await this.gate;
        if (this.offline) throw new Error('network unreachable');
    }
}

export class FakeHardwareIdProvider implements HardwareIdProvider {
    calls = 0;

    constructor(private id: string | null) {}

    async getId(): Promise<string | null> {
        this.calls += 1;
        return this.id;
    }
}

/**
 * Web storage store whose reads or writes can be made to throw.
 */
export class FlakyKeyValueStore implements KeyValueStore {
    failWrites = false;
    failReads = false;
    private inner = new WebStorageKeyValueStore(localStorage);

    getString(key: string): string | null {
        if (this.failReads) throw new Error('storage disabled');
        return this.inner.getString(key);
    }

    setString(key: string, value: string): void {
        if (this.failWrites) throw new Error('quota exceeded');
        this.inner.setString(key, value);
    }

    getBool(key: string): boolean | null {
        if (this.failReads) throw new Error('storage disabled');
        return this.inner.getBool(key);
    }

    setBool(key: string, value: boolean): void {
        if (this.failWrites) throw new Error('quota exceeded');
        this.inner.setBool(key, value);
    }

    remove(key: string): void {
        if (this.failWrites) throw new Error('quota exceeded');
        this.inner.remove(key);
    }
}

/**
 * Deterministic id source: test-id-1, test-id-2, ...
 */
export const sequentialIds = (prefix = 'test-id'): (() => string) => {
    let n = 0;
    return () => {
        n += 1;
        return `${prefix}-${n}`;
    };
};
