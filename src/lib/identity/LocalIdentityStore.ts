/**
 * Local identity persistence with legacy key migration.
 *
 * Read order is canonical -> legacy -> backup. A hit on an older key is
 * copied forward to the canonical key so the next read is a direct one.
 */
import type { KeyValueStore } from './LocalKeyValueStore';
import type { DiagnosticsChannel } from './diagnostics';
import { LOCAL_KEYS } from './constants';
import { createLogger, redactId } from '../logger';
import { PersistenceFailureError } from '../../types/errors';

const logger = createLogger('LocalIdentityStore');

export class LocalIdentityStore {
    constructor(
        private store: KeyValueStore,
        private diagnostics: DiagnosticsChannel
    ) {}

    readId(): string | null {
        const candidates = [
            LOCAL_KEYS.deviceId,
            LOCAL_KEYS.legacyDeviceId,
            LOCAL_KEYS.backupDeviceId
        ];

        for (const key of candidates) {
            let value: string | null;
            try {
                value = this.store.getString(key);
            } catch (e) {
                this.diagnostics.report({
                    kind: 'backend-unavailable',
                    backend: 'local-store',
                    message: `Read of ${key} failed`,
                    error: e
                });
                continue;
            }

            if (!value) continue;

            if (key !== LOCAL_KEYS.deviceId) {
                logger.info(`Migrating device id from ${key}`, redactId(value));
                this.writeCanonical(value);
            }
            return value;
        }

        return null;
    }

    /**
     * Writes the id under every local key.
     * @returns false if the canonical write failed.
     */
    writeId(id: string): boolean {
        if (!this.writeCanonical(id)) return false;

        // Older builds only read the legacy key; the backup key is what the
        // OS backup agent copies.
        this.trySet(LOCAL_KEYS.legacyDeviceId, id);
        this.trySet(LOCAL_KEYS.backupDeviceId, id);
        return true;
    }

    isFirstLaunch(): boolean {
        try {
            return this.store.getBool(LOCAL_KEYS.firstLaunch) ?? true;
        } catch (e) {
            this.diagnostics.report({
                kind: 'backend-unavailable',
                backend: 'local-store',
                message: 'Read of first-launch flag failed',
                error: e
            });
            return true;
        }
    }

    setFirstLaunch(value: boolean): boolean {
        try {
            this.store.setBool(LOCAL_KEYS.firstLaunch, value);
            return true;
        } catch (e) {
            this.diagnostics.report({
                kind: 'persistence-failure',
                backend: 'local-store',
                message: 'Write of first-launch flag failed',
                error: new PersistenceFailureError('local-store', 'Write of first-launch flag failed', e)
            });
            return false;
        }
    }

    /**
     * Removes the id keys and the first-launch flag. The onboarding flag
     * belongs to onboarding and is left alone.
     */
    clear(): void {
        const keys = [
            LOCAL_KEYS.deviceId,
            LOCAL_KEYS.legacyDeviceId,
            LOCAL_KEYS.backupDeviceId,
            LOCAL_KEYS.firstLaunch
        ];
        for (const key of keys) {
            try {
                this.store.remove(key);
            } catch (e) {
                this.diagnostics.report({
                    kind: 'persistence-failure',
                    backend: 'local-store',
                    message: `Remove of ${key} failed`,
                    error: new PersistenceFailureError('local-store', `Remove of ${key} failed`, e)
                });
            }
        }
    }

    private writeCanonical(id: string): boolean {
        return this.trySet(LOCAL_KEYS.deviceId, id);
    }

    private trySet(key: string, value: string): boolean {
        try {
            this.store.setString(key, value);
            return true;
        } catch (e) {
            this.diagnostics.report({
                kind: 'persistence-failure',
                backend: 'local-store',
                message: `Write of ${key} failed`,
                error: new PersistenceFailureError('local-store', `Write of ${key} failed`, e)
            });
            return false;
        }
    }
}
