/**
 * Android resolution.
 *
 * Third-party apps get no synchronized keychain on Android, but ANDROID_ID
 * survives reinstall. The remote directory maps it back to the user record,
 * so a reinstall can find its old id.
 */
import type { ResolvedIdentity, IdentityRecord } from '../../../types/identity';
import { createLogger, redactId } from '../../logger';
import type { HardwareIdProvider } from '../HardwareIdProvider';
import type { IdentityDirectory } from '../IdentityDirectory';
import { adoptOrCreateLocalIdentity, attemptRead, attemptWrite } from './support';
import { noPendingIdentity, type PendingIdentity, type ResolutionStrategy, type StrategyContext } from './types';

const logger = createLogger('HardwareIdStrategy');

export class HardwareIdStrategy implements ResolutionStrategy {
    readonly name = 'hardware-id';

    constructor(
        private context: StrategyContext,
        private hardwareIds: HardwareIdProvider,
        private directory: IdentityDirectory
    ) {}

    async resolve(pending: PendingIdentity = noPendingIdentity): Promise<ResolvedIdentity> {
        const { local, diagnostics } = this.context;

        const hardwareId = await attemptRead(diagnostics, 'hardware-id', 'Hardware id read', () =>
            this.hardwareIds.getId()
        );
        const existing = local.readId();

        if (existing) {
            const record = await attemptRead(diagnostics, 'remote-directory', 'Record lookup', () =>
                this.directory.getUser(existing)
            );
            if (record) {
                if (hardwareId) {
                    await this.backfillHardwareId(record, hardwareId);
                }
                return { id: existing, source: 'remote-directory-lookup' };
            }
        }

        let lookupCompleted = false;
        if (hardwareId) {
            let match: IdentityRecord | null = null;
            try {
                match = await this.directory.findByHardwareId(hardwareId);
                lookupCompleted = true;
            } catch (e) {
                diagnostics.report({
                    kind: 'backend-unavailable',
                    backend: 'remote-directory',
                    message: 'Hardware id lookup failed',
                    error: e
                });
            }
            if (match) {
                logger.info('Recovered id from hardware id', redactId(match.id));
                local.writeId(match.id);
                return { id: match.id, source: 'hardware-id-lookup' };
            }
            if (lookupCompleted) {
                diagnostics.report({
                    kind: 'not-found',
                    backend: 'remote-directory',
                    message: 'No record claims this hardware id'
                });
            }
        }

        // Unconfirmed local id and nothing better: keep it rather than fork
        // the user into a second record. It only claims the hardware id once
        // the lookup has shown nobody else does.
        if (existing) {
            if (hardwareId && lookupCompleted) {
                await this.registerHardwareId(existing, hardwareId);
            }
            return { id: existing, source: 'local-store' };
        }

        // The lookups above can take seconds; getOrCreateId() may have handed
        // out an id meanwhile.
        const created = adoptOrCreateLocalIdentity(this.context, pending);
        if (hardwareId) {
            await this.registerHardwareId(created.id, hardwareId);
        }
        return created;
    }

    async persistFallback(): Promise<void> {
        // No secure store participates on this platform family.
    }

    async clear(): Promise<void> {
        // The remote hardware-id association is append-only and stays.
        this.context.local.clear();
    }

    /**
     * Attaches the hardware id to a confirmed record that lacks one, unless
     * another record already claims it. A record that already carries a
     * different hardware id is left as it is.
     */
    private async backfillHardwareId(record: IdentityRecord, hardwareId: string): Promise<void> {
        const { diagnostics } = this.context;

        if (record.hardwareId === hardwareId) return;
        if (record.hardwareId !== null) {
            diagnostics.report({
                kind: 'hardware-id-conflict',
                backend: 'remote-directory',
                message: `Record ${redactId(record.id)} is bound to another hardware id`
            });
            return;
        }

        let owner: IdentityRecord | null;
        try {
            owner = await this.directory.findByHardwareId(hardwareId);
        } catch (e) {
            diagnostics.report({
                kind: 'backend-unavailable',
                backend: 'remote-directory',
                message: 'Hardware id ownership check failed; skipping backfill',
                error: e
            });
            return;
        }

        if (owner && owner.id !== record.id) {
            diagnostics.report({
                kind: 'hardware-id-conflict',
                backend: 'remote-directory',
                message: `Hardware id already claimed by ${redactId(owner.id)}; keeping ${redactId(record.id)}`
            });
            return;
        }

        await this.registerHardwareId(record.id, hardwareId);
    }

    private async registerHardwareId(id: string, hardwareId: string): Promise<void> {
        await attemptWrite(this.context.diagnostics, 'remote-directory', 'Hardware id upsert', () =>
            this.directory.upsertHardwareId(id, hardwareId)
        );
    }
}
