/**
 * iOS resolution.
 *
 * The iCloud-synchronized keychain is the only store that outlives an
 * uninstall, so it is consulted first. Whatever wins is mirrored into every
 * other backend.
 */
import type { ResolvedIdentity } from '../../../types/identity';
import { createLogger, redactId } from '../../logger';
import { adoptOrCreateLocalIdentity, type SecureSlot } from './support';
import { noPendingIdentity, type PendingIdentity, type ResolutionStrategy, type StrategyContext } from './types';

const logger = createLogger('CloudKeychainStrategy');

export class CloudKeychainStrategy implements ResolutionStrategy {
    readonly name = 'cloud-keychain';

    constructor(
        private context: StrategyContext,
        private deviceSlot: SecureSlot,
        private cloudSlot: SecureSlot
    ) {}

    async resolve(pending: PendingIdentity = noPendingIdentity): Promise<ResolvedIdentity> {
        const { local } = this.context;

        const fromCloud = await this.cloudSlot.read();
        if (fromCloud) {
            logger.info('Recovered id from cloud keychain', redactId(fromCloud));
            await this.deviceSlot.write(fromCloud);
            local.writeId(fromCloud);
            return { id: fromCloud, source: 'cloud-secure-store' };
        }

        const fromDevice = await this.deviceSlot.read();
        if (fromDevice) {
            await this.cloudSlot.write(fromDevice);
            local.writeId(fromDevice);
            return { id: fromDevice, source: 'local-secure-store' };
        }

        const fromLocal = local.readId();
        if (fromLocal) {
            await this.mirrorToSecureStores(fromLocal);
            return { id: fromLocal, source: 'local-store' };
        }

        const created = adoptOrCreateLocalIdentity(this.context, pending);
        await this.mirrorToSecureStores(created.id);
        return created;
    }

    async persistFallback(id: string): Promise<void> {
        await this.cloudSlot.writeIfAbsent(id);
        await this.deviceSlot.writeIfAbsent(id);
    }

    async clear(): Promise<void> {
        this.context.local.clear();
        await this.deviceSlot.clear();
        await this.cloudSlot.clear();
    }

    private async mirrorToSecureStores(id: string): Promise<void> {
        await this.deviceSlot.write(id);
        await this.cloudSlot.write(id);
    }
}
