import type { IdentityBackend, ResolvedIdentity } from '../../../types/identity';
import { createLogger, redactId } from '../../logger';
import type { DiagnosticsChannel } from '../diagnostics';
import type { SecureStore } from '../SecureStore';
import { SECURE_ID_KEY } from '../constants';
import { PersistenceFailureError } from '../../../types/errors';
import type { PendingIdentity, StrategyContext } from './types';

const logger = createLogger('IdentityStrategy');

/**
 * Runs a read; a failure is reported and treated as "absent".
 */
export async function attemptRead<T>(
    diagnostics: DiagnosticsChannel,
    backend: IdentityBackend,
    label: string,
    read: () => Promise<T | null>
): Promise<T | null> {
    try {
        return await read();
    } catch (e) {
        diagnostics.report({ kind: 'backend-unavailable', backend, message: `${label} failed`, error: e });
        return null;
    }
}

/**
 * Runs a write; a failure is reported and resolution carries on.
 * @returns whether the write succeeded
 */
export async function attemptWrite(
    diagnostics: DiagnosticsChannel,
    backend: IdentityBackend,
    label: string,
    write: () => Promise<void>
): Promise<boolean> {
    try {
        await write();
        return true;
    } catch (e) {
        diagnostics.report({
            kind: 'persistence-failure',
            backend,
            message: `${label} failed`,
            error: new PersistenceFailureError(backend, `${label} failed`, e)
        });
        return false;
    }
}

/**
 * Generates a fresh id, persists it locally and marks this as a first launch.
 * If the local store rejects the write the id lives only in memory.
 */
export function createLocalIdentity(context: StrategyContext): ResolvedIdentity {
    const id = context.generateId();
    const persisted = context.local.writeId(id);
    context.local.setFirstLaunch(true);

    if (!persisted) {
        logger.warn('Local store unavailable; id will not survive restart', redactId(id));
        return { id, source: 'in-memory' };
    }
    logger.info('Generated new device id', redactId(id));
    return { id, source: 'generated' };
}

/**
 * Adopts the id already handed out in this process, so a resolution that
 * finds nothing durable never generates a second one.
 */
export function adoptOrCreateLocalIdentity(context: StrategyContext, pending: PendingIdentity): ResolvedIdentity {
    const handedOut = pending();
    if (handedOut) {
        logger.info('Adopting id handed out during resolution', redactId(handedOut.id));
        return handedOut;
    }
    return createLocalIdentity(context);
}

/**
 * The single id slot in one secure-store namespace.
 */
export class SecureSlot {
    constructor(
        private store: SecureStore,
        private namespace: string,
        readonly backend: IdentityBackend,
        private diagnostics: DiagnosticsChannel
    ) {}

    read(): Promise<string | null> {
        return attemptRead(this.diagnostics, this.backend, `Read ${this.namespace}`, () =>
            this.store.read(this.namespace, SECURE_ID_KEY)
        );
    }

    write(id: string): Promise<boolean> {
        return attemptWrite(this.diagnostics, this.backend, `Write ${this.namespace}`, () =>
            this.store.write(this.namespace, SECURE_ID_KEY, id)
        );
    }

    /**
     * Writes only when the slot is empty. A slot that cannot be read is
     * left alone; it may already hold a different id.
     */
    async writeIfAbsent(id: string): Promise<void> {
        let existing: string | null;
        try {
            existing = await this.store.read(this.namespace, SECURE_ID_KEY);
        } catch (e) {
            this.diagnostics.report({
                kind: 'backend-unavailable',
                backend: this.backend,
                message: `Read ${this.namespace} before fallback write failed`,
                error: e
            });
            return;
        }
        if (existing) return;
        await this.write(id);
    }

    async clear(): Promise<void> {
        await attemptWrite(this.diagnostics, this.backend, `Delete ${this.namespace}`, () =>
            this.store.delete(this.namespace, SECURE_ID_KEY)
        );
    }
}
