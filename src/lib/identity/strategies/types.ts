import type { ResolvedIdentity } from '../../../types/identity';
import type { LocalIdentityStore } from '../LocalIdentityStore';
import type { DiagnosticsChannel } from '../diagnostics';

/**
 * Collaborators every strategy shares.
 */
export interface StrategyContext {
    local: LocalIdentityStore;
    diagnostics: DiagnosticsChannel;
    generateId: () => string;
}

/**
 * The id `getOrCreateId()` has already handed out in this process, if any.
 * Read at the moment a strategy would otherwise generate an id.
 */
export type PendingIdentity = () => ResolvedIdentity | null;

export const noPendingIdentity: PendingIdentity = () => null;

/**
 * One platform family's resolution algorithm.
 */
export interface ResolutionStrategy {
    readonly name: string;

    /**
     * Produces the authoritative id and writes it to every backend the
     * strategy can reach. Never rejects on backend failure. Where nothing
     * durable holds an id, the pending id is adopted instead of a new one.
     */
    resolve(pending?: PendingIdentity): Promise<ResolvedIdentity>;

    /**
     * Copies an id generated outside resolution into the strategy's secure
     * stores, without overwriting anything already there.
     */
    persistFallback(id: string): Promise<void>;

    /** Removes the id from every backend the strategy owns. */
    clear(): Promise<void>;
}
