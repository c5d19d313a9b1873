import type { ResolvedIdentity } from '../../../types/identity';
import { createLocalIdentity } from './support';
import type { ResolutionStrategy, StrategyContext } from './types';

/**
 * Web and unknown platforms: the local store is the only backend.
 */
export class LocalOnlyStrategy implements ResolutionStrategy {
    readonly name = 'local-only';

    constructor(private context: StrategyContext) {}

    async resolve(): Promise<ResolvedIdentity> {
        const existing = this.context.local.readId();
        if (existing) {
            return { id: existing, source: 'local-store' };
        }
        return createLocalIdentity(this.context);
    }

    async persistFallback(): Promise<void> {
        // Nothing beyond the local store, which the caller already wrote.
    }

    async clear(): Promise<void> {
        this.context.local.clear();
    }
}
