/**
 * Device Identity Resolver
 *
 * Establishes the single id this installation is known by. `initialize()` runs
 * the platform strategy once; `getOrCreateId()` is synchronous and usable at
 * any time, falling back to the local store before resolution has finished.
 *
 * Lifecycle: uninitialized -> resolving -> resolved. `reset()` returns to
 * uninitialized.
 */
import { v4 as uuidv4 } from 'uuid';
import type {
    DeviceIdentity,
    ResolvedIdentity,
    ResolverState
} from '../../types/identity';
import { createLogger, redactId } from '../logger';
import { AsyncMutex } from '../utils/AsyncMutex';
import { runInBackground } from './diagnostics';
import type { ResolutionStrategy, StrategyContext } from './strategies';
import { createLocalIdentity } from './strategies/support';

const logger = createLogger('IdentityResolver');

export interface ResolverSnapshot {
    state: ResolverState;
    identity: DeviceIdentity | null;
}

type SnapshotListener = (snapshot: ResolverSnapshot) => void;

export const defaultGenerateId = (): string => uuidv4();

const isFallback = (identity: ResolvedIdentity): boolean =>
    identity.source === 'generated' || identity.source === 'in-memory';

export class DeviceIdentityResolver {
    private state: ResolverState = 'uninitialized';
    private current: ResolvedIdentity | null = null;
    private inflight: Promise<void> | null = null;
    private lifecycle = new AsyncMutex();
    private listeners: Set<SnapshotListener> = new Set();

    constructor(
        private strategy: ResolutionStrategy,
        private context: StrategyContext
    ) {}

    /**
     * Runs resolution once. Concurrent callers share the same run. Never
     * rejects: if the strategy fails the id comes from the local store.
     */
    initialize(): Promise<void> {
        if (this.state === 'resolved') return Promise.resolve();
        if (this.inflight) return this.inflight;

        const run = this.lifecycle.runExclusive(() => this.resolve());
        this.inflight = run.finally(() => {
            this.inflight = null;
        });
        return this.inflight;
    }

    /**
     * The id for this process. Never blocks and never returns an empty value.
     * Before resolution finishes this may be a freshly generated id, which
     * gives way if resolution recovers an existing one.
     */
    getOrCreateId(): string {
        if (this.current) return this.current.id;

        const fallback = this.resolveLocally();
        this.current = fallback;

        // An in-flight resolution persists on its own; a background write here
        // could race it for the secure stores.
        if (isFallback(fallback) && this.state === 'uninitialized' && !this.inflight) {
            runInBackground(this.context.diagnostics, 'device-secure-store', 'Fallback secure-store write', () =>
                this.strategy.persistFallback(fallback.id)
            );
        }

        this.notify();
        return fallback.id;
    }

    /** Current id, without creating one. */
    peekId(): string | null {
        return this.current ? this.current.id : null;
    }

    getIdentity(): DeviceIdentity | null {
        if (!this.current) return null;
        return { ...this.current, isFirstLaunch: this.isFirstLaunch() };
    }

    getState(): ResolverState {
        return this.state;
    }

    isFirstLaunch(): boolean {
        return this.context.local.isFirstLaunch();
    }

    async markFirstLaunchComplete(): Promise<void> {
        this.context.local.setFirstLaunch(false);
        this.notify();
    }

    /**
     * Deletes the id from every backend and forgets it. Waits for an
     * in-flight resolution first. For explicit user-triggered wipes only.
     */
    async reset(): Promise<void> {
        await this.lifecycle.runExclusive(async () => {
            try {
                await this.strategy.clear();
            } catch (e) {
                logger.error('Clearing identity backends failed', e);
            }
            this.current = null;
            this.state = 'uninitialized';
            logger.info('Identity reset');
            this.notify();
        });
    }

    /**
     * Subscribes to state and identity changes.
     * @returns unsubscribe function
     */
    subscribe(listener: SnapshotListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private async resolve(): Promise<void> {
        if (this.state === 'resolved') return;
        this.state = 'resolving';
        this.notify();

        let result: ResolvedIdentity;
        try {
            result = await this.strategy.resolve(() => this.current);
        } catch (e) {
            logger.error(`Strategy ${this.strategy.name} failed; using local store`, e);
            result = this.current ?? this.resolveLocally();
        }

        const held = this.settle(this.current, result);

        this.current = held;
        this.state = 'resolved';
        logger.info(`Resolved via ${this.strategy.name} (${held.source})`, redactId(held.id));
        this.notify();
    }

    /**
     * Picks between the id getOrCreateId() handed out and the resolved one.
     * A generated candidate gives way to whatever resolution found. An id
     * that was read from a durable store stays for this process.
     */
    private settle(pinned: ResolvedIdentity | null, result: ResolvedIdentity): ResolvedIdentity {
        if (!pinned || pinned.id === result.id) return result;

        if (isFallback(pinned)) {
            this.context.diagnostics.report({
                kind: 'superseded',
                backend: 'local-store',
                message: `Discarding generated ${redactId(pinned.id)} for resolved ${redactId(result.id)}`
            });
            return result;
        }

        this.context.diagnostics.report({
            kind: 'superseded',
            backend: 'local-store',
            message: `Keeping ${redactId(pinned.id)} for this process; ${redactId(result.id)} applies from next launch`
        });
        return pinned;
    }

    private resolveLocally(): ResolvedIdentity {
        const existing = this.context.local.readId();
        if (existing) {
            return { id: existing, source: 'local-store' };
        }
        return createLocalIdentity(this.context);
    }

    private notify(): void {
        const snapshot: ResolverSnapshot = { state: this.state, identity: this.getIdentity() };
        this.listeners.forEach((listener) => {
            try {
                listener(snapshot);
            } catch (e) {
                logger.error('Snapshot listener threw', e);
            }
        });
    }
}
