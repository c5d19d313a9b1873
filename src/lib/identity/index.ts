/**
 * Composition root for device identity.
 *
 * Builds one resolver per app start from the detected platform. Nothing here
 * is a global: the app shell owns the instance and hands it down.
 */
import type { PlatformCapabilities } from '../../types/identity';
import { useDeviceIdentityStore } from '../../store/useDeviceIdentityStore';
import { createLogger } from '../logger';
import { loadIdentityConfig, type IdentityConfig } from './config';
import { SECURE_NAMESPACES } from './constants';
import { DeviceIdentityResolver, defaultGenerateId } from './DeviceIdentityResolver';
import { DiagnosticsChannel } from './diagnostics';
import { getFirestoreDb } from './firebase-config';
import { CapacitorHardwareIdProvider, type HardwareIdProvider } from './HardwareIdProvider';
import {
    FirestoreIdentityDirectory,
    OfflineIdentityDirectory,
    type IdentityDirectory
} from './IdentityDirectory';
import { LocalIdentityStore } from './LocalIdentityStore';
import { WebStorageKeyValueStore, type KeyValueStore } from './LocalKeyValueStore';
import { detectCapabilities } from './platform';
import { CapacitorSecureStore, type SecureStore } from './SecureStore';
import {
    CloudKeychainStrategy,
    HardwareIdStrategy,
    LocalOnlyStrategy,
    SecureSlot,
    type ResolutionStrategy,
    type StrategyContext
} from './strategies';

const logger = createLogger('Identity');

export interface CreateResolverOptions {
    capabilities?: PlatformCapabilities;
    config?: Partial<IdentityConfig>;
    keyValueStore?: KeyValueStore;
    deviceSecureStore?: SecureStore;
    cloudSecureStore?: SecureStore;
    hardwareIdProvider?: HardwareIdProvider;
    directory?: IdentityDirectory;
    diagnostics?: DiagnosticsChannel;
    generateId?: () => string;
}

export interface IdentityRuntime {
    resolver: DeviceIdentityResolver;
    diagnostics: DiagnosticsChannel;
    strategy: ResolutionStrategy;
}

export const createDeviceIdentityResolver = (options: CreateResolverOptions = {}): IdentityRuntime => {
    const capabilities = options.capabilities ?? detectCapabilities();
    const diagnostics = options.diagnostics ?? new DiagnosticsChannel();
    const context: StrategyContext = {
        local: new LocalIdentityStore(options.keyValueStore ?? new WebStorageKeyValueStore(), diagnostics),
        diagnostics,
        generateId: options.generateId ?? defaultGenerateId,
    };

    const strategy = selectStrategy(capabilities, context, options);
    logger.info(`Using ${strategy.name} strategy`, capabilities);

    return {
        resolver: new DeviceIdentityResolver(strategy, context),
        diagnostics,
        strategy,
    };
};

/**
 * Hardware id wins over the cloud keychain if a platform ever reports both.
 */
export const selectStrategy = (
    capabilities: PlatformCapabilities,
    context: StrategyContext,
    options: CreateResolverOptions = {}
): ResolutionStrategy => {
    if (capabilities.hasHardwareId) {
        return new HardwareIdStrategy(
            context,
            options.hardwareIdProvider ?? new CapacitorHardwareIdProvider(),
            options.directory ?? createDirectory(loadIdentityConfig(options.config))
        );
    }

    if (capabilities.hasCloudSecureStore) {
        const deviceSlot = new SecureSlot(
            options.deviceSecureStore ?? new CapacitorSecureStore({ synchronize: false }),
            SECURE_NAMESPACES.device,
            'device-secure-store',
            context.diagnostics
        );
        const cloudSlot = new SecureSlot(
            options.cloudSecureStore ?? new CapacitorSecureStore({ synchronize: true }),
            SECURE_NAMESPACES.cloud,
            'cloud-secure-store',
            context.diagnostics
        );
        return new CloudKeychainStrategy(context, deviceSlot, cloudSlot);
    }

    return new LocalOnlyStrategy(context);
};

const createDirectory = (config: IdentityConfig): IdentityDirectory => {
    const db = getFirestoreDb();
    if (!db) {
        logger.warn('Firebase not configured; remote identity directory disabled');
        return new OfflineIdentityDirectory();
    }
    return new FirestoreIdentityDirectory(db, config);
};

/**
 * Mirrors resolver state and diagnostics into useDeviceIdentityStore.
 * @returns function that detaches both subscriptions
 */
export const bindIdentityStore = ({ resolver, diagnostics }: IdentityRuntime): (() => void) => {
    const unsubscribeResolver = resolver.subscribe(({ state, identity }) => {
        useDeviceIdentityStore.setState({
            status: state,
            deviceId: identity ? identity.id : null,
            source: identity ? identity.source : null,
            isFirstLaunch: resolver.isFirstLaunch(),
        });
    });
    const unsubscribeDiagnostics = diagnostics.subscribe((event) => {
        useDeviceIdentityStore.getState().pushDiagnostic(event);
    });

    return () => {
        unsubscribeResolver();
        unsubscribeDiagnostics();
    };
};

/**
 * App startup: build the resolver, mirror it into the store and resolve.
 * Resolution never rejects, so the app can always continue offline.
 */
export const bootstrapIdentity = async (options: CreateResolverOptions = {}): Promise<IdentityRuntime> => {
    const runtime = createDeviceIdentityResolver(options);
    bindIdentityStore(runtime);
    await runtime.resolver.initialize();
    return runtime;
};

export { DeviceIdentityResolver } from './DeviceIdentityResolver';
export type { ResolverSnapshot } from './DeviceIdentityResolver';
export { DiagnosticsChannel } from './diagnostics';
export type { IdentityDiagnostic } from './diagnostics';
