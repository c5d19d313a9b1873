/**
 * Firebase Configuration
 *
 * Lazily initializes the Firebase app and Firestore for the identity
 * directory. Values come from the identity settings store.
 */
import { initializeApp } from 'firebase/app';
import type { FirebaseApp } from 'firebase/app';
import {
    getFirestore,
    initializeFirestore,
    persistentLocalCache,
    persistentMultipleTabManager
} from 'firebase/firestore';
import type { Firestore } from 'firebase/firestore';
import { useIdentitySettingsStore } from '../../store/useIdentitySettingsStore';
import type { FirebaseSettings } from '../../store/useIdentitySettingsStore';
import { createLogger } from '../logger';

const logger = createLogger('Firebase');

/**
 * Returns the settings if every required field is filled, otherwise null.
 */
export const getFirebaseConfig = (): FirebaseSettings | null => {
    const { firebaseConfig } = useIdentitySettingsStore.getState();
    return isFirebaseConfigValid(firebaseConfig) ? firebaseConfig : null;
};

export const isFirebaseConfigValid = (config: FirebaseSettings): boolean => {
    return !!(config.apiKey && config.authDomain && config.projectId && config.appId);
};

let app: FirebaseApp | null = null;
let firestore: Firestore | null = null;
let currentConfigHash: string | null = null;
let generation = 0;

const getConfigHash = (config: FirebaseSettings): string => {
    return `${config.apiKey}|${config.authDomain}|${config.projectId}|${config.appId}|${config.enablePersistence}`;
};

/**
 * Drops the cached instances; the next call reinitializes.
 */
export const resetFirebase = (): void => {
    app = null;
    firestore = null;
    currentConfigHash = null;
    logger.info('Reset - will reinitialize on next use');
};

/**
 * @returns true if Firebase is ready, false if unconfigured or init failed
 */
export const initializeFirebase = (): boolean => {
    const config = getFirebaseConfig();
    if (!config) return false;

    const newConfigHash = getConfigHash(config);
    if (app && currentConfigHash === newConfigHash) {
        return true;
    }
    if (app) {
        logger.info('Config changed, reinitializing...');
        resetFirebase();
    }

    try {
        const { enablePersistence, ...options } = config;
        // Named app so a config change never collides with the previous [DEFAULT].
        generation += 1;
        const nextApp = initializeApp(options, `identity-${generation}`);

        if (enablePersistence) {
            try {
                firestore = initializeFirestore(nextApp, {
                    localCache: persistentLocalCache({
                        tabManager: persistentMultipleTabManager()
                    })
                });
                logger.info('Offline persistence enabled');
            } catch (err) {
                logger.warn('Persistence failed, falling back to default:', err);
                firestore = getFirestore(nextApp);
            }
        } else {
            firestore = getFirestore(nextApp);
        }

        app = nextApp;
        currentConfigHash = newConfigHash;
        logger.info('Initialized successfully');
        return true;
    } catch (error) {
        logger.error('Initialization failed:', error);
        firestore = null;
        return false;
    }
};

/**
 * Firestore instance, or null when Firebase is unconfigured.
 */
export const getFirestoreDb = (): Firestore | null => {
    if (!firestore) initializeFirebase();
    return firestore;
};
