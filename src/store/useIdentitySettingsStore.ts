import { create } from 'zustand';
import { persist, createJSONStorage } from 'zustand/middleware';

/**
 * Firebase project settings used by the remote identity directory.
 */
export interface FirebaseSettings {
    apiKey: string;
    authDomain: string;
    projectId: string;
    appId: string;
    /** Use Firestore's IndexedDB cache. Off by default. */
    enablePersistence: boolean;
}

interface IdentitySettingsStore {
    firebaseConfig: FirebaseSettings;
    setFirebaseConfig: (config: Partial<FirebaseSettings>) => void;
}

export const defaultFirebaseSettings: FirebaseSettings = {
    apiKey: '',
    authDomain: '',
    projectId: '',
    appId: '',
    enablePersistence: false
};

export const useIdentitySettingsStore = create<IdentitySettingsStore>()(
    persist(
        (set) => ({
            firebaseConfig: defaultFirebaseSettings,
            setFirebaseConfig: (config) =>
                set((state) => ({ firebaseConfig: { ...state.firebaseConfig, ...config } })),
        }),
        {
            name: 'mystic-identity-settings',
            storage: createJSONStorage(() => localStorage),
        }
    )
);
