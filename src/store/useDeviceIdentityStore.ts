import { create } from 'zustand';
import type { IdentitySource, ResolverState } from '../types/identity';
import type { IdentityDiagnostic } from '../lib/identity/diagnostics';

const MAX_VISIBLE_DIAGNOSTICS = 20;

/**
 * Read-only mirror of the identity resolver for the UI and debug panel.
 * Written by bindIdentityStore(); components never set it directly.
 */
interface DeviceIdentityState {
    status: ResolverState;
    deviceId: string | null;
    source: IdentitySource | null;
    isFirstLaunch: boolean;
    /** Latest diagnostics, newest first. */
    diagnostics: IdentityDiagnostic[];

    pushDiagnostic: (event: IdentityDiagnostic) => void;
}

export const useDeviceIdentityStore = create<DeviceIdentityState>()((set) => ({
    status: 'uninitialized',
    deviceId: null,
    source: null,
    isFirstLaunch: true,
    diagnostics: [],

    pushDiagnostic: (event) =>
        set((state) => ({
            diagnostics: [event, ...state.diagnostics].slice(0, MAX_VISIBLE_DIAGNOSTICS)
        })),
}));
