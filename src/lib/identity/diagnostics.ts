import type { IdentityBackend } from '../../types/identity';
import { createLogger, type LogLevel } from '../logger';
import { MAX_DIAGNOSTICS } from './constants';

const logger = createLogger('IdentityDiagnostics');

export type DiagnosticKind =
    | 'backend-unavailable'
    | 'persistence-failure'
    | 'not-found'
    | 'hardware-id-conflict'
    | 'superseded';

export interface IdentityDiagnostic {
    kind: DiagnosticKind;
    backend: IdentityBackend;
    message: string;
    error?: unknown;
    /** UTC timestamp */
    at: number;
}

export type DiagnosticListener = (event: IdentityDiagnostic) => void;

const LEVELS: Record<DiagnosticKind, LogLevel> = {
    'backend-unavailable': 'warn',
    'persistence-failure': 'error',
    'not-found': 'debug',
    'hardware-id-conflict': 'warn',
    'superseded': 'info',
};

/**
 * Collects non-fatal identity events. Nothing here ever reaches the UI as an
 * error; listeners feed telemetry and the debug panel.
 */
export class DiagnosticsChannel {
    private listeners: Set<DiagnosticListener> = new Set();
    private events: IdentityDiagnostic[] = [];

    report(event: Omit<IdentityDiagnostic, 'at'>): void {
        const entry: IdentityDiagnostic = { ...event, at: Date.now() };

        this.events.push(entry);
        if (this.events.length > MAX_DIAGNOSTICS) {
            this.events.shift();
        }

        const line = `${entry.kind} (${entry.backend}): ${entry.message}`;
        logger[LEVELS[entry.kind]](line, entry.error);

        this.listeners.forEach((listener) => {
            try {
                listener(entry);
            } catch (e) {
                logger.error('Diagnostic listener threw', e);
            }
        });
    }

    subscribe(listener: DiagnosticListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Most recent events, oldest first. */
    recent(): IdentityDiagnostic[] {
        return [...this.events];
    }
}

/**
 * Runs a task without awaiting it; a rejection becomes a diagnostic.
 */
export const runInBackground = (
    channel: DiagnosticsChannel,
    backend: IdentityBackend,
    label: string,
    task: () => Promise<void>
): void => {
    task().catch((error: unknown) => {
        channel.report({ kind: 'persistence-failure', backend, message: `${label} failed`, error });
    });
};
