/**
 * Remote Identity Directory
 *
 * User records live in a Firestore collection keyed by device id. A record may
 * carry the hardware identifier of the device that created it, which is how
 * an Android reinstall finds its way back to the same record.
 */
import {
    collection,
    doc,
    getDoc,
    getDocs,
    limit,
    query,
    setDoc,
    where
} from 'firebase/firestore';
import type { DocumentData, Firestore } from 'firebase/firestore';
import { z } from 'zod';
import type { IdentityRecord } from '../../types/identity';
import { BackendUnavailableError } from '../../types/errors';
import { withTimeout } from '../utils/withTimeout';
import type { IdentityConfig } from './config';

export interface IdentityDirectory {
    getUser(id: string): Promise<IdentityRecord | null>;
    /** First record whose hardware-id field equals `hardwareId`. */
    findByHardwareId(hardwareId: string): Promise<IdentityRecord | null>;
    /** Merge-writes the hardware id onto the record, creating it if needed. */
    upsertHardwareId(id: string, hardwareId: string): Promise<void>;
}

const HardwareIdFieldSchema = z.string().min(1);

export class FirestoreIdentityDirectory implements IdentityDirectory {
    constructor(
        private db: Firestore,
        private config: IdentityConfig
    ) {}

    async getUser(id: string): Promise<IdentityRecord | null> {
        const snapshot = await this.call('getUser', () => getDoc(doc(this.db, this.config.collection, id)));
        if (!snapshot.exists()) return null;
        return this.toRecord(snapshot.id, snapshot.data());
    }

    async findByHardwareId(hardwareId: string): Promise<IdentityRecord | null> {
        const snapshot = await this.call('findByHardwareId', () => getDocs(query(
            collection(this.db, this.config.collection),
            where(this.config.hardwareIdField, '==', hardwareId),
            limit(1)
        )));
        if (snapshot.empty) return null;

        const [first] = snapshot.docs;
        return this.toRecord(first.id, first.data());
    }

    async upsertHardwareId(id: string, hardwareId: string): Promise<void> {
        await this.call('upsertHardwareId', () => setDoc(
            doc(this.db, this.config.collection, id),
            {
                [this.config.hardwareIdField]: hardwareId,
                updatedAt: new Date().toISOString()
            },
            { merge: true }
        ));
    }

    private toRecord(id: string, data: DocumentData): IdentityRecord {
        const parsed = HardwareIdFieldSchema.safeParse(data[this.config.hardwareIdField]);
        return { id, hardwareId: parsed.success ? parsed.data : null };
    }

    private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
        try {
            return await withTimeout(run(), this.config.remoteTimeoutMs, () =>
                new BackendUnavailableError(
                    'remote-directory',
                    `${operation} timed out after ${this.config.remoteTimeoutMs}ms`
                )
            );
        } catch (e) {
            if (e instanceof BackendUnavailableError) throw e;
            throw new BackendUnavailableError('remote-directory', `${operation} failed`, e);
        }
    }
}

/**
 * Directory used when Firebase is not configured. Every call reports the
 * backend as unavailable, which resolution treats as "not found".
 */
export class OfflineIdentityDirectory implements IdentityDirectory {
    async getUser(): Promise<IdentityRecord | null> {
        throw new BackendUnavailableError('remote-directory', 'Firebase is not configured');
    }

    async findByHardwareId(): Promise<IdentityRecord | null> {
        throw new BackendUnavailableError('remote-directory', 'Firebase is not configured');
    }

    async upsertHardwareId(): Promise<void> {
        throw new BackendUnavailableError('remote-directory', 'Firebase is not configured');
    }
}
