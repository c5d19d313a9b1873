import { z } from 'zod';
import { IdentityError } from '../../types/errors';
import {
    DEFAULT_COLLECTION,
    DEFAULT_HARDWARE_ID_FIELD,
    DEFAULT_REMOTE_TIMEOUT_MS
} from './constants';

export const IdentityConfigSchema = z.object({
    /** Firestore collection holding user records keyed by device id. */
    collection: z.string().min(1).default(DEFAULT_COLLECTION),
    /** Field on the user record carrying the hardware identifier. */
    hardwareIdField: z.string().min(1).default(DEFAULT_HARDWARE_ID_FIELD),
    /** Upper bound for a single directory call. */
    remoteTimeoutMs: z.number().int().positive().max(60000).default(DEFAULT_REMOTE_TIMEOUT_MS),
});

export type IdentityConfig = z.infer<typeof IdentityConfigSchema>;

/**
 * Merges overrides onto the defaults and validates the result.
 *
 * @throws IdentityError with code `INVALID_CONFIG` when an override is malformed.
 */
export const loadIdentityConfig = (overrides: Partial<IdentityConfig> = {}): IdentityConfig => {
    const result = IdentityConfigSchema.safeParse(overrides);
    if (!result.success) {
        const detail = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new IdentityError(`Invalid identity config (${detail})`, 'INVALID_CONFIG', result.error);
    }
    return result.data;
};
