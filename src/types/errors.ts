import type { IdentityBackend } from './identity';

/**
 * Base class for application-specific errors.
 */
export class AppError extends Error {
  /**
   * @param message - The error message.
   * @param code - Optional error code.
   * @param originalError - The original error that caused this one (if any).
   */
  constructor(message: string, public code?: string, public originalError?: unknown) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Base class for device identity failures.
 */
export class IdentityError extends AppError {
  constructor(message: string, code = 'IDENTITY_ERROR', originalError?: unknown) {
    super(message, code, originalError);
    this.name = 'IdentityError';
  }
}

/**
 * A store or network backend could not be reached.
 * Always recoverable: callers treat the value as absent.
 */
export class BackendUnavailableError extends IdentityError {
  /**
   * @param backend - The backend that failed.
   * @param message - The error message.
   * @param originalError - The underlying SDK or storage error.
   */
  constructor(public backend: IdentityBackend, message: string, originalError?: unknown) {
    super(message, 'BACKEND_UNAVAILABLE', originalError);
    this.name = 'BackendUnavailableError';
  }
}

/**
 * A write to a backend failed. Logged, never surfaced to the UI.
 */
export class PersistenceFailureError extends IdentityError {
  constructor(public backend: IdentityBackend, message: string, originalError?: unknown) {
    super(message, 'PERSISTENCE_FAILURE', originalError);
    this.name = 'PersistenceFailureError';
  }
}
