/**
 * Custom error classes for the Drive folder sync
 * Every remote failure is classified once, at the Drive adapter boundary
 */

/**
 * Retry classification carried by every service error
 */
export type ErrorClass = 'retriable' | 'permanent';

/**
 * Base error class for sync operations
 */
export class DriveSyncError extends Error {
  constructor(
    message: string,
    public code: number,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Remote call failure, produced by the Drive adapter
 */
export abstract class ServiceError extends DriveSyncError {
  abstract readonly errorClass: ErrorClass;

  constructor(
    message: string,
    code: number,
    public readonly operation: string,
    public readonly statusCode?: number,
    public readonly reason?: string
  ) {
    super(message, code, { operation, statusCode, reason });
  }
}

/**
 * Overload, rate limit or momentary server fault. Retried by the RateGovernor.
 */
export class TransientServiceError extends ServiceError {
  readonly errorClass = 'retriable' as const;

  constructor(operation: string, message: string, statusCode?: number, reason?: string) {
    super(`${operation} failed (transient): ${message}`, -32010, operation, statusCode, reason);
  }
}

/**
 * Not found, invalid argument, permanently exhausted quota. Never retried.
 */
export class PermanentServiceError extends ServiceError {
  readonly errorClass = 'permanent' as const;

  constructor(operation: string, message: string, statusCode?: number, reason?: string) {
    super(`${operation} failed: ${message}`, -32011, operation, statusCode, reason);
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }
}

/**
 * A path whose parent is missing from the destination folder mapping
 */
export class InconsistentTreeError extends DriveSyncError {
  constructor(public readonly path: string, public readonly missingParent: string) {
    super(`Parent folder "${missingParent}" of "${path}" is missing in destination`, -32012, {
      path,
      missingParent
    });
  }
}

/**
 * Root folder unreachable before any work starts
 */
export class PreflightError extends DriveSyncError {
  constructor(check: string, folderId: string, cause?: string) {
    super(`${check} failed for folder ${folderId}${cause ? `: ${cause}` : ''}`, -32013, {
      check,
      folderId,
      cause
    });
  }
}

/**
 * Enumeration root could not be listed
 */
export class EnumerationError extends DriveSyncError {
  constructor(rootId: string, cause: string) {
    super(`Cannot enumerate folder ${rootId}: ${cause}`, -32014, { rootId, cause });
  }
}

/**
 * Invalid or incomplete configuration file
 */
export class ConfigurationError extends DriveSyncError {
  constructor(field: string, value: unknown, expected: string) {
    const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
    super(`Invalid ${field}: expected ${expected}, got "${displayValue}"`, -32001, {
      field,
      value,
      expected
    });
  }
}

/**
 * Missing or unusable stored credentials
 */
export class AuthenticationError extends DriveSyncError {
  constructor(message: string, path?: string) {
    super(message, -32000, {
      requiresAuth: true,
      path,
      instructions: 'Place an authorized-user token (with refresh_token) at credentials.tokenPath'
    });
  }
}

/**
 * Check whether a thrown value should be retried
 */
export function isRetriable(error: unknown): boolean {
  return error instanceof ServiceError && error.errorClass === 'retriable';
}

/**
 * Extract a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
