/**
 * Error types for uptime-sync
 *
 * - ValidationError: bad declaration, raised synchronously by the builder
 * - ApiError: provider call failed (transport, auth, rate limit, bad payload)
 * - OperationError: a single mutation failed or was blocked during a sync;
 *   collected in the SyncReport instead of being thrown
 * - SettingsError: API credentials could not be resolved
 */

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Validation error codes for declarations
 */
export type ValidationErrorCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FIELD'
  | 'INVALID_INTERVAL'
  | 'CONTACT_CONFLICT'
  | 'DUPLICATE_MONITOR'
  | 'INVALID_DECLARATION'
  | 'REMOVAL_LIMIT_EXCEEDED'
  | 'SYNC_IN_PROGRESS';

/**
 * A single validation issue
 */
export interface ValidationIssue {
  /** Error code for programmatic handling */
  code: ValidationErrorCode;
  /** Human-readable error message */
  message: string;
  /** Path to the problematic field (e.g., "monitors.ssh.port") */
  path: string;
  /** Suggestions for fixing the issue */
  suggestions?: string[];
}

/**
 * Error thrown when a declaration is invalid
 */
export class ValidationError extends Error {
  public readonly issues: ValidationIssue[];
  public readonly code: ValidationErrorCode;

  /**
   * @param code - Defaults to the code of the first issue
   */
  constructor(message: string, issues: ValidationIssue[], code?: ValidationErrorCode) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
    this.code = code ?? issues[0]?.code ?? 'INVALID_DECLARATION';
  }

  /**
   * Build an error from a single issue, using its message
   */
  static single(
    code: ValidationErrorCode,
    path: string,
    message: string,
    suggestions?: string[]
  ): ValidationError {
    return new ValidationError(message, [{ code, path, message, suggestions }]);
  }
}

// =============================================================================
// Provider Errors
// =============================================================================

/**
 * Error raised when the provider cannot be trusted to have answered correctly
 */
export class ApiError extends Error {
  public readonly code?: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ApiError';
    this.code = options?.code;
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

/**
 * Why a single mutation did not take effect
 */
export type OperationErrorCode =
  /** The provider rejected the call */
  | 'PROVIDER_ERROR'
  /** Opaque contact types can only be created in the provider UI */
  | 'NOT_CREATABLE'
  /** An earlier mutation this one depends on did not take effect */
  | 'DEPENDENCY_BLOCKED';

export class OperationError extends Error {
  public readonly code: OperationErrorCode;
  public readonly mutationId: string;
  public readonly blockedBy: string[];

  constructor(
    message: string,
    code: OperationErrorCode,
    mutationId: string,
    options?: { blockedBy?: string[]; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'OperationError';
    this.code = code;
    this.mutationId = mutationId;
    this.blockedBy = options?.blockedBy ?? [];
  }
}

// =============================================================================
// Settings Errors
// =============================================================================

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
