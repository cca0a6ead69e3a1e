/**
 * Error taxonomy for the annotation sync engine.
 * Provides a structured hierarchy with machine-readable codes, preserving original causes, and
 * optional metadata for diagnostics.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Each error includes `code`, optional `details`, and optional `cause` chain.
 * - Use specific subclasses instead of the base `AppError` wherever possible.
 */

/** Well-known application error codes. */
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    POLICY_ERROR: 'POLICY_ERROR',
    AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
    TRANSIENT: 'TRANSIENT',
    PERMANENT: 'PERMANENT',
    NOT_FOUND: 'NOT_FOUND',
    INCOMPLETE_DECISION: 'INCOMPLETE_DECISION',
    SAVE_IN_PROGRESS: 'SAVE_IN_PROGRESS',
    RECONCILIATION_FAILURE: 'RECONCILIATION_FAILURE',
    APPEND_FAILURE: 'APPEND_FAILURE',
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured diagnostic context attached to errors (never secrets). */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Arbitrary structured metadata for diagnostics. */
    public readonly details?: ErrorDetails;

    /**
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary, safe to show to the annotator
     * @param details ErrorDetails|undefined - Additional structured context (file ids, side, etc.)
     * @param cause unknown - Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: ErrorDetails, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.code = code;
        this.details = details;
        this.name = new.target.name;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** ValidationError indicates configuration or command input failed validation. */
export class ValidationError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details);
    }
}

/** PolicyError indicates the annotator is not allowed to act on the requested category. */
export class PolicyError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.POLICY_ERROR, message, details);
    }
}

/** AuthenticationError when a credential check rejects the supplied name/secret. */
export class AuthenticationError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.AUTHENTICATION_FAILED, message, details);
    }
}

/**
 * TransientError covers network, timeout and rate-limit failures of the remote store.
 * RetryingTransport retries these.
 */
export class TransientError extends AppError {
    /** HTTP-like status reported by the store, when there is one. */
    public readonly status?: number;

    constructor(message: string, details?: ErrorDetails, cause?: unknown, status?: number) {
        super(ERROR_CODES.TRANSIENT, message, details, cause);
        this.status = status;
    }
}

/**
 * PermanentError covers failures retrying cannot fix (permission, malformed request).
 * Surfaced immediately.
 */
export class PermanentError extends AppError {
    public readonly status?: number;

    constructor(message: string, details?: ErrorDetails, cause?: unknown, status?: number, code: ErrorCode = ERROR_CODES.PERMANENT) {
        super(code, message, details, cause);
        this.status = status;
    }
}

/** NotFoundError when the requested remote object does not exist. */
export class NotFoundError extends PermanentError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(message, details, cause, 404, ERROR_CODES.NOT_FOUND);
    }
}

/** IncompleteDecision when a save is attempted before both sides have a status. */
export class IncompleteDecision extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.INCOMPLETE_DECISION, message, details);
    }
}

/** SaveInProgressError rejects a second save for a pair whose save is still in flight. */
export class SaveInProgressError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.SAVE_IN_PROGRESS, message, details);
    }
}

/** ReconciliationFailure when a pointer create/delete failed after retries; nothing was appended. */
export class ReconciliationFailure extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.RECONCILIATION_FAILURE, message, details, cause);
    }
}

/** AppendFailure when a log write failed after retries and the cached-content fallback. */
export class AppendFailure extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.APPEND_FAILURE, message, details, cause);
    }
}

/** Generic internal error wrapper when no more specific category applies. */
export class InternalError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.INTERNAL_ERROR, message, details, cause);
    }
}

/**
 * Renders an unknown thrown value as a message string.
 * @example
 * DescribeError(new Error('boom')); // 'boom'
 */
export function DescribeError(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    return String(err);
}
