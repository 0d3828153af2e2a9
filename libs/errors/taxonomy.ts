import { GuardrailError } from './sanitizer.js';

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

/** Malformed policy or event. Rejected at load or ingest, never coerced. */
export class ValidationError extends GuardrailError {
    constructor(
        message: string,
        public readonly issues: readonly ValidationIssue[] = [],
        options?: { contextLabel?: string; cause?: unknown }
    ) {
        super(message, 'VALIDATION_FAILED', 'VALIDATION', options);
    }
}

export type ConflictReason = 'ACTIVE_EXECUTION_EXISTS' | 'IDEMPOTENCY_KEY_USED' | 'VERSION_MISMATCH';

/**
 * Idempotency or compare-and-swap violation. Callers fold it into a no-op.
 */
export class ConflictError extends GuardrailError {
    constructor(
        message: string,
        public readonly reason: ConflictReason,
        options?: { contextLabel?: string; cause?: unknown; sqlState?: string }
    ) {
        super(message, `CONFLICT_${reason}`, 'CONFLICT', options);
    }
}

/** A collaborator call failed or did not answer in time. */
export class ExecutorError extends GuardrailError {
    constructor(
        message: string,
        public readonly operation: string,
        public readonly timedOut: boolean = false,
        options?: { contextLabel?: string; cause?: unknown }
    ) {
        super(message, timedOut ? 'COLLABORATOR_TIMEOUT' : 'COLLABORATOR_FAILED', 'EXECUTOR', options);
    }
}

export type ExpiryReason = 'TOKEN_STALE' | 'APPROVAL_WINDOW_ELAPSED' | 'NOT_IN_EXPECTED_STATE';

/** Surfaced to users as "expired / already resolved", never as a system fault. */
export class ExpiryError extends GuardrailError {
    constructor(
        message: string,
        public readonly reason: ExpiryReason,
        options?: { contextLabel?: string }
    ) {
        super(message, `EXPIRED_${reason}`, 'EXPIRY', options);
    }
}

export function isConflictError(error: unknown): error is ConflictError {
    return error instanceof ConflictError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
