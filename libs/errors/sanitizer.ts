import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Error Information Disclosure Prevention
 * Internal errors are wrapped in a generic message and carry a unique incidentId for log
 * correlation. Taxonomy errors (see taxonomy.ts) share the same base class.
 */

export type ErrorCategory = 'VALIDATION' | 'CONFLICT' | 'EXECUTOR' | 'EXPIRY' | 'INTERNAL';

export class GuardrailError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly code: string,
        public readonly category: ErrorCategory,
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = new.target.name;
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;
    }
}

/**
 * Wraps an unexpected failure. The full internal details are logged once, here, under the
 * incidentId; only the generic message travels further.
 */
export class InternalError extends GuardrailError {
    constructor(
        publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage, 'INTERNAL_ERROR', 'INTERNAL', options);

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

function readStringField(err: object, field: 'message' | 'stack' | 'code'): string | undefined {
    const value: unknown = Reflect.get(err, field);
    return typeof value === 'string' ? value : undefined;
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized GuardrailError.
     */
    sanitize: (err: unknown, contextLabel: string): GuardrailError => {
        // Taxonomy errors are already safe to surface
        if (err instanceof GuardrailError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err !== null && typeof err === 'object') {
            originalErrorMessage = readStringField(err, 'message');
            originalErrorStack = readStringField(err, 'stack');
            sqlState = readStringField(err, 'code');
        } else {
            originalErrorMessage = String(err);
        }

        return new InternalError(
            `An internal system error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel, sqlState }
        );
    }
};
