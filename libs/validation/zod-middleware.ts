import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError, type ValidationIssue } from '../errors/taxonomy.js';

export function toValidationIssues(error: ZodError): ValidationIssue[] {
    return error.issues.map(e => ({
        path: e.path.join('.'),
        message: e.message
    }));
}

/**
 * Fail-closed validation.
 * Returns the parsed value or throws a ValidationError listing every issue.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = toValidationIssues(result.error);

        // Payloads are not logged; they may carry principal ARNs or tokens.
        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationError(`Validation Violation in ${context}`, errorDetails, { contextLabel: context });
    }

    return result.data;
}

/**
 * Factory for creating bound validators.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
