/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests error wrapping and information disclosure prevention.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ErrorSanitizer, GuardrailError, InternalError } from '../../libs/errors/sanitizer.js';
import { ConflictError, ExecutorError, ValidationError, describeError } from '../../libs/errors/taxonomy.js';

describe('ErrorSanitizer', () => {
    it('should create taxonomy errors with an incidentId and category', () => {
        const error = new ValidationError('Bad policy', [{ path: 'mode', message: 'Invalid enum value' }]);

        assert.ok(error.incidentId.length > 0, 'incidentId should not be empty');
        assert.strictEqual(error.publicMessage, 'Bad policy');
        assert.strictEqual(error.code, 'VALIDATION_FAILED');
        assert.strictEqual(error.category, 'VALIDATION');
        assert.strictEqual(error.name, 'ValidationError');
    });

    it('should derive codes from the conflict reason and timeout flag', () => {
        assert.strictEqual(new ConflictError('dup', 'IDEMPOTENCY_KEY_USED').code, 'CONFLICT_IDEMPOTENCY_KEY_USED');
        assert.strictEqual(new ExecutorError('slow', 'apply', true).code, 'COLLABORATOR_TIMEOUT');
        assert.strictEqual(new ExecutorError('down', 'apply').code, 'COLLABORATOR_FAILED');
    });

    it('should sanitize raw errors into InternalError', () => {
        const rawError = Object.assign(new Error('connection failed: password=secret123'), { code: '08006' });
        const sanitized = ErrorSanitizer.sanitize(rawError, 'db-op');

        assert.ok(sanitized instanceof InternalError);
        assert.strictEqual(
            sanitized.publicMessage,
            'An internal system error occurred. Please contact support with ID: db-op'
        );
        assert.strictEqual(sanitized.sqlState, '08006');
        assert.strictEqual(sanitized.cause, rawError);
    });

    it('should wrap thrown strings', () => {
        const sanitized = ErrorSanitizer.sanitize('boom', 'ctx');
        assert.strictEqual(sanitized.category, 'INTERNAL');
        assert.deepStrictEqual(sanitized instanceof InternalError ? sanitized.internalDetails : null, {
            originalError: 'boom',
            stack: undefined,
            context: 'ctx'
        });
    });

    it('should pass through existing GuardrailError unchanged', () => {
        const original = new GuardrailError('Original', 'CUSTOM', 'EXPIRY');
        const result = ErrorSanitizer.sanitize(original, 'test-context');

        assert.strictEqual(result, original, 'Should return same instance');
    });

    it('should describe non-Error values generically', () => {
        assert.strictEqual(describeError(new Error('Throttling')), 'Throttling');
        assert.strictEqual(describeError(42), 'Unknown error');
    });
});
