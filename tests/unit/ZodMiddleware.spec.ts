/**
 * Unit Tests: Zod Middleware
 *
 * @see libs/validation/zod-middleware.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { ValidationError } from '../../libs/errors/taxonomy.js';
import { ApprovalQuerySchema, ManualRollbackSchema } from '../../libs/validation/schema.js';
import { createValidator, validate } from '../../libs/validation/zod-middleware.js';

describe('Zod Middleware', () => {
    const TestSchema = z.object({
        executionId: z.string().min(1),
        amount: z.number().positive()
    }).strict();

    it('should return parsed data for valid input', () => {
        assert.deepStrictEqual(validate(TestSchema, { executionId: 'exec-1', amount: 5 }, 'test'), {
            executionId: 'exec-1',
            amount: 5
        });
    });

    it('should list every issue with its path', () => {
        assert.throws(
            () => validate(TestSchema, { executionId: '', amount: -1, extra: true }, 'TestContext'),
            (error: unknown) => {
                assert.ok(error instanceof ValidationError);
                assert.strictEqual(error.message, 'Validation Violation in TestContext');
                assert.deepStrictEqual(error.issues.map(issue => issue.path), ['executionId', 'amount', '']);
                return true;
            }
        );
    });

    it('should bind schemas with createValidator', () => {
        const validateQuery = createValidator(ApprovalQuerySchema);
        assert.deepStrictEqual(validateQuery({ decision: 'reject', token: 't' }, 'query'), {
            decision: 'reject',
            token: 't'
        });
        assert.throws(() => validateQuery({ decision: 'maybe', token: 't' }, 'query'), ValidationError);
    });

    it('should refuse unknown fields on a rollback request', () => {
        const validateRollback = createValidator(ManualRollbackSchema);
        assert.throws(() => validateRollback({ requestedBy: 'bob', force: true }, 'rollback'), ValidationError);
    });
});
