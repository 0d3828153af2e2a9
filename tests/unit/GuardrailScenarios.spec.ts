/**
 * End-to-end lifecycles through the engine facade, on the in-memory ledger.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { verifyAuditChain } from '../../libs/audit/integrity.js';
import { DEV_ROLE_ARN, T0, buildTestEngine, makeEvent, makePolicy, minutesAfter } from './helpers/guardrailFixtures.js';

describe('Guardrail scenarios', () => {
    it('approve → EXECUTED → ROLLED_BACK 180 minutes after execution', async () => {
        const { engine, ledger, sink, executor } = buildTestEngine([makePolicy({ mode: 'approve', ttl_minutes: 180 })]);

        const decision = await engine.evaluate(makeEvent({ amount: 742.5 }), T0);
        assert.ok(decision.outcome === 'dispatched');
        assert.strictEqual(decision.targets[0]?.result, 'planned');

        const approved = await engine.resolveApproval('exec-1', sink.approvalToken(), 'approve', 'alice', T0);
        assert.ok(approved.outcome === 'executed');
        assert.strictEqual(approved.execution.ttlExpiresAt, '2026-03-02T13:00:00.000Z');

        const tooEarly = await engine.sweep(minutesAfter(T0, 179));
        assert.strictEqual(tooEarly.rolledBack, 0);

        const due = await engine.sweep(minutesAfter(T0, 180));
        assert.strictEqual(due.rolledBack, 1);

        const execution = await engine.getExecution('exec-1');
        assert.strictEqual(execution?.status, 'ROLLED_BACK');
        assert.strictEqual(execution?.executedBy, 'user:alice');
        assert.strictEqual(execution?.version, 5);
        assert.deepStrictEqual(executor.applied, [DEV_ROLE_ARN]);
        assert.deepStrictEqual(executor.reverted, [DEV_ROLE_ARN]);
        assert.deepStrictEqual(sink.kinds(), ['approval_request', 'execution_confirmed', 'rollback_confirmed']);

        const trail = ledger.listAudit();
        assert.deepStrictEqual(trail.map(record => record.detail['to'] ?? record.type), [
            'EXECUTION_PLANNED',
            'APPROVED',
            'EXECUTED',
            'ROLLED_BACK'
        ]);
        assert.deepStrictEqual(verifyAuditChain(trail), { valid: true });
    });

    it('an exempted account yields no_match', async () => {
        const { engine, ledger, sink } = buildTestEngine([makePolicy({ exceptions: { accounts: ['A1'] } })]);

        const decision = await engine.evaluate(makeEvent(), T0);

        assert.deepStrictEqual(decision, {
            outcome: 'no_match',
            eventId: 'evt-1',
            skipped: [{ policyId: 'sandbox-freeze', reason: 'exempt:account' }]
        });
        assert.deepStrictEqual(ledger.listExecutions(), []);
        assert.deepStrictEqual(sink.kinds(), []);
    });

    it('an automatic executor failure ends in FAILED and stays there on redelivery', async () => {
        const { engine, executor, sink } = buildTestEngine([makePolicy()]);
        executor.failApplyOn = () => true;

        await engine.evaluate(makeEvent(), T0);
        await engine.evaluate(makeEvent(), minutesAfter(T0, 5));
        const sweep = await engine.sweep(minutesAfter(T0, 500));

        const execution = await engine.getExecution('exec-1');
        assert.strictEqual(execution?.status, 'FAILED');
        assert.strictEqual(execution?.lastError, 'AccessDenied');
        assert.strictEqual(sweep.attempted, 0);
        assert.deepStrictEqual(sink.kinds(), ['execution_failed']);
    });
});
