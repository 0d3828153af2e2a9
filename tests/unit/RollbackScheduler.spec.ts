import { describe, it } from 'node:test';
import assert from 'node:assert';
import { T0, buildTestEngine, makeEvent, makePolicy, minutesAfter, DEV_ROLE_ARN } from './helpers/guardrailFixtures.js';

async function executedGuardrail(ttlMinutes = 30) {
    const harness = buildTestEngine([makePolicy({ ttl_minutes: ttlMinutes })]);
    await harness.engine.evaluate(makeEvent(), T0);
    return harness;
}

describe('RollbackScheduler', () => {
    it('leaves guardrails alone until their ttl elapses', async () => {
        const { engine, executor } = await executedGuardrail();

        const summary = await engine.sweep(minutesAfter(T0, 29));

        assert.strictEqual(summary.attempted, 0);
        assert.deepStrictEqual(executor.reverted, []);
    });

    it('rolls back expired guardrails from the stored diff', async () => {
        const { engine, executor, sink } = await executedGuardrail();

        const summary = await engine.sweep(minutesAfter(T0, 30));

        assert.deepStrictEqual(summary, {
            attempted: 1,
            rolledBack: 1,
            failed: 0,
            skipped: 0,
            expired: 0,
            stalled: 0,
            escalated: 0,
            errors: []
        });
        const execution = await engine.getExecution('exec-1');
        assert.strictEqual(execution?.status, 'ROLLED_BACK');
        assert.strictEqual(execution?.rolledBackAt, '2026-03-02T10:30:00.000Z');
        assert.deepStrictEqual(executor.reverted, [DEV_ROLE_ARN]);
        assert.deepStrictEqual(sink.kinds(), ['execution_confirmed', 'rollback_confirmed']);
    });

    it('is idempotent across back-to-back sweeps', async () => {
        const { engine, executor } = await executedGuardrail();

        await engine.sweep(minutesAfter(T0, 30));
        const again = await engine.sweep(minutesAfter(T0, 31));

        assert.strictEqual(again.attempted, 0);
        assert.strictEqual(executor.reverted.length, 1);
    });

    it('never reverts twice under concurrent sweeps', async () => {
        const { engine, executor } = await executedGuardrail();
        const at = minutesAfter(T0, 30);

        const summaries = await Promise.all([engine.sweep(at), engine.sweep(at), engine.sweep(at)]);

        assert.strictEqual(summaries.reduce((sum, summary) => sum + summary.rolledBack, 0), 1);
        assert.strictEqual(executor.reverted.length, 1);
        assert.strictEqual((await engine.getExecution('exec-1'))?.status, 'ROLLED_BACK');
    });

    it('keeps failed rollbacks EXECUTED and escalates once past the threshold', async () => {
        const { engine, executor, sink } = await executedGuardrail();
        executor.revertFailuresRemaining = 5;

        const escalations: number[] = [];
        for (let attempt = 1; attempt <= 5; attempt += 1) {
            const summary = await engine.sweep(minutesAfter(T0, 30 + attempt));
            assert.strictEqual(summary.failed, 1);
            escalations.push(summary.escalated);
        }

        assert.deepStrictEqual(escalations, [0, 0, 0, 1, 0]);
        const stuck = await engine.getExecution('exec-1');
        assert.strictEqual(stuck?.status, 'EXECUTED');
        assert.strictEqual(stuck?.rollbackFailures, 5);
        assert.strictEqual(stuck?.lastError, 'Throttling: rate exceeded');
        assert.strictEqual(sink.kinds().filter(kind => kind === 'rollback_escalation').length, 1);

        const recovered = await engine.sweep(minutesAfter(T0, 40));
        assert.strictEqual(recovered.rolledBack, 1);
        const done = await engine.getExecution('exec-1');
        assert.strictEqual(done?.status, 'ROLLED_BACK');
        assert.strictEqual(done?.lastError, null);
    });

    it('keeps rolling back other guardrails while one keeps failing', async () => {
        const otherArn = 'arn:aws:iam::111111111111:role/other';
        const { engine, executor } = buildTestEngine([makePolicy({
            ttl_minutes: 30,
            scope: { principals: [{ type: 'iam_role', arn: DEV_ROLE_ARN }, { type: 'iam_role', arn: otherArn }] }
        })], { sweepBatchSize: 1 });
        await engine.evaluate(makeEvent(), T0);
        executor.failRevertOn = target => target.arn === DEV_ROLE_ARN;

        const first = await engine.sweep(minutesAfter(T0, 30));
        const second = await engine.sweep(minutesAfter(T0, 31));

        assert.strictEqual(first.failed, 1);
        assert.strictEqual(second.rolledBack, 1);
        const stuck = await engine.getExecution('exec-1');
        assert.strictEqual(stuck?.status, 'EXECUTED');
        assert.strictEqual(stuck?.rollbackFailures, 1);
        assert.strictEqual(stuck?.lastError, 'AccessDenied: iam:DetachRolePolicy');
        assert.strictEqual((await engine.getExecution('exec-2'))?.status, 'ROLLED_BACK');
        assert.deepStrictEqual(executor.reverted, [otherArn]);
    });

    it('expires approvals whose window has elapsed', async () => {
        const { engine, sink } = buildTestEngine([makePolicy({ mode: 'approve' })]);
        await engine.evaluate(makeEvent(), T0);

        const early = await engine.sweep(minutesAfter(T0, 59));
        const due = await engine.sweep(minutesAfter(T0, 60));

        assert.strictEqual(early.expired, 0);
        assert.strictEqual(due.expired, 1);
        assert.strictEqual((await engine.getExecution('exec-1'))?.status, 'EXPIRED');
        assert.deepStrictEqual(sink.kinds(), ['approval_request', 'approval_expired']);
    });

    it('never sweeps ttl 0 guardrails, which roll back only on request', async () => {
        const { engine, ledger, executor } = await executedGuardrail(0);

        const summary = await engine.sweep(minutesAfter(T0, 100_000));
        assert.strictEqual(summary.attempted, 0);

        const result = await engine.rollbackExecution('exec-1', 'bob', minutesAfter(T0, 5));
        assert.ok(result.status === 'rolled_back');
        assert.strictEqual(result.execution.status, 'ROLLED_BACK');
        assert.deepStrictEqual(executor.reverted, [DEV_ROLE_ARN]);
        assert.strictEqual(ledger.listAudit().at(-1)?.actor, 'user:bob');
    });

    it('skips manual rollback of unknown or unexecuted records', async () => {
        const { engine } = buildTestEngine([makePolicy({ mode: 'approve' })]);
        await engine.evaluate(makeEvent(), T0);

        assert.deepStrictEqual(await engine.rollbackExecution('exec-404', 'bob'), {
            status: 'skipped',
            executionId: 'exec-404',
            reason: 'not_found'
        });
        assert.deepStrictEqual(await engine.rollbackExecution('exec-1', 'bob'), {
            status: 'skipped',
            executionId: 'exec-1',
            reason: 'not_executed'
        });
    });

    it('stops cleanly after start()', () => {
        const { engine } = buildTestEngine([]);

        engine.scheduler.start();
        engine.scheduler.stop();
    });
});
