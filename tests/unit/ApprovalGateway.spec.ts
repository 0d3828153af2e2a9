import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ApprovalTokenSigner, CLOCK_SKEW_MS, buildApprovalUrl } from '../../libs/approval/approvalToken.js';
import { T0, buildTestEngine, makeEvent, makePolicy, minutesAfter } from './helpers/guardrailFixtures.js';

const WINDOW_MS = 60 * 60_000;

async function plannedApproval() {
    const harness = buildTestEngine([makePolicy({ mode: 'approve' })]);
    await harness.engine.evaluate(makeEvent(), T0);
    return { ...harness, token: harness.sink.approvalToken() };
}

describe('ApprovalTokenSigner', () => {
    const signer = new ApprovalTokenSigner('test-secret', WINDOW_MS);

    it('issues <issuedAtMs>.<hex> tokens that verify for their execution', () => {
        const token = signer.issue('exec-1', T0);

        assert.match(token, /^\d+\.[a-f0-9]{64}$/);
        assert.strictEqual(token.split('.')[0], String(T0.getTime()));
        assert.deepStrictEqual(signer.verify('exec-1', token, minutesAfter(T0, 5)), { status: 'valid', issuedAt: T0 });
    });

    it('fails closed on malformed, foreign or tampered tokens', () => {
        const token = signer.issue('exec-1', T0);
        const tampered = `${T0.getTime() + 1}.${token.split('.')[1]}`;

        assert.deepStrictEqual(signer.verify('exec-1', 'not-a-token', T0), { status: 'invalid' });
        assert.deepStrictEqual(signer.verify('exec-2', token, T0), { status: 'invalid' });
        assert.deepStrictEqual(signer.verify('exec-1', tampered, T0), { status: 'invalid' });
        assert.deepStrictEqual(
            new ApprovalTokenSigner('other-secret', WINDOW_MS).verify('exec-1', token, T0),
            { status: 'invalid' }
        );
    });

    it('expires signature-valid tokens outside the window or too far in the future', () => {
        const token = signer.issue('exec-1', T0);

        assert.strictEqual(signer.verify('exec-1', token, minutesAfter(T0, 60)).status, 'valid');
        assert.strictEqual(signer.verify('exec-1', token, minutesAfter(T0, 61)).status, 'expired');
        assert.strictEqual(signer.verify('exec-1', token, new Date(T0.getTime() - CLOCK_SKEW_MS)).status, 'valid');
        assert.strictEqual(signer.verify('exec-1', token, new Date(T0.getTime() - CLOCK_SKEW_MS - 1)).status, 'expired');
    });

    it('builds approval links under the base url', () => {
        assert.strictEqual(
            buildApprovalUrl('https://guardrails.example.test/ops', 'exec-1', '1.abc', 'reject'),
            'https://guardrails.example.test/ops/approvals/exec-1?decision=reject&token=1.abc'
        );
    });
});

describe('ApprovalGateway', () => {
    it('executes on approval and records the approver', async () => {
        const { engine, sink, token } = await plannedApproval();

        const outcome = await engine.resolveApproval('exec-1', token, 'approve', 'alice', minutesAfter(T0, 10));

        assert.ok(outcome.outcome === 'executed');
        assert.strictEqual(outcome.execution.status, 'EXECUTED');
        assert.strictEqual(outcome.execution.executedBy, 'user:alice');
        assert.strictEqual(outcome.execution.ttlExpiresAt, '2026-03-02T13:10:00.000Z');
        assert.deepStrictEqual(sink.kinds(), ['approval_request', 'execution_confirmed']);
    });

    it('returns already_resolved for a second approval', async () => {
        const { engine, executor, token } = await plannedApproval();

        await engine.resolveApproval('exec-1', token, 'approve', 'alice', minutesAfter(T0, 10));
        const second = await engine.resolveApproval('exec-1', token, 'approve', 'bob', minutesAfter(T0, 11));

        assert.deepStrictEqual(second, { outcome: 'already_resolved', executionId: 'exec-1' });
        assert.strictEqual(executor.applied.length, 1);
    });

    it('lets exactly one of two concurrent approvals through', async () => {
        const { engine, executor, token } = await plannedApproval();
        const at = minutesAfter(T0, 10);

        const outcomes = await Promise.all([
            engine.resolveApproval('exec-1', token, 'approve', 'alice', at),
            engine.resolveApproval('exec-1', token, 'approve', 'bob', at)
        ]);

        assert.deepStrictEqual(outcomes.map(outcome => outcome.outcome).sort(), ['already_resolved', 'executed']);
        assert.strictEqual(executor.applied.length, 1);
    });

    it('rejects without touching the executor', async () => {
        const { engine, executor, sink, token } = await plannedApproval();

        const outcome = await engine.resolveApproval('exec-1', token, 'reject', 'alice', minutesAfter(T0, 5));

        assert.ok(outcome.outcome === 'rejected');
        assert.strictEqual(outcome.execution.status, 'REJECTED');
        assert.deepStrictEqual(executor.applied, []);
        assert.deepStrictEqual(sink.kinds(), ['approval_request', 'execution_rejected']);

        const late = await engine.resolveApproval('exec-1', token, 'approve', 'alice', minutesAfter(T0, 6));
        assert.strictEqual(late.outcome, 'already_resolved');
    });

    it('answers invalid_token for a bad token and leaves the record alone', async () => {
        const { engine } = await plannedApproval();

        const outcome = await engine.resolveApproval('exec-1', 'garbage', 'approve', 'mallory', minutesAfter(T0, 5));

        assert.deepStrictEqual(outcome, { outcome: 'invalid_token' });
        assert.strictEqual((await engine.getExecution('exec-1'))?.status, 'PLANNED');
    });

    it('expires a stale token and the overdue record', async () => {
        const { engine, sink, token } = await plannedApproval();

        const outcome = await engine.resolveApproval('exec-1', token, 'approve', 'alice', minutesAfter(T0, 61));

        assert.deepStrictEqual(outcome, { outcome: 'expired', executionId: 'exec-1' });
        assert.strictEqual((await engine.getExecution('exec-1'))?.status, 'EXPIRED');
        assert.deepStrictEqual(sink.kinds(), ['approval_request', 'approval_expired']);
    });

    it('does not expire a record that is still inside its window', async () => {
        const { engine } = await plannedApproval();
        const futureToken = new ApprovalTokenSigner('test-secret', WINDOW_MS).issue('exec-1', minutesAfter(T0, 10));

        const outcome = await engine.resolveApproval('exec-1', futureToken, 'approve', 'alice', T0);

        assert.deepStrictEqual(outcome, { outcome: 'expired', executionId: 'exec-1' });
        assert.strictEqual((await engine.getExecution('exec-1'))?.status, 'PLANNED');
    });

    it('does not confirm whether an unknown execution exists', async () => {
        const { engine } = await plannedApproval();
        const token = new ApprovalTokenSigner('test-secret', WINDOW_MS).issue('exec-404', T0);

        const outcome = await engine.resolveApproval('exec-404', token, 'approve', 'alice', minutesAfter(T0, 1));

        assert.deepStrictEqual(outcome, { outcome: 'already_resolved', executionId: 'exec-404' });
    });
});
