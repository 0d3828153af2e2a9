/**
 * Shared fakes for the guardrail specs: in-memory ledger, a scripted executor and a
 * recording notification sink. Nothing here touches the network or a database.
 */

import { createGuardrailEngine, type GuardrailEngineSettings } from '../../../libs/engine/guardrailEngine.js';
import type { GuardrailDiff } from '../../../libs/execution/actionExecution.js';
import type { GuardrailExecutor } from '../../../libs/executor/guardrailExecutor.js';
import { parseCostEvent, type CostEvent } from '../../../libs/ingest/costEvent.js';
import { InMemoryExecutionLedger } from '../../../libs/ledger/memoryLedger.js';
import type { GuardrailNotification, NotificationKind, NotificationSink } from '../../../libs/notification/notification.js';
import type { GuardrailAction, GuardrailPolicy, TargetPrincipal } from '../../../libs/policy/guardrailPolicy.js';
import { StaticPolicySource, parsePolicyDefinition } from '../../../libs/policy/policyStore.js';

/** Monday 2026-03-02 10:00 UTC */
export const T0 = new Date('2026-03-02T10:00:00.000Z');

export const DEV_ROLE_ARN = 'arn:aws:iam::111111111111:role/dev';

export function minutesAfter(base: Date, minutes: number): Date {
    return new Date(base.getTime() + minutes * 60_000);
}

export function rawPolicy(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        id: 'sandbox-freeze',
        mode: 'automatic',
        ttl_minutes: 180,
        match: { source: ['anomaly'], account_ids: ['A1'], min_amount_usd: 100 },
        scope: { principals: [{ type: 'iam_role', arn: DEV_ROLE_ARN }] },
        actions: [{ type: 'attach_deny_policy', deny: ['ec2:RunInstances'] }],
        ...overrides
    };
}

export function makePolicy(overrides: Record<string, unknown> = {}): GuardrailPolicy {
    return parsePolicyDefinition(rawPolicy(overrides), 'test-fixture');
}

export function makeEvent(overrides: Record<string, unknown> = {}): CostEvent {
    return parseCostEvent({
        eventId: 'evt-1',
        source: 'anomaly',
        accountId: 'A1',
        amount: 250,
        timePeriod: { start: '2026-03-01T00:00:00Z', end: '2026-03-02T00:00:00Z' },
        details: {},
        ...overrides
    });
}

export class RecordingSink implements NotificationSink {
    readonly sent: GuardrailNotification[] = [];

    async send(notification: GuardrailNotification): Promise<void> {
        this.sent.push(notification);
    }

    kinds(): NotificationKind[] {
        return this.sent.map(notification => notification.kind);
    }

    /** Token carried by the most recent approval request */
    approvalToken(): string {
        for (const notification of [...this.sent].reverse()) {
            if (notification.kind === 'approval_request') {
                const token = new URL(notification.approveUrl).searchParams.get('token');
                if (token) return token;
            }
        }
        throw new Error('No approval request was sent');
    }
}

/**
 * Records applies and reverts; failures are scripted per test.
 */
export class ScriptedExecutor implements GuardrailExecutor {
    readonly applied: string[] = [];
    readonly reverted: string[] = [];
    failApplyOn: (action: GuardrailAction) => boolean = () => false;
    hangOnApply = false;
    revertFailuresRemaining = 0;
    failRevertOn: (target: TargetPrincipal) => boolean = () => false;

    async apply(target: TargetPrincipal, action: GuardrailAction): Promise<GuardrailDiff> {
        if (this.hangOnApply) {
            return new Promise<GuardrailDiff>(() => undefined);
        }
        if (this.failApplyOn(action)) {
            throw new Error('AccessDenied');
        }
        this.applied.push(target.arn);
        return { kind: action.type, principalArn: target.arn };
    }

    async revert(target: TargetPrincipal): Promise<void> {
        if (this.failRevertOn(target)) {
            throw new Error('AccessDenied: iam:DetachRolePolicy');
        }
        if (this.revertFailuresRemaining > 0) {
            this.revertFailuresRemaining -= 1;
            throw new Error('Throttling: rate exceeded');
        }
        this.reverted.push(target.arn);
    }
}

export const TEST_SETTINGS: GuardrailEngineSettings = {
    approvalSecret: 'test-secret',
    approvalBaseUrl: 'https://guardrails.example.test',
    approvalWindowMinutes: 60,
    tieBreak: 'first-match',
    forceSimulate: false,
    collaboratorTimeoutMs: 1_000,
    escalationThreshold: 3
};

export function buildTestEngine(
    policies: readonly GuardrailPolicy[],
    settings: Partial<GuardrailEngineSettings> = {},
    ledger: InMemoryExecutionLedger = new InMemoryExecutionLedger()
) {
    const sink = new RecordingSink();
    const executor = new ScriptedExecutor();
    let sequence = 0;

    const engine = createGuardrailEngine({
        policies: new StaticPolicySource(policies),
        ledger,
        executor,
        sinks: [sink],
        clock: () => T0,
        newExecutionId: () => `exec-${++sequence}`
    }, { ...TEST_SETTINGS, ...settings });

    return { engine, ledger, sink, executor };
}
