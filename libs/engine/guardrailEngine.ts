/**
 * Composition root for the guardrail engine. Wires policy source, ledger, executor and
 * notification sinks into the orchestrator, gateway and scheduler, and exposes the three
 * entry points (plus manual rollback).
 */

import { ApprovalGateway, DEFAULT_APPROVER, type ApprovalDecision, type ApprovalOutcome } from '../approval/approvalGateway.js';
import { ApprovalTokenSigner } from '../approval/approvalToken.js';
import { userActor, type ActionExecution } from '../execution/actionExecution.js';
import {
    ExecutionOrchestrator,
    type EvaluationDecision,
    type OrchestratorSettings,
    type RollbackResult
} from '../execution/orchestrator.js';
import type { GuardrailExecutor } from '../executor/guardrailExecutor.js';
import type { ExecutionLedger } from '../ledger/executionLedger.js';
import type { NotificationSink } from '../notification/notification.js';
import { NotificationDispatcher } from '../notification/notificationDispatcher.js';
import type { PolicySource } from '../policy/policyStore.js';
import { RollbackScheduler, type SweepSummary } from '../rollback/RollbackScheduler.js';

export interface EngineDependencies {
    readonly policies: PolicySource;
    readonly ledger: ExecutionLedger;
    readonly executor: GuardrailExecutor;
    readonly sinks: readonly NotificationSink[];
    readonly clock?: () => Date;
    readonly newExecutionId?: () => string;
}

export interface GuardrailEngineSettings extends OrchestratorSettings {
    readonly approvalSecret: string;
    readonly sweepIntervalMs?: number;
    readonly sweepBatchSize?: number;
}

export interface GuardrailEngine {
    evaluate(event: unknown, now?: Date): Promise<EvaluationDecision>;
    resolveApproval(executionId: string, token: string, decision: ApprovalDecision, approver?: string, now?: Date): Promise<ApprovalOutcome>;
    sweep(now?: Date): Promise<SweepSummary>;
    rollbackExecution(executionId: string, requestedBy: string, now?: Date): Promise<RollbackResult>;
    getExecution(executionId: string): Promise<ActionExecution | null>;
    readonly scheduler: RollbackScheduler;
}

export function createGuardrailEngine(deps: EngineDependencies, settings: GuardrailEngineSettings): GuardrailEngine {
    const clock = deps.clock ?? (() => new Date());
    const tokens = new ApprovalTokenSigner(settings.approvalSecret, settings.approvalWindowMinutes * 60_000);
    const notifications = new NotificationDispatcher(deps.sinks, settings.collaboratorTimeoutMs);

    const orchestrator = new ExecutionOrchestrator({
        policies: deps.policies,
        ledger: deps.ledger,
        executor: deps.executor,
        notifications,
        tokens,
        clock,
        newExecutionId: deps.newExecutionId
    }, settings);

    const gateway = new ApprovalGateway(orchestrator, tokens, clock);
    const scheduler = new RollbackScheduler(orchestrator, {
        intervalMs: settings.sweepIntervalMs,
        batchSize: settings.sweepBatchSize,
        clock
    });

    return {
        evaluate: (event, now) => orchestrator.evaluate(event, now),
        resolveApproval: (executionId, token, decision, approver = DEFAULT_APPROVER, now) =>
            gateway.resolve(executionId, token, decision, approver, now),
        sweep: now => scheduler.sweep(now ?? clock()),
        rollbackExecution: (executionId, requestedBy, now) =>
            orchestrator.rollback(executionId, userActor(requestedBy), now),
        getExecution: executionId => orchestrator.findExecution(executionId),
        scheduler
    };
}
