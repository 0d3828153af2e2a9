/**
 * Execution Orchestrator
 *
 * Owns the lifecycle of every execution record. The approval gateway and the rollback
 * scheduler drive transitions through this class; nothing else writes to the ledger.
 *
 * All three modes share one state machine:
 *   simulate   no record; a decision and a notification only
 *   approve    PLANNED, then APPROVED → EXECUTED | FAILED once a human approves
 *   automatic  PLANNED → EXECUTED | FAILED in the same call
 */

import crypto from 'node:crypto';
import { pino } from 'pino';
import type { AuditEntry } from '../audit/schema.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import {
    ConflictError,
    ExpiryError,
    ValidationError,
    describeError,
    isConflictError,
    type ConflictReason,
    type ValidationIssue
} from '../errors/taxonomy.js';
import type { GuardrailExecutor } from '../executor/guardrailExecutor.js';
import { parseCostEvent, type CostEvent } from '../ingest/costEvent.js';
import type { ExecutionLedger } from '../ledger/executionLedger.js';
import { buildApprovalUrl, type ApprovalTokenSigner } from '../approval/approvalToken.js';
import type { NotificationDispatcher } from '../notification/notificationDispatcher.js';
import type { TargetPrincipal } from '../policy/guardrailPolicy.js';
import { evaluatePolicies, type SkippedPolicy, type TieBreakStrategy } from '../policy/matcher.js';
import { buildActionPlan, type MatchedActionPlan } from '../policy/planBuilder.js';
import type { PolicySource } from '../policy/policyStore.js';
import {
    SYSTEM_ACTOR,
    buildIdempotencyKey,
    type ActionExecution,
    type AppliedAction,
    type ExecutingMode,
    type ExecutionChanges,
    type NewExecution
} from './actionExecution.js';
import { assertTransition } from './stateMachine.js';
import { timeBoundExecutor, timeBoundLedger } from './timeBound.js';

const logger = pino({ name: 'ExecutionOrchestrator' });

const MINUTE_MS = 60_000;

export const SCHEDULER_ACTOR = 'system:scheduler';

export interface OrchestratorSettings {
    readonly approvalWindowMinutes: number;
    readonly approvalBaseUrl: string;
    readonly tieBreak: TieBreakStrategy;
    /** Downgrade every matched plan to simulate */
    readonly forceSimulate: boolean;
    /** Bound on every executor and ledger call */
    readonly collaboratorTimeoutMs: number;
    /** Consecutive rollback failures tolerated before a human is paged */
    readonly escalationThreshold: number;
}

export interface OrchestratorDependencies {
    readonly policies: PolicySource;
    readonly ledger: ExecutionLedger;
    readonly executor: GuardrailExecutor;
    readonly notifications: NotificationDispatcher;
    readonly tokens: ApprovalTokenSigner;
    readonly clock?: () => Date;
    readonly newExecutionId?: () => string;
}

export type TargetOutcome =
    | { readonly target: TargetPrincipal; readonly result: 'planned'; readonly executionId: string; readonly approvalExpiresAt: string }
    | { readonly target: TargetPrincipal; readonly result: 'executed'; readonly executionId: string; readonly ttlExpiresAt: string | null }
    | { readonly target: TargetPrincipal; readonly result: 'failed'; readonly executionId: string; readonly error: string }
    | { readonly target: TargetPrincipal; readonly result: 'duplicate'; readonly reason: ConflictReason; readonly existingExecutionId: string | null };

export type EvaluationDecision =
    | { readonly outcome: 'no_match'; readonly eventId: string; readonly skipped: readonly SkippedPolicy[] }
    | { readonly outcome: 'simulated'; readonly eventId: string; readonly policyId: string; readonly plan: MatchedActionPlan }
    | {
        readonly outcome: 'dispatched';
        readonly eventId: string;
        readonly policyId: string;
        readonly mode: ExecutingMode;
        readonly targets: readonly TargetOutcome[];
    }
    | { readonly outcome: 'rejected'; readonly eventId: string | null; readonly issues: readonly ValidationIssue[] };

export type ResolutionOutcome =
    | { readonly outcome: 'executed'; readonly execution: ActionExecution }
    | { readonly outcome: 'failed'; readonly execution: ActionExecution; readonly error: string }
    | { readonly outcome: 'rejected'; readonly execution: ActionExecution }
    | { readonly outcome: 'expired'; readonly executionId: string }
    | { readonly outcome: 'already_resolved'; readonly executionId: string };

export type RollbackResult =
    | { readonly status: 'rolled_back'; readonly execution: ActionExecution }
    | { readonly status: 'failed'; readonly consecutiveFailures: number; readonly escalated: boolean; readonly error: string }
    | { readonly status: 'skipped'; readonly executionId: string; readonly reason: 'not_executed' | 'claimed_elsewhere' | 'not_found' };

function addMinutes(at: Date, minutes: number): string {
    return new Date(at.getTime() + minutes * MINUTE_MS).toISOString();
}

/**
 * Time an in-flight execution gets to reach EXECUTED or FAILED: one bounded call per apply and
 * per compensating revert, plus the ledger writes around them.
 */
function claimDeadline(at: Date, actionCount: number, collaboratorTimeoutMs: number): string {
    return new Date(at.getTime() + collaboratorTimeoutMs * (2 * actionCount + 4)).toISOString();
}

function peekEventId(input: unknown): string | null {
    if (input === null || typeof input !== 'object') return null;
    const value: unknown = Reflect.get(input, 'eventId');
    return typeof value === 'string' && value.length > 0 ? value : null;
}

export class ExecutionOrchestrator {
    private readonly ledger: ExecutionLedger;
    private readonly executor: GuardrailExecutor;
    private readonly clock: () => Date;
    private readonly newExecutionId: () => string;

    constructor(
        private readonly deps: OrchestratorDependencies,
        private readonly settings: OrchestratorSettings
    ) {
        this.ledger = timeBoundLedger(deps.ledger, settings.collaboratorTimeoutMs);
        this.executor = timeBoundExecutor(deps.executor, settings.collaboratorTimeoutMs);
        this.clock = deps.clock ?? (() => new Date());
        this.newExecutionId = deps.newExecutionId ?? (() => `exec-${crypto.randomUUID()}`);
    }

    /**
     * Entry point per incoming event. Redeliveries of the same event never produce a second
     * execution.
     */
    async evaluate(input: unknown, now?: Date): Promise<EvaluationDecision> {
        const evaluatedAt = now ?? this.clock();

        let event: CostEvent;
        try {
            event = parseCostEvent(input);
        } catch (error) {
            if (!(error instanceof ValidationError)) throw error;
            const eventId = peekEventId(input);
            await this.recordDurably({
                type: 'EVENT_REJECTED',
                actor: SYSTEM_ACTOR,
                ...(eventId ? { eventId } : {}),
                detail: { issues: error.issues.map(issue => `${issue.path}: ${issue.message}`) }
            }, evaluatedAt);
            return { outcome: 'rejected', eventId, issues: error.issues };
        }

        try {
            return await this.decide(event, evaluatedAt);
        } catch (error) {
            await this.recordEventFailure(event, error, evaluatedAt);
            throw ErrorSanitizer.sanitize(error, 'ExecutionOrchestrator:Evaluate');
        }
    }

    private async decide(event: CostEvent, evaluatedAt: Date): Promise<EvaluationDecision> {
        const snapshot = await this.deps.policies.loadPolicies();
        const { policy, skipped } = evaluatePolicies(event, snapshot.policies, evaluatedAt, this.settings.tieBreak);
        const plan = buildActionPlan(policy, event, { forceSimulate: this.settings.forceSimulate });

        if (!plan.matched) {
            logger.debug({ eventId: event.eventId, skipped }, 'No guardrail policy matched');
            return { outcome: 'no_match', eventId: event.eventId, skipped };
        }

        if (plan.mode === 'simulate') {
            await this.audit({
                type: 'DECISION_SIMULATED',
                actor: SYSTEM_ACTOR,
                eventId: event.eventId,
                policyId: plan.policyId,
                detail: {
                    declaredMode: plan.declaredMode,
                    policyRevision: snapshot.revision,
                    targets: plan.targetPrincipals.map(t => t.arn)
                }
            }, evaluatedAt);
            await this.deps.notifications.publish({
                kind: 'simulation',
                eventId: event.eventId,
                policyId: plan.policyId,
                declaredMode: plan.declaredMode,
                targets: plan.targetPrincipals,
                actions: plan.actions,
                ttlMinutes: plan.ttlMinutes,
                amount: event.amount,
                accountId: event.accountId,
                routing: plan.notify
            });
            logger.info({ eventId: event.eventId, policyId: plan.policyId }, 'Guardrail simulated');
            return { outcome: 'simulated', eventId: event.eventId, policyId: plan.policyId, plan };
        }

        const mode: ExecutingMode = plan.mode;
        const targets: TargetOutcome[] = [];
        for (const target of plan.targetPrincipals) {
            targets.push(await this.startExecution(plan, mode, target, evaluatedAt, snapshot.revision));
        }

        return { outcome: 'dispatched', eventId: event.eventId, policyId: plan.policyId, mode, targets };
    }

    private async startExecution(
        plan: MatchedActionPlan,
        mode: ExecutingMode,
        target: TargetPrincipal,
        at: Date,
        policyRevision: string
    ): Promise<TargetOutcome> {
        const active = await this.ledger.findActiveByPolicyTarget(plan.policyId, target.arn);
        if (active) {
            return this.foldDuplicate(plan, target, 'ACTIVE_EXECUTION_EXISTS', active.executionId, at);
        }

        const record: NewExecution = {
            executionId: this.newExecutionId(),
            policyId: plan.policyId,
            eventId: plan.eventId,
            idempotencyKey: buildIdempotencyKey(plan.eventId, plan.policyId, target.arn),
            mode,
            target,
            actions: plan.actions,
            ttlMinutes: plan.ttlMinutes,
            notify: plan.notify,
            createdAt: at.toISOString(),
            approvalExpiresAt: mode === 'approve' ? addMinutes(at, this.settings.approvalWindowMinutes) : null,
            claimExpiresAt: mode === 'automatic'
                ? claimDeadline(at, plan.actions.length, this.settings.collaboratorTimeoutMs)
                : null
        };

        let execution: ActionExecution;
        try {
            execution = await this.ledger.insertPlanned(record, at);
        } catch (error) {
            if (!isConflictError(error)) throw error;
            return this.foldDuplicate(plan, target, error.reason, null, at);
        }

        await this.audit({
            type: 'EXECUTION_PLANNED',
            actor: SYSTEM_ACTOR,
            eventId: execution.eventId,
            executionId: execution.executionId,
            policyId: execution.policyId,
            detail: { mode, target: target.arn, policyRevision }
        }, at);

        if (mode === 'approve') {
            await this.requestApproval(execution, at);
            return {
                target,
                result: 'planned',
                executionId: execution.executionId,
                approvalExpiresAt: execution.approvalExpiresAt ?? record.createdAt
            };
        }

        const finished = await this.execute(execution, SYSTEM_ACTOR, at);
        if (finished.status === 'EXECUTED') {
            return { target, result: 'executed', executionId: finished.executionId, ttlExpiresAt: finished.ttlExpiresAt };
        }
        return { target, result: 'failed', executionId: finished.executionId, error: finished.lastError ?? 'unknown' };
    }

    private async foldDuplicate(
        plan: MatchedActionPlan,
        target: TargetPrincipal,
        reason: ConflictReason,
        existingExecutionId: string | null,
        at: Date
    ): Promise<TargetOutcome> {
        logger.info({
            eventId: plan.eventId,
            policyId: plan.policyId,
            target: target.arn,
            reason,
            existingExecutionId
        }, 'Duplicate guardrail trigger folded into no-op');

        await this.audit({
            type: 'EXECUTION_DUPLICATE',
            actor: SYSTEM_ACTOR,
            eventId: plan.eventId,
            policyId: plan.policyId,
            ...(existingExecutionId ? { executionId: existingExecutionId } : {}),
            detail: { target: target.arn, reason }
        }, at);

        return { target, result: 'duplicate', reason, existingExecutionId };
    }

    private async requestApproval(execution: ActionExecution, at: Date): Promise<void> {
        const token = this.deps.tokens.issue(execution.executionId, at);
        await this.deps.notifications.publish({
            kind: 'approval_request',
            executionId: execution.executionId,
            policyId: execution.policyId,
            eventId: execution.eventId,
            target: execution.target,
            routing: execution.notify,
            actions: execution.actions,
            ttlMinutes: execution.ttlMinutes,
            approveUrl: buildApprovalUrl(this.settings.approvalBaseUrl, execution.executionId, token, 'approve'),
            rejectUrl: buildApprovalUrl(this.settings.approvalBaseUrl, execution.executionId, token, 'reject'),
            expiresAt: execution.approvalExpiresAt ?? addMinutes(at, this.settings.approvalWindowMinutes)
        });
    }

    /**
     * Applies every action in order. If one fails, the ones already applied are reverted
     * before the record is marked FAILED, so a failed execution never leaves a partial
     * guardrail behind without saying so in lastError.
     */
    private async execute(execution: ActionExecution, actor: string, at: Date): Promise<ActionExecution> {
        const applied: AppliedAction[] = [];
        const context = { executionId: execution.executionId, policyId: execution.policyId };

        try {
            for (const action of execution.actions) {
                const diff = await this.executor.apply(execution.target, action, context);
                applied.push({ action, diff });
            }
        } catch (error) {
            const compensation = await this.compensate(execution, applied);
            const message = `${describeError(error)}${compensation}`;
            logger.error({ executionId: execution.executionId, error: message }, 'Guardrail execution failed');
            return this.fail(execution, actor, message, applied, at);
        }

        let executed: ActionExecution;
        try {
            executed = await this.transition(execution, {
                status: 'EXECUTED',
                executedBy: actor,
                diff: applied,
                executedAt: at.toISOString(),
                ttlExpiresAt: execution.ttlMinutes > 0 ? addMinutes(at, execution.ttlMinutes) : null
            }, at, actor);
        } catch (error) {
            // The guardrail is live but unrecorded; take it back down, then record the failure.
            const compensation = await this.compensate(execution, applied);
            const message = `${describeError(error)}${compensation}`;
            logger.error({ executionId: execution.executionId, error: message }, 'Could not record executed guardrail');
            try {
                return await this.fail(execution, actor, message, applied, at);
            } catch (failError) {
                logger.error({
                    executionId: execution.executionId,
                    claimExpiresAt: execution.claimExpiresAt,
                    error: describeError(failError)
                }, 'Could not record failed guardrail; left for the stalled-execution sweep');
                throw error;
            }
        }

        await this.deps.notifications.publish({
            kind: 'execution_confirmed',
            executionId: executed.executionId,
            policyId: executed.policyId,
            eventId: executed.eventId,
            target: executed.target,
            routing: executed.notify,
            executedBy: actor,
            ttlExpiresAt: executed.ttlExpiresAt
        });
        logger.info({
            executionId: executed.executionId,
            target: executed.target.arn,
            ttlExpiresAt: executed.ttlExpiresAt
        }, 'Guardrail executed');
        return executed;
    }

    private async fail(
        execution: ActionExecution,
        actor: string,
        message: string,
        applied: readonly AppliedAction[],
        at: Date
    ): Promise<ActionExecution> {
        const failed = await this.transition(execution, {
            status: 'FAILED',
            executedBy: execution.executedBy ?? actor,
            lastError: message,
            ...(applied.length > 0 ? { diff: applied } : {})
        }, at, actor);

        await this.deps.notifications.publish({
            kind: 'execution_failed',
            executionId: failed.executionId,
            policyId: failed.policyId,
            eventId: failed.eventId,
            target: failed.target,
            routing: failed.notify,
            error: message
        });
        return failed;
    }

    /** Returns a suffix for lastError describing what was left behind. */
    private async compensate(execution: ActionExecution, applied: readonly AppliedAction[]): Promise<string> {
        const leftovers: string[] = [];
        for (const entry of [...applied].reverse()) {
            try {
                await this.executor.revert(execution.target, entry.diff);
            } catch (error) {
                leftovers.push(`${entry.action.type}: ${describeError(error)}`);
            }
        }
        if (applied.length === 0) return '';
        return leftovers.length === 0
            ? ` (reverted ${applied.length} applied action(s))`
            : ` (compensation incomplete: ${leftovers.join('; ')})`;
    }

    /**
     * Approves a PLANNED execution and runs it. The PLANNED → APPROVED swap is the claim:
     * a second approval for the same record loses it and reports already_resolved.
     */
    async approve(executionId: string, approver: string, now?: Date): Promise<ResolutionOutcome> {
        const at = now ?? this.clock();
        const execution = await this.ledger.findById(executionId);
        if (!execution || execution.status !== 'PLANNED') {
            return { outcome: 'already_resolved', executionId };
        }

        if (this.isApprovalOverdue(execution, at)) {
            await this.expire(execution, at, approver);
            return { outcome: 'expired', executionId };
        }

        let claimed: ActionExecution;
        try {
            claimed = await this.transition(execution, {
                status: 'APPROVED',
                executedBy: approver,
                claimExpiresAt: claimDeadline(at, execution.actions.length, this.settings.collaboratorTimeoutMs)
            }, at, approver);
        } catch (error) {
            if (error instanceof ConflictError || error instanceof ExpiryError) {
                return { outcome: 'already_resolved', executionId };
            }
            throw error;
        }

        const finished = await this.execute(claimed, approver, at);
        return finished.status === 'EXECUTED'
            ? { outcome: 'executed', execution: finished }
            : { outcome: 'failed', execution: finished, error: finished.lastError ?? 'unknown' };
    }

    async reject(executionId: string, approver: string, now?: Date): Promise<ResolutionOutcome> {
        const at = now ?? this.clock();
        const execution = await this.ledger.findById(executionId);
        if (!execution || execution.status !== 'PLANNED') {
            return { outcome: 'already_resolved', executionId };
        }

        if (this.isApprovalOverdue(execution, at)) {
            await this.expire(execution, at, approver);
            return { outcome: 'expired', executionId };
        }

        let rejected: ActionExecution;
        try {
            rejected = await this.transition(execution, { status: 'REJECTED', executedBy: approver }, at, approver);
        } catch (error) {
            if (error instanceof ConflictError || error instanceof ExpiryError) {
                return { outcome: 'already_resolved', executionId };
            }
            throw error;
        }

        await this.deps.notifications.publish({
            kind: 'execution_rejected',
            executionId: rejected.executionId,
            policyId: rejected.policyId,
            eventId: rejected.eventId,
            target: rejected.target,
            routing: rejected.notify,
            resolvedBy: approver
        });
        return { outcome: 'rejected', execution: rejected };
    }

    /**
     * PLANNED → EXPIRED. Returns null when the record was no longer PLANNED.
     */
    async expire(execution: ActionExecution, at: Date, actor: string = SCHEDULER_ACTOR): Promise<ActionExecution | null> {
        if (execution.status !== 'PLANNED') return null;

        let expired: ActionExecution;
        try {
            expired = await this.transition(execution, { status: 'EXPIRED' }, at, actor);
        } catch (error) {
            if (error instanceof ConflictError) return null;
            throw error;
        }

        await this.deps.notifications.publish({
            kind: 'approval_expired',
            executionId: expired.executionId,
            policyId: expired.policyId,
            eventId: expired.eventId,
            target: expired.target,
            routing: expired.notify,
            resolvedBy: actor
        });
        return expired;
    }

    /**
     * PLANNED or APPROVED past its claim deadline → FAILED. The process that claimed it died or
     * lost its ledger between applying and recording; any action it applied was compensated or
     * is reported through the failure notification. Returns null when the record moved on.
     */
    async failStalled(execution: ActionExecution, at: Date): Promise<ActionExecution | null> {
        if (execution.status !== 'PLANNED' && execution.status !== 'APPROVED') return null;
        if (execution.claimExpiresAt === null || Date.parse(execution.claimExpiresAt) > at.getTime()) return null;

        const message = `Stalled in ${execution.status}; no outcome recorded by ${execution.claimExpiresAt}`;
        let failed: ActionExecution;
        try {
            failed = await this.fail(execution, SCHEDULER_ACTOR, message, [], at);
        } catch (error) {
            if (error instanceof ConflictError) return null;
            throw error;
        }

        logger.warn({ executionId: failed.executionId, from: execution.status }, 'Stalled execution marked failed');
        return failed;
    }

    /**
     * Reverts an EXECUTED record from its stored diff.
     *
     * A lease is taken with a same-status swap before the executor is called, so concurrent
     * sweeps (or a sweep racing a manual rollback) cannot both revert. A failed revert keeps
     * the record EXECUTED, bumps the consecutive-failure counter and releases the lease.
     */
    async rollback(target: ActionExecution | string, requestedBy: string, now?: Date): Promise<RollbackResult> {
        const at = now ?? this.clock();
        const execution = typeof target === 'string' ? await this.ledger.findById(target) : target;
        const executionId = typeof target === 'string' ? target : target.executionId;

        if (!execution) {
            return { status: 'skipped', executionId, reason: 'not_found' };
        }
        if (execution.status !== 'EXECUTED') {
            return { status: 'skipped', executionId, reason: 'not_executed' };
        }
        if (execution.rollbackLeaseUntil !== null && Date.parse(execution.rollbackLeaseUntil) > at.getTime()) {
            return { status: 'skipped', executionId, reason: 'claimed_elsewhere' };
        }

        const diffs = execution.diff ?? [];
        const leaseMs = this.settings.collaboratorTimeoutMs * (diffs.length + 1);

        let claimed: ActionExecution;
        try {
            claimed = await this.ledger.compareAndSwap({
                executionId,
                expectedStatus: 'EXECUTED',
                expectedVersion: execution.version,
                changes: { rollbackLeaseUntil: new Date(at.getTime() + leaseMs).toISOString() },
                at
            });
        } catch (error) {
            if (error instanceof ConflictError) {
                return { status: 'skipped', executionId, reason: 'claimed_elsewhere' };
            }
            throw error;
        }

        try {
            for (const entry of [...diffs].reverse()) {
                await this.executor.revert(claimed.target, entry.diff);
            }
        } catch (error) {
            return this.recordRollbackFailure(claimed, describeError(error), requestedBy, at);
        }

        const rolledBack = await this.transition(claimed, {
            status: 'ROLLED_BACK',
            rolledBackAt: at.toISOString(),
            rollbackLeaseUntil: null,
            lastError: null
        }, at, requestedBy);

        await this.deps.notifications.publish({
            kind: 'rollback_confirmed',
            executionId: rolledBack.executionId,
            policyId: rolledBack.policyId,
            eventId: rolledBack.eventId,
            target: rolledBack.target,
            routing: rolledBack.notify,
            rolledBackAt: at.toISOString(),
            requestedBy
        });
        logger.info({ executionId, requestedBy }, 'Guardrail rolled back');
        return { status: 'rolled_back', execution: rolledBack };
    }

    private async recordRollbackFailure(
        claimed: ActionExecution,
        message: string,
        requestedBy: string,
        at: Date
    ): Promise<RollbackResult> {
        const consecutiveFailures = claimed.rollbackFailures + 1;
        const updated = await this.transition(claimed, {
            rollbackFailures: consecutiveFailures,
            rollbackLeaseUntil: null,
            lastError: message
        }, at, requestedBy);

        logger.warn({
            executionId: updated.executionId,
            consecutiveFailures,
            error: message
        }, 'Rollback failed; will retry on next sweep');

        await this.audit({
            type: 'ROLLBACK_FAILED',
            actor: requestedBy,
            eventId: updated.eventId,
            executionId: updated.executionId,
            policyId: updated.policyId,
            detail: { consecutiveFailures, error: message }
        }, at);

        // Escalate once, on the attempt that first crosses the threshold.
        const escalated = consecutiveFailures === this.settings.escalationThreshold + 1;
        if (escalated) {
            await this.audit({
                type: 'ROLLBACK_ESCALATED',
                actor: requestedBy,
                eventId: updated.eventId,
                executionId: updated.executionId,
                policyId: updated.policyId,
                detail: { consecutiveFailures }
            }, at);
            await this.deps.notifications.publish({
                kind: 'rollback_escalation',
                executionId: updated.executionId,
                policyId: updated.policyId,
                eventId: updated.eventId,
                target: updated.target,
                routing: updated.notify,
                consecutiveFailures,
                lastError: message
            });
        }

        return { status: 'failed', consecutiveFailures, escalated, error: message };
    }

    async findExecution(executionId: string): Promise<ActionExecution | null> {
        return this.ledger.findById(executionId);
    }

    async listDueForRollback(now: Date, limit: number): Promise<ActionExecution[]> {
        return this.ledger.findDueForRollback(now, limit);
    }

    async listApprovalOverdue(now: Date, limit: number): Promise<ActionExecution[]> {
        return this.ledger.findApprovalOverdue(now, limit);
    }

    async listClaimOverdue(now: Date, limit: number): Promise<ActionExecution[]> {
        return this.ledger.findClaimOverdue(now, limit);
    }

    private isApprovalOverdue(execution: ActionExecution, at: Date): boolean {
        return execution.approvalExpiresAt !== null && Date.parse(execution.approvalExpiresAt) <= at.getTime();
    }

    private async transition(
        execution: ActionExecution,
        changes: ExecutionChanges,
        at: Date,
        actor: string
    ): Promise<ActionExecution> {
        const nextStatus = changes.status ?? execution.status;
        assertTransition(execution.status, nextStatus);

        const updated = await this.ledger.compareAndSwap({
            executionId: execution.executionId,
            expectedStatus: execution.status,
            expectedVersion: execution.version,
            changes,
            at
        });

        if (nextStatus !== execution.status) {
            await this.audit({
                type: 'EXECUTION_TRANSITION',
                actor,
                eventId: updated.eventId,
                executionId: updated.executionId,
                policyId: updated.policyId,
                detail: { from: execution.status, to: nextStatus, version: updated.version }
            }, at);
        }
        return updated;
    }

    /**
     * Trail entries that follow a committed state change. The execution record is already
     * authoritative, so a failed append is logged rather than unwinding the transition.
     */
    private async audit(entry: AuditEntry, at: Date): Promise<void> {
        try {
            await this.ledger.appendAudit(entry, at);
        } catch (error) {
            logger.error({
                auditType: entry.type,
                executionId: entry.executionId,
                eventId: entry.eventId,
                error: describeError(error)
            }, 'Audit append failed');
        }
    }

    /** Entries that are the only durable trace of an event; failure propagates. */
    private async recordDurably(entry: AuditEntry, at: Date): Promise<void> {
        await this.ledger.appendAudit(entry, at);
    }

    private async recordEventFailure(event: CostEvent, error: unknown, at: Date): Promise<void> {
        const reason = describeError(error);
        logger.error({ eventId: event.eventId, source: event.source, accountId: event.accountId, error: reason },
            'Event processing failed');

        try {
            await this.recordDurably({
                type: 'EVENT_FAILED',
                actor: SYSTEM_ACTOR,
                eventId: event.eventId,
                detail: { reason, category: error instanceof ValidationError ? 'VALIDATION' : 'INTERNAL' }
            }, at);
        } catch (auditError) {
            logger.fatal({ eventId: event.eventId, error: describeError(auditError) },
                'Failure record could not be written; event must be redelivered');
        }

        await this.deps.notifications.publish({ kind: 'event_failed', eventId: event.eventId, reason, routing: null });
    }
}
