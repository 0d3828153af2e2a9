import type { AuditEntry, AuditRecordV1 } from '../audit/schema.js';
import { GENESIS_HASH, sealAuditRecord } from '../audit/integrity.js';
import { ConflictError } from '../errors/taxonomy.js';
import {
    NON_TERMINAL_STATUSES,
    type ActionExecution,
    type CasUpdate,
    type NewExecution
} from '../execution/actionExecution.js';
import { applyCasUpdate } from '../execution/stateMachine.js';
import type { ExecutionLedger } from './executionLedger.js';

function byKey(key: (record: ActionExecution) => string) {
    return (a: ActionExecution, b: ActionExecution): number => key(a).localeCompare(key(b));
}

/**
 * In-process ledger.
 *
 * Each mutating method does its check and its write with no await in between, so the
 * single-threaded event loop gives the same atomicity the Postgres ledger gets from its
 * unique indexes and conditional updates. Used for local runs and tests.
 */
export class InMemoryExecutionLedger implements ExecutionLedger {
    private readonly executions = new Map<string, ActionExecution>();
    private readonly usedIdempotencyKeys = new Set<string>();
    private readonly auditTrail: AuditRecordV1[] = [];

    async insertPlanned(execution: NewExecution, at: Date): Promise<ActionExecution> {
        if (this.usedIdempotencyKeys.has(execution.idempotencyKey)) {
            throw new ConflictError(
                `Idempotency key ${execution.idempotencyKey} already used`,
                'IDEMPOTENCY_KEY_USED',
                { contextLabel: 'InMemoryExecutionLedger' }
            );
        }

        const active = this.findActiveSync(execution.policyId, execution.target.arn);
        if (active) {
            throw new ConflictError(
                `Execution ${active.executionId} is still ${active.status} for ${execution.policyId}/${execution.target.arn}`,
                'ACTIVE_EXECUTION_EXISTS',
                { contextLabel: 'InMemoryExecutionLedger' }
            );
        }

        const stored: ActionExecution = Object.freeze({
            ...execution,
            status: 'PLANNED' as const,
            executedBy: null,
            diff: null,
            executedAt: null,
            ttlExpiresAt: null,
            rolledBackAt: null,
            updatedAt: at.toISOString(),
            rollbackFailures: 0,
            rollbackLeaseUntil: null,
            lastError: null,
            version: 1
        });

        this.usedIdempotencyKeys.add(execution.idempotencyKey);
        this.executions.set(stored.executionId, stored);
        return stored;
    }

    async compareAndSwap(update: CasUpdate): Promise<ActionExecution> {
        const current = this.executions.get(update.executionId);
        if (!current) {
            throw new ConflictError(
                `Execution ${update.executionId} does not exist`,
                'VERSION_MISMATCH',
                { contextLabel: 'InMemoryExecutionLedger' }
            );
        }

        const next = applyCasUpdate(current, update);
        this.executions.set(next.executionId, next);
        return next;
    }

    async findById(executionId: string): Promise<ActionExecution | null> {
        return this.executions.get(executionId) ?? null;
    }

    async findActiveByPolicyTarget(policyId: string, targetArn: string): Promise<ActionExecution | null> {
        return this.findActiveSync(policyId, targetArn);
    }

    async findDueForRollback(now: Date, limit: number): Promise<ActionExecution[]> {
        const cutoff = now.getTime();
        return this.select(
            record => record.status === 'EXECUTED'
                && record.ttlExpiresAt !== null
                && Date.parse(record.ttlExpiresAt) <= cutoff
                && (record.rollbackLeaseUntil === null || Date.parse(record.rollbackLeaseUntil) <= cutoff),
            (a, b) => a.rollbackFailures - b.rollbackFailures
                || (a.ttlExpiresAt ?? '').localeCompare(b.ttlExpiresAt ?? ''),
            limit
        );
    }

    async findApprovalOverdue(now: Date, limit: number): Promise<ActionExecution[]> {
        const cutoff = now.getTime();
        return this.select(
            record => record.status === 'PLANNED'
                && record.approvalExpiresAt !== null
                && Date.parse(record.approvalExpiresAt) <= cutoff,
            byKey(record => record.approvalExpiresAt ?? ''),
            limit
        );
    }

    async findClaimOverdue(now: Date, limit: number): Promise<ActionExecution[]> {
        const cutoff = now.getTime();
        return this.select(
            record => (record.status === 'PLANNED' || record.status === 'APPROVED')
                && record.claimExpiresAt !== null
                && Date.parse(record.claimExpiresAt) <= cutoff,
            byKey(record => record.claimExpiresAt ?? ''),
            limit
        );
    }

    async appendAudit(entry: AuditEntry, at: Date): Promise<AuditRecordV1> {
        const prevHash = this.auditTrail.at(-1)?.integrity.hash ?? GENESIS_HASH;
        const record = sealAuditRecord(entry, prevHash, at);
        this.auditTrail.push(record);
        return record;
    }

    /** Snapshot for inspection; records are frozen. */
    listExecutions(): ActionExecution[] {
        return [...this.executions.values()];
    }

    listAudit(): readonly AuditRecordV1[] {
        return [...this.auditTrail];
    }

    private findActiveSync(policyId: string, targetArn: string): ActionExecution | null {
        for (const record of this.executions.values()) {
            if (record.policyId === policyId
                && record.target.arn === targetArn
                && NON_TERMINAL_STATUSES.includes(record.status)) {
                return record;
            }
        }
        return null;
    }

    private select(
        predicate: (record: ActionExecution) => boolean,
        order: (a: ActionExecution, b: ActionExecution) => number,
        limit: number
    ): ActionExecution[] {
        return [...this.executions.values()]
            .filter(predicate)
            .sort(order)
            .slice(0, limit);
    }
}
