/**
 * Postgres Execution Ledger
 *
 * Non-terminal uniqueness per (policy, target) is a partial unique index; idempotency keys are
 * a plain unique constraint; every update is conditional on (status, version). See
 * services/guardrail-api/schema.sql.
 */

import type { AuditEntry, AuditRecordV1 } from '../audit/schema.js';
import { GENESIS_HASH, sealAuditRecord } from '../audit/integrity.js';
import { db, type DbClient, type DbRole } from '../db/index.js';
import { ConflictError } from '../errors/taxonomy.js';
import type {
    ActionExecution,
    AppliedAction,
    CasUpdate,
    ExecutingMode,
    ExecutionChanges,
    ExecutionStatus,
    NewExecution
} from '../execution/actionExecution.js';
import { assertTransition } from '../execution/stateMachine.js';
import type { GuardrailAction, NotificationRouting, PrincipalType } from '../policy/guardrailPolicy.js';
import type { ExecutionLedger } from './executionLedger.js';

interface ExecutionRow {
    execution_id: string;
    policy_id: string;
    event_id: string;
    idempotency_key: string;
    status: ExecutionStatus;
    mode: ExecutingMode;
    target_type: PrincipalType;
    target_arn: string;
    actions: GuardrailAction[];
    ttl_minutes: number;
    notify: NotificationRouting;
    executed_by: string | null;
    diff: AppliedAction[] | null;
    created_at: Date;
    approval_expires_at: Date | null;
    claim_expires_at: Date | null;
    executed_at: Date | null;
    ttl_expires_at: Date | null;
    rolled_back_at: Date | null;
    updated_at: Date;
    rollback_failures: number;
    rollback_lease_until: Date | null;
    last_error: string | null;
    version: number;
}

const EXECUTION_COLUMNS = `
    execution_id, policy_id, event_id, idempotency_key, status, mode,
    target_type, target_arn, actions, ttl_minutes, notify, executed_by, diff,
    created_at, approval_expires_at, claim_expires_at, executed_at, ttl_expires_at, rolled_back_at,
    updated_at, rollback_failures, rollback_lease_until, last_error, version`;

const NON_TERMINAL_SQL = `('PLANNED', 'APPROVED', 'EXECUTED')`;

function toIso(value: Date | null): string | null {
    return value ? value.toISOString() : null;
}

function mapRowToExecution(row: ExecutionRow): ActionExecution {
    return Object.freeze({
        executionId: row.execution_id,
        policyId: row.policy_id,
        eventId: row.event_id,
        idempotencyKey: row.idempotency_key,
        status: row.status,
        mode: row.mode,
        target: Object.freeze({ type: row.target_type, arn: row.target_arn }),
        actions: Object.freeze(row.actions),
        ttlMinutes: Number(row.ttl_minutes),
        notify: row.notify,
        executedBy: row.executed_by,
        diff: row.diff ? Object.freeze(row.diff) : null,
        createdAt: row.created_at.toISOString(),
        approvalExpiresAt: toIso(row.approval_expires_at),
        claimExpiresAt: toIso(row.claim_expires_at),
        executedAt: toIso(row.executed_at),
        ttlExpiresAt: toIso(row.ttl_expires_at),
        rolledBackAt: toIso(row.rolled_back_at),
        updatedAt: row.updated_at.toISOString(),
        rollbackFailures: Number(row.rollback_failures),
        rollbackLeaseUntil: toIso(row.rollback_lease_until),
        lastError: row.last_error,
        version: Number(row.version)
    });
}

const CHANGE_COLUMNS = [
    ['status', 'status'],
    ['executedBy', 'executed_by'],
    ['claimExpiresAt', 'claim_expires_at'],
    ['diff', 'diff'],
    ['executedAt', 'executed_at'],
    ['ttlExpiresAt', 'ttl_expires_at'],
    ['rolledBackAt', 'rolled_back_at'],
    ['rollbackFailures', 'rollback_failures'],
    ['rollbackLeaseUntil', 'rollback_lease_until'],
    ['lastError', 'last_error']
] as const satisfies readonly (readonly [keyof ExecutionChanges, string])[];

function changeValue(key: keyof ExecutionChanges, changes: ExecutionChanges): unknown {
    if (key === 'diff') return JSON.stringify(changes.diff);
    return changes[key];
}

export class PostgresExecutionLedger implements ExecutionLedger {
    constructor(
        private readonly role: DbRole = 'guardrails_engine',
        private readonly dbClient: DbClient = db
    ) { }

    async insertPlanned(execution: NewExecution, at: Date): Promise<ActionExecution> {
        const result = await this.dbClient.queryAsRole<ExecutionRow>(
            this.role,
            `INSERT INTO guardrail_executions (
                execution_id, policy_id, event_id, idempotency_key, status, mode,
                target_type, target_arn, actions, ttl_minutes, notify,
                created_at, approval_expires_at, claim_expires_at, updated_at, rollback_failures, version
            ) VALUES ($1, $2, $3, $4, 'PLANNED', $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, 0, 1)
            ON CONFLICT DO NOTHING
            RETURNING ${EXECUTION_COLUMNS}`,
            [
                execution.executionId,
                execution.policyId,
                execution.eventId,
                execution.idempotencyKey,
                execution.mode,
                execution.target.type,
                execution.target.arn,
                JSON.stringify(execution.actions),
                execution.ttlMinutes,
                JSON.stringify(execution.notify),
                execution.createdAt,
                execution.approvalExpiresAt,
                execution.claimExpiresAt,
                at.toISOString()
            ]
        );

        const row = result.rows[0];
        if (row) {
            return mapRowToExecution(row);
        }

        const keyCheck = await this.dbClient.queryAsRole<{ execution_id: string }>(
            this.role,
            `SELECT execution_id FROM guardrail_executions WHERE idempotency_key = $1 LIMIT 1`,
            [execution.idempotencyKey]
        );
        if (keyCheck.rows.length > 0) {
            throw new ConflictError(
                `Idempotency key ${execution.idempotencyKey} already used`,
                'IDEMPOTENCY_KEY_USED',
                { contextLabel: 'PostgresExecutionLedger' }
            );
        }
        throw new ConflictError(
            `A non-terminal execution already exists for ${execution.policyId}/${execution.target.arn}`,
            'ACTIVE_EXECUTION_EXISTS',
            { contextLabel: 'PostgresExecutionLedger' }
        );
    }

    async compareAndSwap(update: CasUpdate): Promise<ActionExecution> {
        assertTransition(update.expectedStatus, update.changes.status ?? update.expectedStatus);

        const params: unknown[] = [update.executionId, update.expectedStatus, update.expectedVersion, update.at.toISOString()];
        const assignments: string[] = ['updated_at = $4', 'version = version + 1'];

        for (const [key, column] of CHANGE_COLUMNS) {
            if (update.changes[key] === undefined) continue;
            params.push(changeValue(key, update.changes));
            assignments.push(`${column} = $${params.length}`);
        }

        // The diff is write-once
        const diffGuard = update.changes.diff !== undefined ? ' AND diff IS NULL' : '';

        const result = await this.dbClient.queryAsRole<ExecutionRow>(
            this.role,
            `UPDATE guardrail_executions
             SET ${assignments.join(', ')}
             WHERE execution_id = $1 AND status = $2 AND version = $3${diffGuard}
             RETURNING ${EXECUTION_COLUMNS}`,
            params
        );

        const row = result.rows[0];
        if (!row) {
            throw new ConflictError(
                `Execution ${update.executionId} changed concurrently (expected ${update.expectedStatus}@${update.expectedVersion})`,
                'VERSION_MISMATCH',
                { contextLabel: 'PostgresExecutionLedger' }
            );
        }
        return mapRowToExecution(row);
    }

    async findById(executionId: string): Promise<ActionExecution | null> {
        const result = await this.dbClient.queryAsRole<ExecutionRow>(
            this.role,
            `SELECT ${EXECUTION_COLUMNS} FROM guardrail_executions WHERE execution_id = $1 LIMIT 1`,
            [executionId]
        );
        const row = result.rows[0];
        return row ? mapRowToExecution(row) : null;
    }

    async findActiveByPolicyTarget(policyId: string, targetArn: string): Promise<ActionExecution | null> {
        const result = await this.dbClient.queryAsRole<ExecutionRow>(
            this.role,
            `SELECT ${EXECUTION_COLUMNS} FROM guardrail_executions
             WHERE policy_id = $1 AND target_arn = $2 AND status IN ${NON_TERMINAL_SQL}
             LIMIT 1`,
            [policyId, targetArn]
        );
        const row = result.rows[0];
        return row ? mapRowToExecution(row) : null;
    }

    async findDueForRollback(now: Date, limit: number): Promise<ActionExecution[]> {
        const result = await this.dbClient.queryAsRole<ExecutionRow>(
            this.role,
            `SELECT ${EXECUTION_COLUMNS} FROM guardrail_executions
             WHERE status = 'EXECUTED' AND ttl_expires_at IS NOT NULL AND ttl_expires_at <= $1
               AND (rollback_lease_until IS NULL OR rollback_lease_until <= $1)
             ORDER BY rollback_failures ASC, ttl_expires_at ASC
             LIMIT $2`,
            [now.toISOString(), limit]
        );
        return result.rows.map(mapRowToExecution);
    }

    async findApprovalOverdue(now: Date, limit: number): Promise<ActionExecution[]> {
        const result = await this.dbClient.queryAsRole<ExecutionRow>(
            this.role,
            `SELECT ${EXECUTION_COLUMNS} FROM guardrail_executions
             WHERE status = 'PLANNED' AND approval_expires_at IS NOT NULL AND approval_expires_at <= $1
             ORDER BY approval_expires_at ASC
             LIMIT $2`,
            [now.toISOString(), limit]
        );
        return result.rows.map(mapRowToExecution);
    }

    async findClaimOverdue(now: Date, limit: number): Promise<ActionExecution[]> {
        const result = await this.dbClient.queryAsRole<ExecutionRow>(
            this.role,
            `SELECT ${EXECUTION_COLUMNS} FROM guardrail_executions
             WHERE status IN ('PLANNED', 'APPROVED') AND claim_expires_at IS NOT NULL AND claim_expires_at <= $1
             ORDER BY claim_expires_at ASC
             LIMIT $2`,
            [now.toISOString(), limit]
        );
        return result.rows.map(mapRowToExecution);
    }

    /**
     * Serialized through a transaction-scoped advisory lock so the chain never forks.
     */
    async appendAudit(entry: AuditEntry, at: Date): Promise<AuditRecordV1> {
        return this.dbClient.transactionAsRole(this.role, async tx => {
            await tx.query(`SELECT pg_advisory_xact_lock(hashtext('guardrail_audit_log'))`);
            const last = await tx.query<{ hash: string }>(
                `SELECT hash FROM guardrail_audit_log ORDER BY seq DESC LIMIT 1`
            );
            const record = sealAuditRecord(entry, last.rows[0]?.hash ?? GENESIS_HASH, at);

            await tx.query(
                `INSERT INTO guardrail_audit_log (audit_id, event_type, execution_id, record, prev_hash, hash, recorded_at)
                 VALUES ($1, $2, $3, $4, $5, $6, $7)`,
                [
                    record.auditId,
                    record.type,
                    record.executionId ?? null,
                    JSON.stringify(record),
                    record.integrity.prevHash,
                    record.integrity.hash,
                    record.recordedAt
                ]
            );
            return record;
        });
    }

    /** Full chain in append order, for verification tooling. */
    async readAuditTrail(): Promise<AuditRecordV1[]> {
        const result = await this.dbClient.queryAsRole<{ record: AuditRecordV1 }>(
            'guardrails_readonly',
            `SELECT record FROM guardrail_audit_log ORDER BY seq ASC`
        );
        return result.rows.map(row => row.record);
    }
}
