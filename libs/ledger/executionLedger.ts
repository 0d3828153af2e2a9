/**
 * Execution Ledger
 *
 * Durable store for execution records and the audit trail. Implementations must make
 * `insertPlanned` and `compareAndSwap` atomic: they are the engine's only concurrency control.
 */

import type { AuditEntry, AuditRecordV1 } from '../audit/schema.js';
import type { ActionExecution, CasUpdate, NewExecution } from '../execution/actionExecution.js';

export interface ExecutionLedger {
    /**
     * Inserts a PLANNED record at version 1.
     * Throws ConflictError when a non-terminal record exists for (policyId, target.arn) or the
     * idempotency key has been used before.
     */
    insertPlanned(execution: NewExecution, at: Date): Promise<ActionExecution>;

    /**
     * Throws ConflictError when the stored status or version differs from the expectation.
     */
    compareAndSwap(update: CasUpdate): Promise<ActionExecution>;

    findById(executionId: string): Promise<ActionExecution | null>;

    findActiveByPolicyTarget(policyId: string, targetArn: string): Promise<ActionExecution | null>;

    /**
     * EXECUTED records whose ttl expiry is at or before `now` and whose rollback lease is free.
     * Fewest failed rollbacks first, then oldest expiry.
     */
    findDueForRollback(now: Date, limit: number): Promise<ActionExecution[]>;

    /** PLANNED records whose approval deadline is at or before `now`, oldest first */
    findApprovalOverdue(now: Date, limit: number): Promise<ActionExecution[]>;

    /** PLANNED or APPROVED records whose claim deadline is at or before `now`, oldest first */
    findClaimOverdue(now: Date, limit: number): Promise<ActionExecution[]>;

    appendAudit(entry: AuditEntry, at: Date): Promise<AuditRecordV1>;
}
