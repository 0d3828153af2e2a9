/**
 * Guardrail Audit Schema v1
 *
 * Append-only, hash-chained decision trail. Every execution transition and every event that
 * could not be processed leaves one record.
 */

import type { JsonValue } from '../execution/actionExecution.js';

export type AuditEventType =
    | 'DECISION_SIMULATED'
    | 'EXECUTION_PLANNED'
    | 'EXECUTION_DUPLICATE'
    | 'EXECUTION_TRANSITION'
    | 'ROLLBACK_FAILED'
    | 'ROLLBACK_ESCALATED'
    | 'EVENT_REJECTED'
    | 'EVENT_FAILED';

export interface AuditEntry {
    readonly type: AuditEventType;
    /** `system:auto`, `system:scheduler` or `user:<name>` */
    readonly actor: string;
    readonly eventId?: string;
    readonly executionId?: string;
    readonly policyId?: string;
    readonly detail: { readonly [key: string]: JsonValue };
}

export interface AuditRecordV1 extends AuditEntry {
    readonly auditId: string;
    /** ISO-8601 */
    readonly recordedAt: string;
    readonly integrity: {
        /** Hash of the immediately preceding record */
        readonly prevHash: string;
        /** SHA-256(canonical(record without integrity) || prevHash) */
        readonly hash: string;
    };
}
