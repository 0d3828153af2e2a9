/**
 * Action Execution Model
 *
 * The durable unit of truth for one guardrail application. Every mutation goes through a
 * compare-and-swap on `version`; the ledger is the only place the record lives.
 */

import type {
    GuardrailAction,
    NotificationRouting,
    PolicyMode,
    TargetPrincipal
} from '../policy/guardrailPolicy.js';

export const EXECUTION_STATUSES = [
    'PLANNED',
    'APPROVED',
    'REJECTED',
    'EXPIRED',
    'EXECUTED',
    'ROLLED_BACK',
    'FAILED'
] as const;

export type ExecutionStatus = typeof EXECUTION_STATUSES[number];

export const NON_TERMINAL_STATUSES: readonly ExecutionStatus[] = ['PLANNED', 'APPROVED', 'EXECUTED'];

/** Modes that produce a durable record; simulate never does. */
export type ExecutingMode = Exclude<PolicyMode, 'simulate'>;

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | readonly JsonValue[]
    | { readonly [key: string]: JsonValue };

/**
 * Executor-specific description of prior and posterior state. Opaque to the engine; handed
 * back verbatim on revert.
 */
export type GuardrailDiff = { readonly [key: string]: JsonValue };

export interface AppliedAction {
    readonly action: GuardrailAction;
    readonly diff: GuardrailDiff;
}

export const SYSTEM_ACTOR = 'system:auto';

export function userActor(name: string): string {
    return `user:${name}`;
}

export interface ActionExecution {
    /** `exec-<uuid>` */
    readonly executionId: string;
    readonly policyId: string;
    /** Originating cost event */
    readonly eventId: string;
    /** `<eventId>:<policyId>:<targetArn>`; unique for the life of the ledger */
    readonly idempotencyKey: string;
    readonly status: ExecutionStatus;
    readonly mode: ExecutingMode;
    readonly target: TargetPrincipal;
    /** Actions to take, captured from the plan at creation */
    readonly actions: readonly GuardrailAction[];
    readonly ttlMinutes: number;
    readonly notify: NotificationRouting;
    /** `system:auto` or `user:<name>`; null until executed */
    readonly executedBy: string | null;
    /** Written once, when the actions are applied; rollback reads only this */
    readonly diff: readonly AppliedAction[] | null;
    /** ISO-8601 timestamps */
    readonly createdAt: string;
    readonly approvalExpiresAt: string | null;
    /** Deadline for an in-flight automatic or approved execution to reach EXECUTED or FAILED */
    readonly claimExpiresAt: string | null;
    readonly executedAt: string | null;
    readonly ttlExpiresAt: string | null;
    readonly rolledBackAt: string | null;
    readonly updatedAt: string;
    /** Consecutive failed rollback attempts */
    readonly rollbackFailures: number;
    /** Set while a rollback attempt holds the record; sweeps skip it until then */
    readonly rollbackLeaseUntil: string | null;
    readonly lastError: string | null;
    readonly version: number;
}

export type NewExecution = Omit<
    ActionExecution,
    'status' | 'executedBy' | 'diff' | 'executedAt' | 'ttlExpiresAt' | 'rolledBackAt' | 'updatedAt'
    | 'rollbackFailures' | 'rollbackLeaseUntil' | 'lastError' | 'version'
>;

export type ExecutionChanges = Partial<Pick<
    ActionExecution,
    'status' | 'executedBy' | 'claimExpiresAt' | 'diff' | 'executedAt' | 'ttlExpiresAt' | 'rolledBackAt'
    | 'rollbackFailures' | 'rollbackLeaseUntil' | 'lastError'
>>;

/**
 * One compare-and-swap. Applied only when the stored record still has `expectedStatus` and
 * `expectedVersion`.
 */
export interface CasUpdate {
    readonly executionId: string;
    readonly expectedStatus: ExecutionStatus;
    readonly expectedVersion: number;
    readonly changes: ExecutionChanges;
    readonly at: Date;
}

export function buildIdempotencyKey(eventId: string, policyId: string, targetArn: string): string {
    return `${eventId}:${policyId}:${targetArn}`;
}
