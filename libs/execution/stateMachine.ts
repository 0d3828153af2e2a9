import { ConflictError, ExpiryError } from '../errors/taxonomy.js';
import type { ActionExecution, CasUpdate, ExecutionStatus } from './actionExecution.js';

const TRANSITIONS: Record<ExecutionStatus, readonly ExecutionStatus[]> = {
    PLANNED: ['APPROVED', 'REJECTED', 'EXPIRED', 'EXECUTED', 'FAILED'],
    // Claimed by an approval; the executor call is in flight
    APPROVED: ['EXECUTED', 'FAILED'],
    EXECUTED: ['ROLLED_BACK', 'FAILED'],
    REJECTED: [],
    EXPIRED: [],
    ROLLED_BACK: [],
    FAILED: []
};

export function isTerminal(status: ExecutionStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

export function canTransition(from: ExecutionStatus, to: ExecutionStatus): boolean {
    // Same-status writes (counters, errors) are allowed only on live records
    if (from === to) return !isTerminal(from);
    return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: ExecutionStatus, to: ExecutionStatus): void {
    if (!canTransition(from, to)) {
        throw new ExpiryError(`Execution cannot move from ${from} to ${to}`, 'NOT_IN_EXPECTED_STATE', {
            contextLabel: 'ExecutionStateMachine'
        });
    }
}

/**
 * Applies a CAS update to the current record, or throws.
 * Shared by ledgers that evaluate the swap in process.
 */
export function applyCasUpdate(current: ActionExecution, update: CasUpdate): ActionExecution {
    if (current.version !== update.expectedVersion || current.status !== update.expectedStatus) {
        throw new ConflictError(
            `Execution ${current.executionId} changed concurrently (expected ${update.expectedStatus}@${update.expectedVersion}, found ${current.status}@${current.version})`,
            'VERSION_MISMATCH',
            { contextLabel: 'ExecutionStateMachine' }
        );
    }

    const nextStatus = update.changes.status ?? current.status;
    assertTransition(current.status, nextStatus);

    if (update.changes.diff !== undefined && current.diff !== null) {
        throw new ConflictError(
            `Execution ${current.executionId} already has a recorded diff`,
            'VERSION_MISMATCH',
            { contextLabel: 'ExecutionStateMachine' }
        );
    }

    return Object.freeze({
        ...current,
        ...update.changes,
        status: nextStatus,
        updatedAt: update.at.toISOString(),
        version: current.version + 1
    });
}
