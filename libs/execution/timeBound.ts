import type { ExecutionLedger } from '../ledger/executionLedger.js';
import type { GuardrailExecutor } from '../executor/guardrailExecutor.js';
import { withTimeout } from './timeout.js';

/**
 * Every ledger call bounded by `timeoutMs`; a timeout surfaces as ExecutorError.
 */
export function timeBoundLedger(ledger: ExecutionLedger, timeoutMs: number): ExecutionLedger {
    return {
        insertPlanned: (execution, at) =>
            withTimeout(() => ledger.insertPlanned(execution, at), timeoutMs, 'ledger.insertPlanned'),
        compareAndSwap: update =>
            withTimeout(() => ledger.compareAndSwap(update), timeoutMs, 'ledger.compareAndSwap'),
        findById: executionId =>
            withTimeout(() => ledger.findById(executionId), timeoutMs, 'ledger.findById'),
        findActiveByPolicyTarget: (policyId, targetArn) =>
            withTimeout(() => ledger.findActiveByPolicyTarget(policyId, targetArn), timeoutMs, 'ledger.findActiveByPolicyTarget'),
        findDueForRollback: (now, limit) =>
            withTimeout(() => ledger.findDueForRollback(now, limit), timeoutMs, 'ledger.findDueForRollback'),
        findApprovalOverdue: (now, limit) =>
            withTimeout(() => ledger.findApprovalOverdue(now, limit), timeoutMs, 'ledger.findApprovalOverdue'),
        findClaimOverdue: (now, limit) =>
            withTimeout(() => ledger.findClaimOverdue(now, limit), timeoutMs, 'ledger.findClaimOverdue'),
        appendAudit: (entry, at) =>
            withTimeout(() => ledger.appendAudit(entry, at), timeoutMs, 'ledger.appendAudit')
    };
}

export function timeBoundExecutor(executor: GuardrailExecutor, timeoutMs: number): GuardrailExecutor {
    return {
        apply: (target, action, context) =>
            withTimeout(() => executor.apply(target, action, context), timeoutMs, 'executor.apply'),
        revert: (target, diff) =>
            withTimeout(() => executor.revert(target, diff), timeoutMs, 'executor.revert')
    };
}
