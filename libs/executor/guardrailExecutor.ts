import type { GuardrailDiff } from '../execution/actionExecution.js';
import type { GuardrailAction, TargetPrincipal } from '../policy/guardrailPolicy.js';

export interface ApplyContext {
    readonly executionId: string;
    readonly policyId: string;
}

/**
 * Performs and reverses guardrail actions against the identity backend.
 *
 * Both calls may be repeated with the same arguments. `revert` receives only the diff that
 * `apply` returned, never a fresh read of live state. Failure is signalled by throwing.
 */
export interface GuardrailExecutor {
    apply(target: TargetPrincipal, action: GuardrailAction, context: ApplyContext): Promise<GuardrailDiff>;
    revert(target: TargetPrincipal, diff: GuardrailDiff): Promise<void>;
}
