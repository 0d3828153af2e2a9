import { pino } from 'pino';
import type { GuardrailDiff } from '../execution/actionExecution.js';
import type { GuardrailAction, TargetPrincipal } from '../policy/guardrailPolicy.js';
import type { ApplyContext, GuardrailExecutor } from './guardrailExecutor.js';

const logger = pino({ name: 'SimulatedExecutor' });

/**
 * Keeps attached deny rules in process instead of calling IAM.
 * Backs local runs (`EXECUTOR_BACKEND=simulated`) and the test suite.
 */
export class SimulatedExecutor implements GuardrailExecutor {
    private readonly attached = new Map<string, Set<string>>();

    async apply(target: TargetPrincipal, action: GuardrailAction, context: ApplyContext): Promise<GuardrailDiff> {
        if (action.type === 'notify_only') {
            return { kind: 'notify_only' };
        }

        const policyName = `guardrail-deny-${context.policyId}`;
        const current = this.attached.get(target.arn) ?? new Set<string>();
        const before = [...current].sort();
        current.add(policyName);
        this.attached.set(target.arn, current);

        logger.info({ target: target.arn, policyName, executionId: context.executionId }, 'Simulated deny attached');
        return {
            kind: 'attach_deny_policy',
            policyName,
            principalArn: target.arn,
            before,
            after: [...current].sort(),
            deniedActions: [...action.deny]
        };
    }

    async revert(target: TargetPrincipal, diff: GuardrailDiff): Promise<void> {
        const policyName = diff['policyName'];
        if (diff['kind'] !== 'attach_deny_policy' || typeof policyName !== 'string') {
            return;
        }
        this.attached.get(target.arn)?.delete(policyName);
        logger.info({ target: target.arn, policyName }, 'Simulated deny detached');
    }

    attachedTo(targetArn: string): string[] {
        return [...(this.attached.get(targetArn) ?? [])].sort();
    }
}
