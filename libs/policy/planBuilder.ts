import type { CostEvent } from '../ingest/costEvent.js';
import { ValidationError } from '../errors/taxonomy.js';
import type {
    GuardrailAction,
    GuardrailPolicy,
    NotificationRouting,
    PolicyMode,
    TargetPrincipal
} from './guardrailPolicy.js';

export interface MatchedActionPlan {
    readonly matched: true;
    readonly eventId: string;
    readonly policyId: string;
    /** Effective mode, after any forced-simulation override */
    readonly mode: PolicyMode;
    /** Mode declared by the policy */
    readonly declaredMode: PolicyMode;
    readonly targetPrincipals: readonly TargetPrincipal[];
    readonly actions: readonly GuardrailAction[];
    readonly ttlMinutes: number;
    readonly notify: NotificationRouting;
}

export interface UnmatchedActionPlan {
    readonly matched: false;
    readonly eventId: string;
}

/** Ephemeral. Carries a decision from matching into orchestration and is never persisted. */
export type ActionPlan = MatchedActionPlan | UnmatchedActionPlan;

export interface PlanOptions {
    /** Downgrade every plan to simulate */
    readonly forceSimulate?: boolean;
}

export function buildActionPlan(
    policy: GuardrailPolicy | null,
    event: CostEvent,
    options: PlanOptions = {}
): ActionPlan {
    if (policy === null) {
        return Object.freeze({ matched: false, eventId: event.eventId });
    }

    if (policy.principals.length === 0 || policy.actions.length === 0) {
        throw new ValidationError(
            `Policy ${policy.id} cannot produce a plan without principals and actions`,
            [],
            { contextLabel: 'ActionPlanBuilder' }
        );
    }

    return Object.freeze({
        matched: true,
        eventId: event.eventId,
        policyId: policy.id,
        mode: options.forceSimulate ? 'simulate' : policy.mode,
        declaredMode: policy.mode,
        targetPrincipals: policy.principals,
        actions: policy.actions,
        ttlMinutes: policy.ttlMinutes,
        notify: policy.notify
    });
}
