/**
 * Policy Matcher
 *
 * Pure decision function: event + ordered policy set + evaluation time → at most one policy.
 * No I/O, no clock reads; identical inputs always give identical results.
 */

import type { CostEvent } from '../ingest/costEvent.js';
import { readDetail } from '../ingest/costEvent.js';
import { ValidationError } from '../errors/taxonomy.js';
import type { GuardrailPolicy, PolicyMatch } from './guardrailPolicy.js';
import { findExemption, type ExemptionReason } from './exemptions.js';

/**
 * `first-match` stops at the first eligible policy in declared order.
 * `strict` evaluates every policy and refuses events that more than one policy claims.
 */
export type TieBreakStrategy = 'first-match' | 'strict';

export interface SkippedPolicy {
    readonly policyId: string;
    readonly reason: 'disabled' | 'predicate' | `exempt:${ExemptionReason}`;
}

export interface MatchResult {
    readonly policy: GuardrailPolicy | null;
    /** Policies passed over before the decision, in evaluation order */
    readonly skipped: readonly SkippedPolicy[];
}

export function satisfiesPredicate(match: PolicyMatch, event: CostEvent): boolean {
    if (!match.sources.includes(event.source)) return false;
    if (!match.accountIds.includes(event.accountId)) return false;
    if (match.minAmountUsd !== null && event.amount < match.minAmountUsd) return false;
    if (match.maxAmountUsd !== null && event.amount > match.maxAmountUsd) return false;

    if (match.services !== null) {
        const service = readDetail(event, 'service');
        if (service === undefined || !match.services.includes(service)) return false;
    }

    if (match.regions !== null) {
        const region = readDetail(event, 'region');
        if (region === undefined || !match.regions.includes(region)) return false;
    }

    return true;
}

export function evaluatePolicies(
    event: CostEvent,
    policies: readonly GuardrailPolicy[],
    evaluatedAt: Date,
    strategy: TieBreakStrategy = 'first-match'
): MatchResult {
    const skipped: SkippedPolicy[] = [];
    const eligible: GuardrailPolicy[] = [];

    for (const policy of policies) {
        if (!policy.enabled) {
            skipped.push({ policyId: policy.id, reason: 'disabled' });
            continue;
        }
        if (!satisfiesPredicate(policy.match, event)) {
            skipped.push({ policyId: policy.id, reason: 'predicate' });
            continue;
        }

        const exemption = findExemption(policy.exemptions, event, evaluatedAt);
        if (exemption !== null) {
            skipped.push({ policyId: policy.id, reason: `exempt:${exemption}` });
            continue;
        }

        if (strategy === 'first-match') {
            return { policy, skipped };
        }
        eligible.push(policy);
    }

    if (eligible.length > 1) {
        throw new ValidationError(
            `Event ${event.eventId} matches ${eligible.length} policies under strict tie-break`,
            eligible.map(p => ({ path: p.id, message: 'ambiguous match' })),
            { contextLabel: 'PolicyMatcher' }
        );
    }

    return { policy: eligible[0] ?? null, skipped };
}

/**
 * First enabled, satisfied, non-exempted policy in declared order.
 */
export function match(
    event: CostEvent,
    policies: readonly GuardrailPolicy[],
    evaluatedAt: Date,
    strategy: TieBreakStrategy = 'first-match'
): GuardrailPolicy | null {
    return evaluatePolicies(event, policies, evaluatedAt, strategy).policy;
}
