import type { CostEvent } from '../ingest/costEvent.js';
import { readDetail } from '../ingest/costEvent.js';
import type { PolicyExemptions } from './guardrailPolicy.js';
import { isWithinTimeWindow } from './timeWindows.js';

export type ExemptionReason = 'account' | 'principal' | 'time_window';

/**
 * `pattern` matches exactly, or as a prefix when it ends in `*`.
 */
export function matchesPrincipalPattern(pattern: string, principalArn: string): boolean {
    if (pattern.endsWith('*')) {
        return principalArn.startsWith(pattern.slice(0, -1));
    }
    return pattern === principalArn;
}

/**
 * First exemption the event satisfies, or null.
 * Any single condition is enough; they are checked cheapest first.
 */
export function findExemption(
    exemptions: PolicyExemptions,
    event: CostEvent,
    evaluatedAt: Date
): ExemptionReason | null {
    if (exemptions.accounts.includes(event.accountId)) {
        return 'account';
    }

    const principalArn = readDetail(event, 'principalArn');
    if (principalArn !== undefined
        && exemptions.principals.some(pattern => matchesPrincipalPattern(pattern, principalArn))) {
        return 'principal';
    }

    if (exemptions.timeWindows.some(window => isWithinTimeWindow(window, evaluatedAt))) {
        return 'time_window';
    }

    return null;
}
