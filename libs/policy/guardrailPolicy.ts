/**
 * Guardrail Policy Model
 *
 * Policies are read-only configuration. The on-disk form is snake_case JSON validated by
 * PolicyFileSchema; the engine only ever sees the frozen camelCase form below.
 */

import type { CostEventSource } from '../ingest/costEvent.js';
import { POLICY_MODES, PRINCIPAL_TYPES, WEEKDAYS, type PolicyFile } from '../validation/schema.js';

export type PolicyMode = typeof POLICY_MODES[number];
export type PrincipalType = typeof PRINCIPAL_TYPES[number];
export type Weekday = typeof WEEKDAYS[number];

export interface TargetPrincipal {
    readonly type: PrincipalType;
    /** Fully-qualified IAM ARN, never a wildcard */
    readonly arn: string;
}

export type GuardrailAction =
    | { readonly type: 'attach_deny_policy'; readonly deny: readonly string[] }
    | { readonly type: 'notify_only' };

export interface PolicyMatch {
    readonly sources: readonly CostEventSource[];
    readonly accountIds: readonly string[];
    readonly minAmountUsd: number | null;
    readonly maxAmountUsd: number | null;
    /** null = any service */
    readonly services: readonly string[] | null;
    /** null = any region */
    readonly regions: readonly string[] | null;
}

export interface ExemptionTimeWindow {
    /** HH:MM, local to `timezone` */
    readonly start: string;
    readonly end: string;
    /** IANA zone name */
    readonly timezone: string;
    readonly days: readonly Weekday[];
}

export interface PolicyExemptions {
    readonly accounts: readonly string[];
    /** Exact ARNs, or prefixes ending in `*` */
    readonly principals: readonly string[];
    readonly timeWindows: readonly ExemptionTimeWindow[];
}

export interface NotificationRouting {
    readonly channel: string | null;
    readonly webhookUrl: string | null;
    readonly mentionUsers: readonly string[];
}

export interface GuardrailPolicy {
    readonly id: string;
    readonly description: string;
    readonly enabled: boolean;
    readonly mode: PolicyMode;
    /** 0 = no automatic rollback */
    readonly ttlMinutes: number;
    readonly match: PolicyMatch;
    readonly principals: readonly TargetPrincipal[];
    readonly actions: readonly GuardrailAction[];
    readonly notify: NotificationRouting;
    readonly exemptions: PolicyExemptions;
}

const NO_EXEMPTIONS: PolicyExemptions = Object.freeze({
    accounts: Object.freeze([]),
    principals: Object.freeze([]),
    timeWindows: Object.freeze([])
});

function freezeAction(action: PolicyFile['actions'][number]): GuardrailAction {
    switch (action.type) {
        case 'attach_deny_policy':
            return Object.freeze({ type: action.type, deny: Object.freeze([...action.deny]) });
        case 'notify_only':
            return Object.freeze({ type: action.type });
    }
}

/**
 * Maps a validated policy file onto the frozen runtime model.
 */
export function toGuardrailPolicy(file: PolicyFile): GuardrailPolicy {
    const exemptions: PolicyExemptions = file.exceptions
        ? Object.freeze({
            accounts: Object.freeze([...file.exceptions.accounts]),
            principals: Object.freeze([...file.exceptions.principals]),
            timeWindows: Object.freeze(file.exceptions.time_windows.map(window => Object.freeze({
                start: window.start,
                end: window.end,
                timezone: window.timezone,
                days: Object.freeze([...window.days])
            })))
        })
        : NO_EXEMPTIONS;

    return Object.freeze({
        id: file.id,
        description: file.description,
        enabled: file.enabled,
        mode: file.mode,
        ttlMinutes: file.ttl_minutes,
        match: Object.freeze({
            sources: Object.freeze([...file.match.source]),
            accountIds: Object.freeze([...file.match.account_ids]),
            minAmountUsd: file.match.min_amount_usd ?? null,
            maxAmountUsd: file.match.max_amount_usd ?? null,
            services: file.match.services ? Object.freeze([...file.match.services]) : null,
            regions: file.match.regions ? Object.freeze([...file.match.regions]) : null
        }),
        principals: Object.freeze(file.scope.principals.map(p => Object.freeze({ type: p.type, arn: p.arn }))),
        actions: Object.freeze(file.actions.map(freezeAction)),
        notify: Object.freeze({
            channel: file.notify.channel ?? null,
            webhookUrl: file.notify.webhook_url ?? null,
            mentionUsers: Object.freeze([...file.notify.mention_users])
        }),
        exemptions
    });
}
