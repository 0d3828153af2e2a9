/**
 * Cost Event Model
 *
 * A normalized cost signal. Produced by an external normalizer (or budgetsParser.ts) and
 * immutable once created.
 */

import { CostEventSchema, COST_EVENT_SOURCES } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';

export type CostEventSource = typeof COST_EVENT_SOURCES[number];

export type CostEventDetailValue = string | number | boolean | null;

export interface CostEvent {
    /** Unique per signal; redeliveries reuse it */
    readonly eventId: string;
    readonly source: CostEventSource;
    /** Owning account */
    readonly accountId: string;
    /** Amount in USD */
    readonly amount: number;
    /** Billing period the amount covers (ISO-8601) */
    readonly timePeriod: { readonly start: string; readonly end: string };
    /** Free-form; `service`, `region` and `principalArn` are read by the matcher */
    readonly details: Readonly<Record<string, CostEventDetailValue>>;
}

export function readDetail(event: CostEvent, key: string): string | undefined {
    const value = event.details[key];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Validates untrusted input into a frozen CostEvent.
 * Throws ValidationError; nothing is coerced.
 */
export function parseCostEvent(input: unknown, context = 'CostEvent'): CostEvent {
    const parsed = validate(CostEventSchema, input, context);
    return Object.freeze({
        eventId: parsed.eventId,
        source: parsed.source,
        accountId: parsed.accountId,
        amount: parsed.amount,
        timePeriod: Object.freeze({ ...parsed.timePeriod }),
        details: Object.freeze({ ...parsed.details })
    });
}
