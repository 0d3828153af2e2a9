import { LRUCache } from 'lru-cache';
import type { ExemptionTimeWindow, Weekday } from './guardrailPolicy.js';

const WEEKDAY_BY_SHORT_NAME = new Map<string, Weekday>([
    ['Mon', 'mon'], ['Tue', 'tue'], ['Wed', 'wed'], ['Thu', 'thu'],
    ['Fri', 'fri'], ['Sat', 'sat'], ['Sun', 'sun']
]);

const PREVIOUS_DAY: Record<Weekday, Weekday> = {
    mon: 'sun', tue: 'mon', wed: 'tue', thu: 'wed', fri: 'thu', sat: 'fri', sun: 'sat'
};

// One formatter per zone; Intl formatters are immutable.
const formatterCache = new LRUCache<string, Intl.DateTimeFormat>({ max: 64 });

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    const cached = formatterCache.get(timeZone);
    if (cached) return cached;

    const formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        weekday: 'short',
        hour: '2-digit',
        minute: '2-digit',
        hourCycle: 'h23'
    });
    formatterCache.set(timeZone, formatter);
    return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
    try {
        formatterFor(timeZone);
        return true;
    } catch {
        return false;
    }
}

export interface LocalClock {
    readonly weekday: Weekday;
    /** Minutes since local midnight */
    readonly minuteOfDay: number;
}

/**
 * Wall-clock reading of `instant` in `timeZone`, DST included.
 */
export function localClock(instant: Date, timeZone: string): LocalClock {
    let weekday: Weekday | undefined;
    let hour = 0;
    let minute = 0;

    for (const part of formatterFor(timeZone).formatToParts(instant)) {
        if (part.type === 'weekday') weekday = WEEKDAY_BY_SHORT_NAME.get(part.value);
        else if (part.type === 'hour') hour = Number(part.value) % 24;
        else if (part.type === 'minute') minute = Number(part.value);
    }

    if (!weekday) {
        throw new Error(`Unable to resolve weekday for ${instant.toISOString()} in ${timeZone}`);
    }

    return { weekday, minuteOfDay: hour * 60 + minute };
}

export function parseClockTime(value: string): number {
    const [hours, minutes] = value.split(':').map(Number);
    return (hours ?? 0) * 60 + (minutes ?? 0);
}

/**
 * Inclusive on both ends. A window whose start is after its end runs past midnight; its
 * early-morning part belongs to the listed day it started on.
 */
export function isWithinTimeWindow(window: ExemptionTimeWindow, instant: Date): boolean {
    const { weekday, minuteOfDay } = localClock(instant, window.timezone);
    const start = parseClockTime(window.start);
    const end = parseClockTime(window.end);

    if (start <= end) {
        return window.days.includes(weekday) && minuteOfDay >= start && minuteOfDay <= end;
    }

    if (minuteOfDay >= start) {
        return window.days.includes(weekday);
    }
    return minuteOfDay <= end && window.days.includes(PREVIOUS_DAY[weekday]);
}
