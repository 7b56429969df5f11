/**
 * Freshness Policies
 *
 * Decide whether a cached catalog can be used as-is. The cutoff policy ties
 * freshness to a fixed calendar date (a season's trade deadline): once the
 * catalog was fetched after it, it stays fresh no matter how old it gets.
 */

import { differenceInCalendarDays, format, isAfter, isValid, parse } from 'date-fns';
import type { FreshnessSettings } from '@dugout/types';

/** Stand-in for a missing or unparseable timestamp; always stale */
export const EPOCH_FALLBACK = '1900-01-01';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface FreshnessPolicy {
    readonly description: string;
    isFresh(fetchedAt: Date, now: Date): boolean;
}

export class CutoffFreshnessPolicy implements FreshnessPolicy {
    readonly description: string;
    private cutoff: Date;

    constructor(cutoff: Date | string) {
        const parsed = typeof cutoff === 'string' ? parseCalendarDate(cutoff) : cutoff;
        if (!parsed || !isValid(parsed)) {
            throw new Error(`Invalid freshness cutoff: ${String(cutoff)}`);
        }
        this.cutoff = parsed;
        this.description = `fetched after ${formatCalendarDate(parsed)}`;
    }

    isFresh(fetchedAt: Date): boolean {
        return isAfter(fetchedAt, this.cutoff);
    }
}

export class MaxAgeFreshnessPolicy implements FreshnessPolicy {
    readonly description: string;

    constructor(private maxAgeDays: number) {
        if (!Number.isInteger(maxAgeDays) || maxAgeDays <= 0) {
            throw new Error(`Invalid max catalog age: ${maxAgeDays}`);
        }
        this.description = `fetched within ${maxAgeDays} days`;
    }

    isFresh(fetchedAt: Date, now: Date): boolean {
        return differenceInCalendarDays(now, fetchedAt) < this.maxAgeDays;
    }
}

export function createFreshnessPolicy(settings: FreshnessSettings): FreshnessPolicy {
    switch (settings.type) {
        case 'cutoff':
            return new CutoffFreshnessPolicy(settings.cutoff);
        case 'max-age':
            return new MaxAgeFreshnessPolicy(settings.maxAgeDays);
    }
}

/**
 * Parse a YYYY-MM-DD string as a local calendar date. Anything else,
 * including impossible dates such as 2024-02-30, yields null.
 */
export function parseCalendarDate(value: unknown): Date | null {
    if (typeof value !== 'string' || !CALENDAR_DATE.test(value)) {
        return null;
    }
    const date = parse(value, 'yyyy-MM-dd', new Date(0));
    return isValid(date) ? date : null;
}

export function formatCalendarDate(date: Date): string {
    return format(date, 'yyyy-MM-dd');
}
