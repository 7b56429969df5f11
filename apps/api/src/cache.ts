/**
 * Recent Lookups
 *
 * In-memory record of recent lookups so a client can show "what did I look
 * up earlier". Bounded by entry count and TTL; oldest entries are evicted
 * first.
 */

import type { EntityKind } from '@dugout/types';

export interface RecentLookup {
    id: string;
    query: string;
    status: 'enriched' | 'not_found';
    entity?: {
        kind: EntityKind;
        id: number | null;
        name: string;
    };
    articleCount: number;
    timestamp: number;
}

export interface RecentLookupsOptions {
    maxEntries?: number;
    defaultTtlMs?: number;
    now?: () => number;
}

export class RecentLookups {
    private entries: Map<string, RecentLookup> = new Map();
    private history: string[] = [];  // Ordered list of lookup IDs
    private maxEntries: number;
    private ttlMs: number;
    private now: () => number;

    constructor(options: RecentLookupsOptions = {}) {
        this.maxEntries = options.maxEntries || 50;
        this.ttlMs = options.defaultTtlMs || 60 * 60 * 1000; // 1 hour
        this.now = options.now || (() => Date.now());
    }

    add(entry: Omit<RecentLookup, 'timestamp'>): void {
        if (this.entries.size >= this.maxEntries) {
            const oldestId = this.history.shift();
            if (oldestId) {
                this.entries.delete(oldestId);
            }
        }

        this.entries.set(entry.id, { ...entry, timestamp: this.now() });
        this.history.push(entry.id);
    }

    /**
     * Most recent first, skipping expired entries
     */
    getRecent(limit: number = 5): RecentLookup[] {
        const recent: RecentLookup[] = [];

        for (let i = this.history.length - 1; i >= 0 && recent.length < limit; i--) {
            const entry = this.entries.get(this.history[i]);
            if (entry && this.now() - entry.timestamp <= this.ttlMs) {
                recent.push(entry);
            }
        }

        return recent;
    }

    clear(): void {
        this.entries.clear();
        this.history = [];
    }

    get size(): number {
        return this.entries.size;
    }
}
