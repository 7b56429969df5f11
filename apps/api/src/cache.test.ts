import { describe, expect, it } from 'vitest';
import { RecentLookups } from './cache.js';

describe('RecentLookups', () => {
    it('returns entries newest first up to the limit', () => {
        const recent = new RecentLookups();
        recent.add({ id: 'a', query: 'one', status: 'not_found', articleCount: 0 });
        recent.add({ id: 'b', query: 'two', status: 'not_found', articleCount: 0 });
        recent.add({ id: 'c', query: 'three', status: 'not_found', articleCount: 0 });

        expect(recent.getRecent(2).map(e => e.id)).toEqual(['c', 'b']);
    });

    it('evicts the oldest entry when full', () => {
        const recent = new RecentLookups({ maxEntries: 2 });
        recent.add({ id: 'a', query: 'one', status: 'not_found', articleCount: 0 });
        recent.add({ id: 'b', query: 'two', status: 'not_found', articleCount: 0 });
        recent.add({ id: 'c', query: 'three', status: 'not_found', articleCount: 0 });

        expect(recent.size).toBe(2);
        expect(recent.getRecent(10).map(e => e.id)).toEqual(['c', 'b']);
    });

    it('skips expired entries', () => {
        let now = 1_000;
        const recent = new RecentLookups({ defaultTtlMs: 100, now: () => now });
        recent.add({ id: 'a', query: 'one', status: 'not_found', articleCount: 0 });
        now = 1_050;
        recent.add({ id: 'b', query: 'two', status: 'not_found', articleCount: 0 });
        now = 1_120;

        expect(recent.getRecent(10).map(e => e.id)).toEqual(['b']);
    });

    it('clears everything', () => {
        const recent = new RecentLookups();
        recent.add({ id: 'a', query: 'one', status: 'not_found', articleCount: 0 });
        recent.clear();
        expect(recent.size).toBe(0);
        expect(recent.getRecent()).toEqual([]);
    });
});
