import { describe, it, expect } from 'vitest';
import type { Catalog } from '@dugout/types';
import { EntityResolver } from './resolver.js';
import { emptyCatalog } from './entity-catalog.js';

const catalog: Catalog = {
    teams: [
        { id: 147, name: 'New York Yankees' },
        { id: 121, name: 'New York Mets' },
        { id: 111, name: 'Boston Red Sox' },
    ],
    players: [
        { id: 592450, name: 'Aaron Judge' },
        { id: 596019, name: 'Francisco Lindor' },
        { id: 700001, name: 'Red Sox Fan' },
    ],
    fetchedAt: '2026-10-18',
};

describe('EntityResolver (exact mode)', () => {
    const resolver = new EntityResolver({ mode: 'exact' });

    it('matches a team name ignoring case and surrounding space', () => {
        expect(resolver.resolve('  new york YANKEES ', catalog)).toEqual({
            status: 'team',
            entity: { kind: 'team', id: 147, name: 'New York Yankees' },
        });
    });

    it('matches a player by full name', () => {
        expect(resolver.resolve('aaron judge', catalog)).toEqual({
            status: 'player',
            entity: { kind: 'player', id: 592450, name: 'Aaron Judge' },
        });
    });

    it('does not match partial names', () => {
        expect(resolver.resolve('yankees', catalog)).toEqual({ status: 'not_found', query: 'yankees' });
    });

    it('returns the same result on repeated calls', () => {
        const first = resolver.resolve('New York Mets', catalog);
        const second = resolver.resolve('New York Mets', catalog);
        expect(second).toEqual(first);
    });
});

describe('EntityResolver (substring mode)', () => {
    const resolver = new EntityResolver({ mode: 'substring' });

    it('resolves "yankees" to the Yankees', () => {
        expect(resolver.resolve('yankees', catalog)).toEqual({
            status: 'team',
            entity: { kind: 'team', id: 147, name: 'New York Yankees' },
        });
    });

    it('picks the first team when several names contain the query', () => {
        expect(resolver.resolve('new york', catalog)).toEqual({
            status: 'team',
            entity: { kind: 'team', id: 147, name: 'New York Yankees' },
        });
    });

    it('prefers teams over players by default', () => {
        const result = resolver.resolve('red sox', catalog);
        expect(result.status).toBe('team');
    });

    it('honors an explicit candidate order', () => {
        const playersFirst = new EntityResolver({ mode: 'substring', order: ['player', 'team'] });
        expect(playersFirst.resolve('red sox', catalog)).toEqual({
            status: 'player',
            entity: { kind: 'player', id: 700001, name: 'Red Sox Fan' },
        });
    });

    it('lists every match in candidate order', () => {
        expect(resolver.resolveAll('an', catalog).map(c => c.id)).toEqual([147, 596019, 700001]);
        expect(resolver.resolveAll('red sox', catalog)).toEqual([
            { kind: 'team', id: 111, name: 'Boston Red Sox' },
            { kind: 'player', id: 700001, name: 'Red Sox Fan' },
        ]);
    });
});

describe('EntityResolver (league and failures)', () => {
    it.each(['mlb', 'MLB', ' Mlb '])('resolves %j to the league', query => {
        const resolver = new EntityResolver({ mode: 'exact' });
        expect(resolver.resolve(query, catalog)).toEqual({
            status: 'league',
            entity: { kind: 'league', id: null, name: 'MLB' },
        });
    });

    it('lets a catalog match take precedence over the league token', () => {
        const withLeagueLikeName: Catalog = {
            ...catalog,
            players: [{ id: 1, name: 'Mlb Prospect' }],
        };
        const resolver = new EntityResolver({ mode: 'substring' });
        expect(resolver.resolve('mlb', withLeagueLikeName).status).toBe('player');
    });

    it('reports blank queries as not found', () => {
        const resolver = new EntityResolver({ mode: 'substring' });
        expect(resolver.resolve('   ', catalog)).toEqual({ status: 'not_found', query: '   ' });
        expect(resolver.resolveAll('', catalog)).toEqual([]);
    });

    it('finds nothing in an empty catalog', () => {
        const resolver = new EntityResolver({ mode: 'substring' });
        expect(resolver.resolve('yankees', emptyCatalog('2026-10-18'))).toEqual({ status: 'not_found', query: 'yankees' });
    });
});
