/**
 * Entity Resolver
 *
 * Matches free text against a catalog. Two modes:
 * - exact: lowercased query equals a lowercased name (O(1) via per-catalog maps)
 * - substring: lowercased query occurs in a lowercased name
 *
 * Candidates are visited in `order` (teams before players by default) and
 * the first match wins. In substring mode that tie-break is arbitrary but
 * stable; use resolveAll() to see every candidate.
 *
 * The league token ("mlb") only applies when no team or player matched.
 */

import {
    LEAGUE_ENTITY,
    type Catalog,
    type CatalogEntity,
    type MatchMode,
    type PlayerEntity,
    type Resolution,
    type TeamEntity,
} from '@dugout/types';

export type CandidateKind = 'team' | 'player';

export interface ResolverOptions {
    mode: MatchMode;
    /** Candidate order; earlier kinds win ties */
    order?: CandidateKind[];
    /** Literal that resolves to the league, compared case-insensitively */
    leagueToken?: string;
}

type Candidate = TeamEntity | PlayerEntity;

const DEFAULT_ORDER: CandidateKind[] = ['team', 'player'];

export function normalizeName(value: string): string {
    return value.trim().toLowerCase();
}

export class EntityResolver {
    readonly mode: MatchMode;
    private order: CandidateKind[];
    private leagueToken: string;
    // Exact-mode lookup maps, built once per catalog instance
    private indexes = new WeakMap<Catalog, Map<string, Candidate>>();

    constructor(options: ResolverOptions) {
        this.mode = options.mode;
        this.order = options.order && options.order.length > 0 ? [...new Set(options.order)] : DEFAULT_ORDER;
        this.leagueToken = normalizeName(options.leagueToken || LEAGUE_ENTITY.name);
    }

    resolve(query: string, catalog: Catalog): Resolution {
        const needle = normalizeName(query);
        if (needle.length === 0) {
            return { status: 'not_found', query };
        }

        const match = this.mode === 'exact'
            ? this.indexFor(catalog).get(needle)
            : this.candidates(catalog).find(c => normalizeName(c.name).includes(needle));

        if (match) {
            return match.kind === 'team'
                ? { status: 'team', entity: match }
                : { status: 'player', entity: match };
        }

        if (needle === this.leagueToken) {
            return { status: 'league', entity: LEAGUE_ENTITY };
        }

        return { status: 'not_found', query };
    }

    /**
     * Every team or player the query matches under this resolver's mode,
     * in candidate order.
     */
    resolveAll(query: string, catalog: Catalog): Candidate[] {
        const needle = normalizeName(query);
        if (needle.length === 0) {
            return [];
        }

        return this.candidates(catalog).filter(c => {
            const name = normalizeName(c.name);
            return this.mode === 'exact' ? name === needle : name.includes(needle);
        });
    }

    private indexFor(catalog: Catalog): Map<string, Candidate> {
        let index = this.indexes.get(catalog);
        if (!index) {
            index = new Map();
            for (const candidate of this.candidates(catalog)) {
                const key = normalizeName(candidate.name);
                // First occurrence in candidate order keeps the name
                if (!index.has(key)) {
                    index.set(key, candidate);
                }
            }
            this.indexes.set(catalog, index);
        }
        return index;
    }

    private candidates(catalog: Catalog): Candidate[] {
        const candidates: Candidate[] = [];
        for (const kind of this.order) {
            const rows = kind === 'team' ? catalog.teams : catalog.players;
            for (const row of rows) {
                candidates.push(toCandidate(kind, row));
            }
        }
        return candidates;
    }
}

function toCandidate(kind: CandidateKind, row: CatalogEntity): Candidate {
    return kind === 'team'
        ? { kind: 'team', id: row.id, name: row.name }
        : { kind: 'player', id: row.id, name: row.name };
}
