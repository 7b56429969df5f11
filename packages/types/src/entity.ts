/**
 * Entity Types
 *
 * Teams, players and the league sentinel that a free-text query can resolve to.
 */

export type EntityKind = 'team' | 'player' | 'league';

/** A catalog row: upstream id plus the upstream full name */
export interface CatalogEntity {
    id: number;
    name: string;
}

export interface TeamEntity extends CatalogEntity {
    kind: 'team';
}

export interface PlayerEntity extends CatalogEntity {
    kind: 'player';
}

/** The league has no numeric id, so stats are never fetched for it */
export interface LeagueEntity {
    kind: 'league';
    id: null;
    name: string;
}

export type Entity = TeamEntity | PlayerEntity | LeagueEntity;

export const LEAGUE_ENTITY: LeagueEntity = {
    kind: 'league',
    id: null,
    name: 'MLB',
};

// ============================================================================
// Resolution
// ============================================================================

export type MatchMode = 'exact' | 'substring';

export type Resolution =
    | { status: 'team'; entity: TeamEntity }
    | { status: 'player'; entity: PlayerEntity }
    | { status: 'league'; entity: LeagueEntity }
    | { status: 'not_found'; query: string };

export type ResolvedResolution = Exclude<Resolution, { status: 'not_found' }>;
