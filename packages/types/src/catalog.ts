/**
 * Catalog Types
 */

import type { CatalogEntity } from './entity.js';

/**
 * In-memory catalog for one refresh cycle. Never mutated after it is built;
 * a refresh produces a new object.
 */
export interface Catalog {
    readonly teams: readonly CatalogEntity[];
    readonly players: readonly CatalogEntity[];
    /** Calendar date of the refresh, YYYY-MM-DD */
    readonly fetchedAt: string;
}

/** On-disk shape of the cached catalog */
export interface CatalogFile {
    teams: CatalogEntity[];
    players: CatalogEntity[];
    timestamp: string;
}

/**
 * Upstream enumeration of teams and rosters used by a catalog refresh.
 */
export interface CatalogSource {
    listTeams(): Promise<import('./outcome.js').FetchOutcome<CatalogEntity[]>>;
    listRoster(teamId: number, season: number): Promise<import('./outcome.js').FetchOutcome<CatalogEntity[]>>;
}
