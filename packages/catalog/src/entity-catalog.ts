/**
 * Entity Catalog
 *
 * Loads the cached catalog when the freshness policy accepts it, otherwise
 * rebuilds it from upstream: every team, then each team's active roster.
 * Never throws; every failure path resolves to a (possibly empty) catalog.
 */

import type { Catalog, CatalogEntity, CatalogSource } from '@dugout/types';
import { CatalogFileStore, type StoredCatalog } from './catalog-file.js';
import {
    EPOCH_FALLBACK,
    formatCalendarDate,
    parseCalendarDate,
    type FreshnessPolicy,
} from './freshness.js';

export interface EntityCatalogOptions {
    source: CatalogSource;
    store: CatalogFileStore;
    policy: FreshnessPolicy;
    clock?: () => Date;
}

export function emptyCatalog(fetchedAt: string): Catalog {
    return freeze([], [], fetchedAt);
}

export class EntityCatalog {
    private source: CatalogSource;
    private store: CatalogFileStore;
    private policy: FreshnessPolicy;
    private clock: () => Date;

    constructor(options: EntityCatalogOptions) {
        this.source = options.source;
        this.store = options.store;
        this.policy = options.policy;
        this.clock = options.clock || (() => new Date());
    }

    /**
     * Return a usable catalog, refreshing it first when the cache is stale.
     */
    async ensureFresh(): Promise<Catalog> {
        const stored = this.store.read();

        if (stored && this.isFresh(stored)) {
            const catalog = toCatalog(stored);
            console.log(
                `[EntityCatalog] Cached catalog is current: ${catalog.players.length} players on ${catalog.teams.length} teams`
            );
            return catalog;
        }

        console.log(`[EntityCatalog] Catalog missing or stale (policy: ${this.policy.description}), refreshing`);
        return this.refresh();
    }

    /**
     * Rebuild the catalog from upstream and persist it, overwriting any
     * previous cache. A team whose roster cannot be fetched contributes no
     * players; a failure to list teams yields an empty catalog that is not
     * persisted, so the next run tries again.
     */
    async refresh(): Promise<Catalog> {
        const now = this.clock();
        const today = formatCalendarDate(now);
        const season = now.getFullYear();

        console.log('[EntityCatalog] Fetching teams...');
        const teamsResult = await this.source.listTeams();

        if (teamsResult.status !== 'ok') {
            const reason = teamsResult.status === 'upstream_failure' ? teamsResult.reason : 'no teams returned';
            console.error(`[EntityCatalog] Could not list teams (${reason}); using an empty catalog`);
            return emptyCatalog(today);
        }

        const teams: CatalogEntity[] = [];
        const players: CatalogEntity[] = [];
        let failedRosters = 0;

        for (const team of teamsResult.value) {
            teams.push(team);

            console.log(`[EntityCatalog]   • Fetching roster for ${team.name} (ID ${team.id})...`);
            const roster = await this.source.listRoster(team.id, season);

            if (roster.status === 'upstream_failure') {
                failedRosters++;
                console.warn(`[EntityCatalog]     Roster unavailable for ${team.name}: ${roster.reason}`);
                continue;
            }
            if (roster.status === 'ok') {
                players.push(...roster.value);
            }
        }

        const built = freeze(teams, players, today);

        if (!this.store.write(built)) {
            return emptyCatalog(today);
        }

        const reread = this.store.read();
        if (!reread) {
            console.error(`[EntityCatalog] Refreshed cache at ${this.store.filePath} is unreadable; using an empty catalog`);
            return emptyCatalog(today);
        }

        const catalog = toCatalog(reread);
        console.log(
            `[EntityCatalog] Wrote ${catalog.teams.length} teams and ${catalog.players.length} players to ${this.store.filePath}` +
            (failedRosters > 0 ? ` (${failedRosters} rosters unavailable)` : '')
        );
        return catalog;
    }

    private isFresh(stored: StoredCatalog): boolean {
        const fetchedAt = parseCalendarDate(stored.timestamp) || parseCalendarDate(EPOCH_FALLBACK);
        return fetchedAt !== null && this.policy.isFresh(fetchedAt, this.clock());
    }
}

function toCatalog(stored: StoredCatalog): Catalog {
    const fetchedAt = parseCalendarDate(stored.timestamp) ? String(stored.timestamp) : EPOCH_FALLBACK;
    return freeze(stored.teams, stored.players, fetchedAt);
}

function freeze(teams: CatalogEntity[], players: CatalogEntity[], fetchedAt: string): Catalog {
    return Object.freeze({
        teams: Object.freeze(teams.map(e => Object.freeze({ id: e.id, name: e.name }))),
        players: Object.freeze(players.map(e => Object.freeze({ id: e.id, name: e.name }))),
        fetchedAt,
    });
}
