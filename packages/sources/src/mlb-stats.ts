/**
 * MLB Stats API Client
 *
 * Teams, active rosters and season stats from statsapi.mlb.com.
 */

import { z } from 'zod';
import {
    empty,
    ok,
    upstreamFailure,
    type CatalogEntity,
    type CatalogSource,
    type FetchOutcome,
    type StatsPayload,
    type StatsSubject,
} from '@dugout/types';
import { fetchJson, type FetchFn } from './http.js';

const TAG = 'MlbStatsClient';

// Upstream rows missing an id or a name are dropped, never stored
const TeamsResponseSchema = z.object({
    teams: z.array(z.unknown()).optional(),
});

const TeamRowSchema = z.object({
    id: z.number().int(),
    name: z.string().min(1),
});

const RosterResponseSchema = z.object({
    roster: z.array(z.unknown()).optional(),
});

const RosterRowSchema = z.object({
    person: z.object({
        id: z.number().int(),
        fullName: z.string().min(1),
    }),
});

const SplitSchema = z
    .object({
        stat: z.record(z.unknown()).default({}),
        team: z
            .object({
                id: z.number().optional(),
                name: z.string().optional(),
            })
            .passthrough()
            .optional(),
    })
    .passthrough();

const StatsResponseSchema = z
    .object({
        stats: z
            .array(
                z
                    .object({
                        splits: z.array(SplitSchema).optional(),
                    })
                    .passthrough()
            )
            .optional(),
    })
    .passthrough();

export interface TeamStatsParams {
    /** Stat type, e.g. "season" */
    statType: string;
    /** Stat group, e.g. "hitting" or "pitching" */
    group: string;
    sportId: number;
    /** "R" for regular season */
    gameType: string;
}

export interface MlbStatsClientOptions {
    baseUrl: string;
    fetchFn?: FetchFn;
    teamStats?: Partial<TeamStatsParams>;
    /** Season used for team stats; defaults to the current year */
    season?: () => number;
}

const DEFAULT_TEAM_STATS: TeamStatsParams = {
    statType: 'season',
    group: 'hitting',
    sportId: 1,
    gameType: 'R',
};

export class MlbStatsClient implements CatalogSource {
    private baseUrl: string;
    private fetchFn: FetchFn;
    private teamStats: TeamStatsParams;
    private season: () => number;

    constructor(options: MlbStatsClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.fetchFn = options.fetchFn || ((input, init) => fetch(input, init));
        this.teamStats = { ...DEFAULT_TEAM_STATS, ...options.teamStats };
        this.season = options.season || (() => new Date().getFullYear());
    }

    /**
     * List every MLB team (sportId=1)
     */
    async listTeams(): Promise<FetchOutcome<CatalogEntity[]>> {
        const result = await fetchJson(this.fetchFn, `${this.baseUrl}/teams?sportId=1`, TAG);
        if (result.status !== 'ok') return result;

        const parsed = TeamsResponseSchema.safeParse(result.value);
        if (!parsed.success) {
            console.warn(`[${TAG}] Unexpected teams payload`);
            return upstreamFailure('parse: unexpected teams payload');
        }

        const teams = collect(parsed.data.teams, TeamRowSchema, row => ({ id: row.id, name: row.name }));
        return teams.length > 0 ? ok(teams) : empty();
    }

    /**
     * Active roster of one team for a season
     */
    async listRoster(teamId: number, season: number): Promise<FetchOutcome<CatalogEntity[]>> {
        const params = new URLSearchParams({ season: String(season), rosterType: 'Active' });
        const url = `${this.baseUrl}/teams/${teamId}/roster?${params.toString()}`;

        const result = await fetchJson(this.fetchFn, url, TAG);
        if (result.status !== 'ok') return result;

        const parsed = RosterResponseSchema.safeParse(result.value);
        if (!parsed.success) {
            console.warn(`[${TAG}] Unexpected roster payload for team ${teamId}`);
            return upstreamFailure('parse: unexpected roster payload');
        }

        const players = collect(parsed.data.roster, RosterRowSchema, row => ({
            id: row.person.id,
            name: row.person.fullName,
        }));
        return players.length > 0 ? ok(players) : empty();
    }

    /**
     * Season stats for a player or a team. A payload without stats or
     * splits is "no data", not a failure.
     */
    async fetchStats(subject: StatsSubject): Promise<FetchOutcome<StatsPayload>> {
        const url = subject.kind === 'player'
            ? this.playerStatsUrl(subject.id)
            : this.teamStatsUrl(subject.id);

        const result = await fetchJson(this.fetchFn, url, TAG);
        if (result.status !== 'ok') return result;

        const parsed = StatsResponseSchema.safeParse(result.value);
        if (!parsed.success) {
            console.warn(`[${TAG}] Unexpected stats payload for ${subject.kind} ${subject.id}`);
            return upstreamFailure('parse: unexpected stats payload');
        }

        const payload: StatsPayload = parsed.data;
        const splits = payload.stats?.[0]?.splits;
        if (!splits || splits.length === 0) {
            return empty();
        }

        return ok(payload);
    }

    private playerStatsUrl(playerId: number): string {
        return `${this.baseUrl}/people/${playerId}/stats?stats=season`;
    }

    private teamStatsUrl(teamId: number): string {
        const params = new URLSearchParams({
            stats: this.teamStats.statType,
            season: String(this.season()),
            group: this.teamStats.group,
            sportIds: String(this.teamStats.sportId),
            gameType: this.teamStats.gameType,
        });
        return `${this.baseUrl}/teams/${teamId}/stats?${params.toString()}`;
    }
}

function collect<T>(
    rows: unknown[] | undefined,
    schema: z.ZodType<T>,
    map: (row: T) => CatalogEntity
): CatalogEntity[] {
    const entities: CatalogEntity[] = [];
    for (const row of rows || []) {
        const parsed = schema.safeParse(row);
        if (parsed.success) {
            entities.push(map(parsed.data));
        }
    }
    return entities;
}
