/**
 * Stats Types
 *
 * Shape shared by the player and team endpoints of the MLB Stats API:
 * { stats: [ { splits: [ { stat: {...}, team?: {...} } ] } ] }
 */

export interface StatSplit {
    stat: Record<string, unknown>;
    team?: {
        id?: number;
        name?: string;
    };
}

export interface StatGroup {
    splits?: StatSplit[];
}

export interface StatsPayload {
    stats?: StatGroup[];
}

export type StatsSubject = { kind: 'player'; id: number } | { kind: 'team'; id: number };
