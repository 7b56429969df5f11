/**
 * Configuration Types
 */

import type { MatchMode } from './entity.js';

export type FreshnessSettings =
    | { type: 'cutoff'; cutoff: string }
    | { type: 'max-age'; maxAgeDays: number };

export interface DugoutConfig {
    statsApiBase: string;
    news: {
        apiUrl: string;
        /** Undefined disables news lookups */
        apiKey?: string;
        maxResults: number;
        /** Fixed pause after each news call */
        pauseMs: number;
    };
    catalog: {
        filePath: string;
        freshness: FreshnessSettings;
    };
    articleDbPath: string;
    matchMode: MatchMode;
    port: number;
}
