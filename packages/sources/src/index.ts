/**
 * Dugout Sources
 *
 * Thin typed clients for the upstream providers. Every call resolves to a
 * FetchOutcome; none of them throw.
 */

export { fetchJson, type FetchFn } from './http.js';
export { MlbStatsClient, type MlbStatsClientOptions, type TeamStatsParams } from './mlb-stats.js';
export { GNewsClient, type GNewsClientOptions } from './gnews.js';
