/**
 * Dugout Presenter
 *
 * Plain-text rendering of enrichment results for the CLI.
 */

export { renderReport, renderStats, renderPlayerStats, renderTeamStats, NO_STATS_MESSAGE } from './stats.js';
export { renderNews, renderDistribution, summarizeSentiment, formatScore, type SentimentSummary } from './news.js';
export { wrapText, snippet } from './text.js';
