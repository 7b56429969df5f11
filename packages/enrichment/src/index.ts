/**
 * Dugout Enrichment Package
 *
 * Sentiment scoring, article persistence and the orchestration that turns
 * a resolved entity into stats plus scored news.
 */

export { createPipeline, type PipelineOverrides, type PipelineServices } from './factory.js';
export { DugoutPipeline, type LookupResult, type LookupOptions } from './pipeline.js';
export {
    EnrichmentOrchestrator,
    type EnrichmentResult,
    type EnrichOptions,
    type NewsProvider,
    type SourceStatus,
    type StatsProvider,
} from './orchestrator.js';
export {
    VaderSentimentScorer,
    categorizeScore,
    scoreArticles,
    sentimentText,
    type SentimentScorer,
} from './sentiment.js';
export { SqliteArticleStore, type AppendOutcome, type ArticleSink, type StoredArticleRow } from './article-store.js';
export { currentMonthWindow } from './window.js';
