/**
 * Pipeline Factory
 *
 * Wires the production collaborators from a DugoutConfig. This is the main
 * entry point for the apps.
 */

import type { DugoutConfig } from '@dugout/types';
import { CatalogFileStore, EntityCatalog, createFreshnessPolicy } from '@dugout/catalog';
import { GNewsClient, MlbStatsClient, type FetchFn } from '@dugout/sources';
import { SqliteArticleStore } from './article-store.js';
import { EnrichmentOrchestrator } from './orchestrator.js';
import { DugoutPipeline } from './pipeline.js';
import { VaderSentimentScorer } from './sentiment.js';

export interface PipelineOverrides {
    fetchFn?: FetchFn;
    sleep?: (ms: number) => Promise<void>;
    clock?: () => Date;
}

export interface PipelineServices {
    pipeline: DugoutPipeline;
    store: SqliteArticleStore;
}

export function createPipeline(config: DugoutConfig, overrides: PipelineOverrides = {}): PipelineServices {
    const clock = overrides.clock;

    const stats = new MlbStatsClient({
        baseUrl: config.statsApiBase,
        fetchFn: overrides.fetchFn,
        season: clock ? () => clock().getFullYear() : undefined,
    });

    const news = new GNewsClient({
        apiUrl: config.news.apiUrl,
        apiKey: config.news.apiKey,
        maxResults: config.news.maxResults,
        pauseMs: config.news.pauseMs,
        fetchFn: overrides.fetchFn,
        sleep: overrides.sleep,
    });

    const catalog = new EntityCatalog({
        source: stats,
        store: new CatalogFileStore(config.catalog.filePath),
        policy: createFreshnessPolicy(config.catalog.freshness),
        clock,
    });

    const store = new SqliteArticleStore(config.articleDbPath);

    const orchestrator = new EnrichmentOrchestrator({
        stats,
        news,
        scorer: new VaderSentimentScorer(),
        store,
        clock,
    });

    return {
        pipeline: new DugoutPipeline({ catalog, orchestrator, matchMode: config.matchMode }),
        store,
    };
}
