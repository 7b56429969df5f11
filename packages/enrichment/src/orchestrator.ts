/**
 * Enrichment Orchestrator
 *
 * For one resolved entity, sequentially:
 * 1. fetch stats (teams and players only)
 * 2. fetch news for the entity name over the date window
 * 3. score every article
 * 4. append the scored articles to the store (also when there are none)
 */

import type {
    Article,
    DateWindow,
    Entity,
    FetchOutcome,
    NewsQuery,
    ScoredArticle,
    StatsPayload,
    StatsSubject,
} from '@dugout/types';
import type { AppendOutcome, ArticleSink } from './article-store.js';
import { scoreArticles, type SentimentScorer } from './sentiment.js';
import { currentMonthWindow } from './window.js';

export interface StatsProvider {
    fetchStats(subject: StatsSubject): Promise<FetchOutcome<StatsPayload>>;
}

export interface NewsProvider {
    search(query: NewsQuery): Promise<FetchOutcome<Article[]>>;
}

export type SourceStatus =
    | { status: 'ok' }
    | { status: 'empty' }
    | { status: 'skipped' }
    | { status: 'upstream_failure'; reason: string };

export interface EnrichmentResult {
    entity: Entity;
    /** Empty object when no stats were fetched or available */
    stats: StatsPayload;
    statsStatus: SourceStatus;
    articles: ScoredArticle[];
    newsStatus: SourceStatus;
    window: DateWindow;
    persisted: AppendOutcome;
    timing: {
        statsMs: number;
        newsMs: number;
        totalMs: number;
    };
}

export interface EnrichOptions {
    /** Overrides the first-of-month-to-today window */
    window?: DateWindow;
    /** Request ID for logging */
    requestId?: string;
}

export interface EnrichmentOrchestratorDeps {
    stats: StatsProvider;
    news: NewsProvider;
    scorer: SentimentScorer;
    store: ArticleSink;
    clock?: () => Date;
}

export class EnrichmentOrchestrator {
    private deps: EnrichmentOrchestratorDeps;
    private clock: () => Date;

    constructor(deps: EnrichmentOrchestratorDeps) {
        this.deps = deps;
        this.clock = deps.clock || (() => new Date());
    }

    async enrich(entity: Entity, options: EnrichOptions = {}): Promise<EnrichmentResult> {
        const startTime = Date.now();
        const tag = options.requestId ? `[${options.requestId}]` : '[Orchestrator]';
        const window = options.window || currentMonthWindow(this.clock());

        console.log(`${tag} Enriching ${entity.kind} "${entity.name}" (news ${window.from} to ${window.to})`);

        // Stats
        let stats: StatsPayload = {};
        let statsStatus: SourceStatus = { status: 'skipped' };
        if (entity.kind !== 'league') {
            const outcome = await this.deps.stats.fetchStats({ kind: entity.kind, id: entity.id });
            statsStatus = toStatus(outcome);
            if (outcome.status === 'ok') {
                stats = outcome.value;
            }
        }
        const statsMs = Date.now() - startTime;

        // News
        const newsStart = Date.now();
        const newsOutcome = await this.deps.news.search({ text: entity.name, window });
        const fetched = newsOutcome.status === 'ok' ? newsOutcome.value : [];
        const newsMs = Date.now() - newsStart;

        const articles = scoreArticles(fetched, this.deps.scorer);
        const persisted = await this.deps.store.append(articles);

        console.log(
            `${tag} Done: stats: ${statsStatus.status}, news: ${articles.length} articles (${newsOutcome.status}), stored: ${persisted.written}`
        );

        return {
            entity,
            stats,
            statsStatus,
            articles,
            newsStatus: toStatus(newsOutcome),
            window,
            persisted,
            timing: {
                statsMs,
                newsMs,
                totalMs: Date.now() - startTime,
            },
        };
    }
}

function toStatus<T>(outcome: FetchOutcome<T>): SourceStatus {
    return outcome.status === 'upstream_failure'
        ? { status: 'upstream_failure', reason: outcome.reason }
        : { status: outcome.status };
}
