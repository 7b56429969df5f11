import { beforeEach, afterEach, describe, it, expect, vi } from 'vitest';
import {
    LEAGUE_ENTITY,
    empty,
    ok,
    upstreamFailure,
    type Article,
    type FetchOutcome,
    type NewsQuery,
    type ScoredArticle,
    type StatsPayload,
    type StatsSubject,
} from '@dugout/types';
import type { ArticleSink } from './article-store.js';
import { EnrichmentOrchestrator } from './orchestrator.js';

const YANKEES = { kind: 'team' as const, id: 147, name: 'New York Yankees' };
const JUDGE = { kind: 'player' as const, id: 592450, name: 'Aaron Judge' };

const PLAYER_STATS: StatsPayload = {
    stats: [{ splits: [{ stat: { avg: '.322', homeRuns: 58 }, team: { id: 147, name: 'New York Yankees' } }] }],
};

function article(title: string, description: string): Article {
    return {
        title,
        description,
        content: 'content is never scored',
        publishedAt: '2026-10-04T00:00:00Z',
        author: null,
        url: `https://news.test/${title.length}`,
        sourceName: 'Test Wire',
    };
}

function setup(options: {
    stats?: FetchOutcome<StatsPayload>;
    news?: FetchOutcome<Article[]>;
    storeFails?: boolean;
} = {}) {
    const stats = {
        fetchStats: vi.fn(async (_subject: StatsSubject) => options.stats ?? ok(PLAYER_STATS)),
    };
    const news = {
        search: vi.fn(async (_query: NewsQuery) => options.news ?? empty<Article[]>()),
    };
    const appended: ScoredArticle[][] = [];
    const store: ArticleSink = {
        append: vi.fn(async (articles: readonly ScoredArticle[]) => {
            appended.push([...articles]);
            return options.storeFails ? { written: 0, error: 'disk I/O error' } : { written: articles.length };
        }),
    };
    const scorer = { score: (text: string) => (text.includes('win') ? 0.5859 : text.length > 0 ? -0.4 : 0) };

    const orchestrator = new EnrichmentOrchestrator({
        stats,
        news,
        scorer,
        store,
        clock: () => new Date(2026, 9, 18, 9, 30),
    });

    return { orchestrator, stats, news, store, appended };
}

describe('EnrichmentOrchestrator', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('fetches player stats by id and news for the canonical name', async () => {
        const { orchestrator, stats, news } = setup();

        const result = await orchestrator.enrich(JUDGE);

        expect(stats.fetchStats).toHaveBeenCalledWith({ kind: 'player', id: 592450 });
        expect(news.search).toHaveBeenCalledWith({
            text: 'Aaron Judge',
            window: { from: '2026-10-01', to: '2026-10-18' },
        });
        expect(result.stats).toEqual(PLAYER_STATS);
        expect(result.statsStatus).toEqual({ status: 'ok' });
    });

    it('logs the window and the outcome under the request id', async () => {
        const { orchestrator } = setup();

        await orchestrator.enrich(JUDGE, { requestId: 'req-1' });

        expect(console.log).toHaveBeenCalledWith('[req-1] Enriching player "Aaron Judge" (news 2026-10-01 to 2026-10-18)');
        expect(console.log).toHaveBeenCalledWith('[req-1] Done: stats: ok, news: 0 articles (empty), stored: 0');
    });

    it('downgrades a stats failure to an empty payload and still runs news and scoring', async () => {
        const { orchestrator, stats, appended } = setup({
            stats: upstreamFailure('http 500'),
            news: ok([article('Yankees win', 'Big win in the Bronx'), article('Injury', 'Starter hurt')]),
        });

        const result = await orchestrator.enrich(YANKEES);

        expect(stats.fetchStats).toHaveBeenCalledWith({ kind: 'team', id: 147 });
        expect(result.stats).toEqual({});
        expect(result.statsStatus).toEqual({ status: 'upstream_failure', reason: 'http 500' });
        expect(result.articles.map(a => a.sentimentScore)).toEqual([0.5859, -0.4]);
        expect(appended).toEqual([result.articles]);
        expect(result.persisted).toEqual({ written: 2 });
    });

    it('never fetches stats for the league and searches news for "MLB"', async () => {
        const { orchestrator, stats, news } = setup();

        const result = await orchestrator.enrich(LEAGUE_ENTITY);

        expect(stats.fetchStats).not.toHaveBeenCalled();
        expect(news.search).toHaveBeenCalledWith(expect.objectContaining({ text: 'MLB' }));
        expect(result.stats).toEqual({});
        expect(result.statsStatus).toEqual({ status: 'skipped' });
    });

    it('persists an empty list when no news is found', async () => {
        const { orchestrator, store } = setup({ news: empty() });

        const result = await orchestrator.enrich(JUDGE);

        expect(store.append).toHaveBeenCalledWith([]);
        expect(result.articles).toEqual([]);
        expect(result.newsStatus).toEqual({ status: 'empty' });
        expect(result.persisted).toEqual({ written: 0 });
    });

    it('distinguishes a news failure from no news', async () => {
        const { orchestrator } = setup({ news: upstreamFailure('no api key configured') });

        const result = await orchestrator.enrich(JUDGE);

        expect(result.newsStatus).toEqual({ status: 'upstream_failure', reason: 'no api key configured' });
        expect(result.articles).toEqual([]);
    });

    it('uses an explicit window when given', async () => {
        const { orchestrator, news } = setup();
        const window = { from: '2025-05-01', to: '2025-05-02' };

        const result = await orchestrator.enrich(YANKEES, { window });

        expect(news.search).toHaveBeenCalledWith({ text: 'New York Yankees', window });
        expect(result.window).toEqual(window);
    });

    it('reports a persistence failure without throwing', async () => {
        const { orchestrator } = setup({ news: ok([article('Yankees win', 'A win')]), storeFails: true });

        const result = await orchestrator.enrich(YANKEES);

        expect(result.persisted).toEqual({ written: 0, error: 'disk I/O error' });
        expect(result.articles).toHaveLength(1);
    });
});
