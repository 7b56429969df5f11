/**
 * GNews Client
 *
 * Article search over a date window. Each call is followed by a fixed pause,
 * which is the only rate limiting the provider gets.
 */

import { z } from 'zod';
import {
    empty,
    ok,
    upstreamFailure,
    type Article,
    type FetchOutcome,
    type NewsQuery,
} from '@dugout/types';
import { fetchJson, type FetchFn } from './http.js';

const TAG = 'GNewsClient';

const RawArticleSchema = z
    .object({
        title: z.string().nullish(),
        description: z.string().nullish(),
        content: z.string().nullish(),
        publishedAt: z.string().nullish(),
        author: z.string().nullish(),
        url: z.string().nullish(),
        source: z
            .object({ name: z.string().nullish() })
            .passthrough()
            .nullish(),
    })
    .passthrough();

const SearchResponseSchema = z
    .object({
        articles: z.array(RawArticleSchema).optional(),
    })
    .passthrough();

type RawArticle = z.infer<typeof RawArticleSchema>;

export interface GNewsClientOptions {
    apiUrl: string;
    apiKey?: string;
    maxResults?: number;
    pauseMs: number;
    fetchFn?: FetchFn;
    sleep?: (ms: number) => Promise<void>;
}

export class GNewsClient {
    private apiUrl: string;
    private apiKey: string;
    private maxResults?: number;
    private pauseMs: number;
    private fetchFn: FetchFn;
    private sleep: (ms: number) => Promise<void>;

    constructor(options: GNewsClientOptions) {
        this.apiUrl = options.apiUrl;
        this.apiKey = options.apiKey || '';
        this.maxResults = options.maxResults;
        this.pauseMs = options.pauseMs;
        this.fetchFn = options.fetchFn || ((input, init) => fetch(input, init));
        this.sleep = options.sleep || (ms => new Promise(resolve => setTimeout(resolve, ms)));
    }

    async search(query: NewsQuery): Promise<FetchOutcome<Article[]>> {
        if (!this.apiKey) {
            console.warn(`[${TAG}] No API key configured`);
            return upstreamFailure('no api key configured');
        }

        const params = new URLSearchParams({
            q: query.text,
            from: query.window.from,
            to: query.window.to,
        });
        const max = query.maxResults ?? this.maxResults;
        if (max !== undefined) {
            params.set('max', String(max));
        }
        params.set('token', this.apiKey);

        const result = await fetchJson(this.fetchFn, `${this.apiUrl}?${params.toString()}`, TAG);

        if (this.pauseMs > 0) {
            await this.sleep(this.pauseMs);
        }

        if (result.status !== 'ok') return result;

        const parsed = SearchResponseSchema.safeParse(result.value);
        if (!parsed.success) {
            console.warn(`[${TAG}] Unexpected search payload`);
            return upstreamFailure('parse: unexpected search payload');
        }

        const articles = (parsed.data.articles || []).map(normalizeArticle);
        return articles.length > 0 ? ok(articles) : empty();
    }
}

function normalizeArticle(raw: RawArticle): Article {
    return {
        title: raw.title ?? '',
        description: raw.description ?? '',
        content: raw.content ?? '',
        publishedAt: raw.publishedAt ?? null,
        author: raw.author ?? null,
        url: raw.url ?? '',
        sourceName: raw.source?.name ?? null,
    };
}
