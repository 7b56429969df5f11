/**
 * API Services
 *
 * The collaborators the handlers call, kept behind narrow interfaces so the
 * app can be built over fakes.
 */

import type { DugoutPipeline, SqliteArticleStore } from '@dugout/enrichment';
import type { RecentLookups } from './cache.js';

export interface ApiServices {
    pipeline: Pick<DugoutPipeline, 'lookup'>;
    articles: Pick<SqliteArticleStore, 'list'>;
    recent: RecentLookups;
}

export function createRequestId(): string {
    return `req-${Date.now()}-${Math.random().toString(36).substring(7)}`;
}
