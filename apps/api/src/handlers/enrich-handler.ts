/**
 * Enrich Handler
 *
 * POST /api/enrich - resolve a query and enrich the matched entity
 * GET /api/enrich/recent - recent lookups from the in-memory cache
 */

import type { Request, Response } from 'express';
import type { ApiServices } from '../services.js';
import { createRequestId } from '../services.js';
import type { EnrichRequest } from '../middleware/validation.js';

export function createEnrichHandler(services: ApiServices) {
    return async function enrichHandler(req: Request, res: Response): Promise<void> {
        const startTime = Date.now();
        const requestId = createRequestId();

        const enrichRequest: EnrichRequest = req.body;

        console.log(`[${requestId}] 🔍 Enrich request: "${enrichRequest.query}" (mode: ${enrichRequest.mode || 'default'})`);

        try {
            const window = enrichRequest.from && enrichRequest.to
                ? { from: enrichRequest.from, to: enrichRequest.to }
                : undefined;

            const lookup = await services.pipeline.lookup(enrichRequest.query, {
                mode: enrichRequest.mode,
                window,
                requestId,
            });

            if (lookup.status === 'not_found') {
                services.recent.add({
                    id: requestId,
                    query: enrichRequest.query,
                    status: 'not_found',
                    articleCount: 0,
                });
                res.status(404).json({
                    error: 'No matching entity',
                    query: lookup.query,
                    suggestions: lookup.suggestions,
                });
                return;
            }

            const { entity } = lookup.resolution;
            services.recent.add({
                id: requestId,
                query: enrichRequest.query,
                status: 'enriched',
                entity: { kind: entity.kind, id: entity.id, name: entity.name },
                articleCount: lookup.result.articles.length,
            });

            console.log(`[${requestId}] ✓ Complete in ${Date.now() - startTime}ms`);
            res.json({ requestId, resolution: lookup.resolution, result: lookup.result });
        } catch (error) {
            console.error(`[${requestId}] ❌ Enrich error:`, error);
            res.status(500).json({
                error: 'Enrichment failed',
                message: error instanceof Error ? error.message : 'Unknown error',
                requestId,
            });
        }
    };
}

export function createRecentHandler(services: ApiServices) {
    return function recentHandler(req: Request, res: Response): void {
        const limit = typeof req.query.limit === 'string' ? Number(req.query.limit) : undefined;
        res.json({ lookups: services.recent.getRecent(limit) });
    };
}
