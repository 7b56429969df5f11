/**
 * Enrich Routes
 *
 * POST /api/enrich - Resolve and enrich
 * GET /api/enrich/recent - Recent lookups
 * GET /api/articles - Persisted articles
 */

import { Router } from 'express';
import type { Router as RouterType } from 'express';
import { createEnrichHandler, createRecentHandler } from '../handlers/enrich-handler.js';
import { createArticlesHandler } from '../handlers/articles-handler.js';
import { validateEnrichRequest, validateListQuery } from '../middleware/validation.js';
import type { ApiServices } from '../services.js';

export function createEnrichRouter(services: ApiServices): RouterType {
    const router: RouterType = Router();

    router.post('/enrich', validateEnrichRequest, createEnrichHandler(services));
    router.get('/enrich/recent', validateListQuery, createRecentHandler(services));
    router.get('/articles', validateListQuery, createArticlesHandler(services));

    return router;
}
