/**
 * Articles Handler
 *
 * GET /api/articles - rows persisted by earlier enrichments, in insertion order.
 */

import type { Request, Response } from 'express';
import type { ApiServices } from '../services.js';

export function createArticlesHandler(services: ApiServices) {
    return async function articlesHandler(req: Request, res: Response): Promise<void> {
        const limit = typeof req.query.limit === 'string' ? Number(req.query.limit) : undefined;

        try {
            const articles = await services.articles.list(limit);
            res.json({ count: articles.length, articles });
        } catch (error) {
            console.error('[Articles] ❌ Read error:', error);
            res.status(500).json({
                error: 'Failed to read articles',
                message: error instanceof Error ? error.message : 'Unknown error',
            });
        }
    };
}
