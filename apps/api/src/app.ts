/**
 * Express app over a set of services. Listening is left to the entry point.
 */

import express from 'express';
import type { Express } from 'express';
import { createEnrichRouter } from './routes/enrich.js';
import { loggingMiddleware } from './middleware/logging.js';
import type { ApiServices } from './services.js';

export function createApp(services: ApiServices): Express {
    const app: Express = express();

    // Middleware
    app.use(express.json({ limit: '1mb' }));
    app.use(loggingMiddleware);

    // Routes
    app.use('/api', createEnrichRouter(services));

    // Health check
    app.get('/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    return app;
}
