/**
 * Dugout API
 *
 * REST API server for entity lookup and enrichment.
 */

import 'dotenv/config';
import { loadConfig } from '@dugout/config';
import { createPipeline } from '@dugout/enrichment';
import { createApp } from './app.js';
import { RecentLookups } from './cache.js';

const config = loadConfig();
const { pipeline, store } = createPipeline(config);

const app = createApp({ pipeline, articles: store, recent: new RecentLookups() });
const PORT = config.port;

// Start server
app.listen(PORT, () => {
    console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║                        ⚾  DUGOUT                          ║
║              MLB Entity Enrichment Service                ║
║                                                           ║
║   Server running at http://localhost:${PORT}               ║
║   API endpoint: POST /api/enrich                          ║
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
  `);
});

export default app;
