import { describe, it, expect } from 'vitest';
import { loadConfig, ConfigError } from './config.js';

describe('loadConfig', () => {
    it('applies defaults for an empty environment', () => {
        const config = loadConfig({});

        expect(config.statsApiBase).toBe('https://statsapi.mlb.com/api/v1');
        expect(config.news).toEqual({
            apiUrl: 'https://gnews.io/api/v4/search',
            apiKey: undefined,
            maxResults: 10,
            pauseMs: 1000,
        });
        expect(config.catalog).toEqual({
            filePath: 'valid_mlb_entities.json',
            freshness: { type: 'cutoff', cutoff: '2024-07-30' },
        });
        expect(config.articleDbPath).toBe('news_articles.db');
        expect(config.matchMode).toBe('exact');
        expect(config.port).toBe(3300);
    });

    it('reads overrides and trims a trailing slash from the stats base', () => {
        const config = loadConfig({
            MLB_STATS_API_BASE: 'http://stats.test/api/v1/',
            NEWS_API_KEY: 'test-secret',
            NEWS_PAUSE_MS: '0',
            MATCH_MODE: 'substring',
            CATALOG_CUTOFF: '2025-07-31',
        });

        expect(config.statsApiBase).toBe('http://stats.test/api/v1');
        expect(config.news.apiKey).toBe('test-secret');
        expect(config.news.pauseMs).toBe(0);
        expect(config.matchMode).toBe('substring');
        expect(config.catalog.freshness).toEqual({ type: 'cutoff', cutoff: '2025-07-31' });
    });

    it('switches to a max-age policy when CATALOG_MAX_AGE_DAYS is set', () => {
        const config = loadConfig({ CATALOG_MAX_AGE_DAYS: '14' });

        expect(config.catalog.freshness).toEqual({ type: 'max-age', maxAgeDays: 14 });
    });

    it('treats empty strings as unset', () => {
        const config = loadConfig({ NEWS_API_KEY: '', MATCH_MODE: '' });

        expect(config.news.apiKey).toBeUndefined();
        expect(config.matchMode).toBe('exact');
    });

    it('reports every invalid variable', () => {
        let caught: unknown;
        try {
            loadConfig({ MATCH_MODE: 'fuzzy', CATALOG_CUTOFF: 'July 30', PORT: 'abc' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        const variables = caught instanceof ConfigError ? caught.issues.map(i => i.variable).sort() : [];
        expect(variables).toEqual(['CATALOG_CUTOFF', 'MATCH_MODE', 'PORT']);
    });
});
