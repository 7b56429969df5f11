import { z } from 'zod';
import type { DugoutConfig } from '@dugout/types';

/** Trade deadline of the season the catalog cutoff was introduced for */
export const DEFAULT_TRADE_DEADLINE = '2024-07-30';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

const optionalString = z
    .string()
    .optional()
    .transform(v => (v && v.trim().length > 0 ? v.trim() : undefined));

const EnvSchema = z.object({
    MLB_STATS_API_BASE: z.string().url().default('https://statsapi.mlb.com/api/v1'),
    NEWS_API_URL: z.string().url().default('https://gnews.io/api/v4/search'),
    NEWS_API_KEY: optionalString,
    NEWS_MAX_RESULTS: z.coerce.number().int().min(1).max(100).default(10),
    NEWS_PAUSE_MS: z.coerce.number().int().min(0).default(1000),
    CATALOG_FILE: z.string().min(1).default('valid_mlb_entities.json'),
    CATALOG_CUTOFF: z.string().regex(CALENDAR_DATE, 'Expected YYYY-MM-DD').default(DEFAULT_TRADE_DEADLINE),
    CATALOG_MAX_AGE_DAYS: z.coerce.number().int().positive().optional(),
    ARTICLE_DB_PATH: z.string().min(1).default('news_articles.db'),
    MATCH_MODE: z.enum(['exact', 'substring']).default('exact'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3300),
});

export class ConfigError extends Error {
    constructor(readonly issues: Array<{ variable: string; message: string }>) {
        super(`Invalid configuration: ${issues.map(i => `${i.variable} (${i.message})`).join(', ')}`);
        this.name = 'ConfigError';
    }
}

/**
 * Build the config from an environment map. Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): DugoutConfig {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value !== '') {
            cleaned[key] = value;
        }
    }

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.errors.map(e => ({
                variable: e.path.join('.'),
                message: e.message,
            }))
        );
    }

    const vars = parsed.data;

    return {
        statsApiBase: vars.MLB_STATS_API_BASE.replace(/\/+$/, ''),
        news: {
            apiUrl: vars.NEWS_API_URL,
            apiKey: vars.NEWS_API_KEY,
            maxResults: vars.NEWS_MAX_RESULTS,
            pauseMs: vars.NEWS_PAUSE_MS,
        },
        catalog: {
            filePath: vars.CATALOG_FILE,
            freshness: vars.CATALOG_MAX_AGE_DAYS !== undefined
                ? { type: 'max-age', maxAgeDays: vars.CATALOG_MAX_AGE_DAYS }
                : { type: 'cutoff', cutoff: vars.CATALOG_CUTOFF },
        },
        articleDbPath: vars.ARTICLE_DB_PATH,
        matchMode: vars.MATCH_MODE,
        port: vars.PORT,
    };
}
