/**
 * Article Store
 *
 * Append-only SQLite table of scored articles, kept in a single database
 * file. Each call opens the file, does its work and closes it again. There
 * is no uniqueness constraint, so repeated runs over overlapping windows
 * store duplicate rows.
 *
 * Persistence is best effort: storage errors are logged and reported in
 * the outcome, never thrown.
 */

import sqlJs from 'sql.js';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import type { ScoredArticle } from '@dugout/types';

const CREATE_TABLE = `CREATE TABLE IF NOT EXISTS articles (
    title TEXT,
    date TEXT,
    author TEXT,
    url TEXT,
    source TEXT,
    sentiment REAL
)`;

const INSERT_ROW = 'INSERT INTO articles (title, date, author, url, source, sentiment) VALUES (?, ?, ?, ?, ?, ?)';
const SELECT_ALL = 'SELECT title, date, author, url, source, sentiment FROM articles ORDER BY rowid';
const SELECT_LATEST =
    'SELECT title, date, author, url, source, sentiment FROM articles ORDER BY rowid DESC LIMIT ?';

export interface StoredArticleRow {
    title: string | null;
    date: string | null;
    author: string | null;
    url: string | null;
    source: string | null;
    sentiment: number | null;
}

export interface AppendOutcome {
    written: number;
    error?: string;
}

export interface ArticleSink {
    append(articles: readonly ScoredArticle[]): Promise<AppendOutcome>;
}

// sql.js is CommonJS; its factory is exposed on `.default` under Node and Vitest alike
let engine: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
    if (!engine) {
        engine = sqlJs.default();
    }
    return engine;
}

export class SqliteArticleStore implements ArticleSink {
    constructor(readonly dbPath: string) {}

    async append(articles: readonly ScoredArticle[]): Promise<AppendOutcome> {
        try {
            return await this.withDatabase(true, db => {
                db.run(CREATE_TABLE);
                const insert = db.prepare(INSERT_ROW);
                try {
                    for (const article of articles) {
                        insert.run([
                            article.title,
                            article.publishedAt,
                            article.author,
                            article.url,
                            article.sourceName,
                            article.sentimentScore,
                        ]);
                    }
                } finally {
                    insert.free();
                }
                return { written: articles.length };
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[ArticleStore] Database error: ${message}`);
            return { written: 0, error: message };
        }
    }

    /**
     * Read stored rows back in insertion order, newest last.
     */
    async list(limit?: number): Promise<StoredArticleRow[]> {
        if (!fs.existsSync(this.dbPath)) {
            return [];
        }
        return this.withDatabase(false, db => {
            db.run(CREATE_TABLE);
            if (limit === undefined) {
                return selectRows(db, SELECT_ALL, []);
            }
            return selectRows(db, SELECT_LATEST, [limit]).reverse();
        });
    }

    /**
     * Load the database file (or start an empty one), run `work`, and write
     * the file back when `save` is set and `work` succeeded.
     */
    private async withDatabase<T>(save: boolean, work: (db: Database) => T): Promise<T> {
        const SQL = await loadEngine();

        const dir = path.dirname(this.dbPath);
        if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

        const db = fs.existsSync(this.dbPath)
            ? new SQL.Database(fs.readFileSync(this.dbPath))
            : new SQL.Database();
        try {
            const result = work(db);
            if (save) {
                fs.writeFileSync(this.dbPath, db.export());
            }
            return result;
        } finally {
            db.close();
        }
    }
}

function selectRows(db: Database, sql: string, params: SqlValue[]): StoredArticleRow[] {
    const [result] = db.exec(sql, params);
    if (!result) {
        return [];
    }
    return result.values.map(([title, date, author, url, source, sentiment]) => ({
        title: textOrNull(title),
        date: textOrNull(date),
        author: textOrNull(author),
        url: textOrNull(url),
        source: textOrNull(source),
        sentiment: typeof sentiment === 'number' ? sentiment : null,
    }));
}

function textOrNull(value: SqlValue | undefined): string | null {
    return typeof value === 'string' ? value : null;
}
