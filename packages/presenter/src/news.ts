/**
 * News Rendering
 */

import type { ScoredArticle, SentimentLabel } from '@dugout/types';
import { categorizeScore } from '@dugout/enrichment';
import { RULE_WIDTH, snippet, wrapText } from './text.js';

const SNIPPET_WIDTH = 76;

export interface SentimentSummary {
    count: number;
    average: number;
    label: SentimentLabel;
    /** Earliest and latest publication day, YYYY-MM-DD */
    dateRange: { start: string; end: string } | null;
    distribution: Record<SentimentLabel, number>;
}

/** Signed score with three decimals, e.g. +0.440 or -0.127 */
export function formatScore(score: number): string {
    return `${score >= 0 ? '+' : ''}${score.toFixed(3)}`;
}

export function summarizeSentiment(articles: readonly ScoredArticle[]): SentimentSummary {
    const distribution = emptyDistribution();
    let total = 0;

    for (const article of articles) {
        total += article.sentimentScore;
        distribution[categorizeScore(article.sentimentScore)]++;
    }

    const days = articles
        .map(a => publishedDay(a))
        .filter((d): d is string => d !== null)
        .sort();

    const average = articles.length > 0 ? total / articles.length : 0;

    return {
        count: articles.length,
        average,
        label: categorizeScore(average),
        dateRange: days.length > 0 ? { start: days[0], end: days[days.length - 1] } : null,
        distribution,
    };
}

export function renderNews(name: string, articles: readonly ScoredArticle[]): string[] {
    if (articles.length === 0) {
        return ['', `No news articles found for ${name}.`];
    }

    const summary = summarizeSentiment(articles);
    const range = summary.dateRange ? `${summary.dateRange.start} to ${summary.dateRange.end}` : 'N/A to N/A';

    const lines = [
        '',
        '='.repeat(RULE_WIDTH),
        ` News Articles for ${name} (${summary.count} found):`,
        `   Date Range             : ${range}`,
        `   Average Sentiment Score: ${formatScore(summary.average)} (${summary.label})`,
        '   Sentiment Distribution :',
        ...renderDistribution(summary.distribution),
        '='.repeat(RULE_WIDTH),
    ];

    articles.forEach((article, index) => {
        const score = article.sentimentScore;
        lines.push(
            '',
            `${index + 1}. ${article.title || 'No Title'}`,
            `   Date: ${publishedDay(article) || 'N/A'}    Sentiment Score: ${formatScore(score)} (${categorizeScore(score)})`,
            '   Snippet:'
        );
        for (const line of wrapText(snippet(article.description || article.content), SNIPPET_WIDTH)) {
            lines.push(`     ${line}`);
        }
        if (article.url) {
            lines.push(`   Read more: ${article.url}`);
        }
        lines.push('-'.repeat(RULE_WIDTH));
    });

    return lines;
}

/** One line per label that has at least one article, strongest negative first */
export function renderDistribution(distribution: Record<SentimentLabel, number>): string[] {
    return SENTIMENT_LABELS
        .filter(label => distribution[label] > 0)
        .map(label => `     ${label}: ${distribution[label]}`);
}

const SENTIMENT_LABELS: readonly SentimentLabel[] = [
    'Strongly negative',
    'Moderately negative',
    'Slightly negative',
    'Neutral',
    'Slightly positive',
    'Moderately positive',
    'Strongly positive',
];

function emptyDistribution(): Record<SentimentLabel, number> {
    return {
        'Strongly negative': 0,
        'Moderately negative': 0,
        'Slightly negative': 0,
        'Neutral': 0,
        'Slightly positive': 0,
        'Moderately positive': 0,
        'Strongly positive': 0,
    };
}

function publishedDay(article: ScoredArticle): string | null {
    return article.publishedAt ? article.publishedAt.slice(0, 10) : null;
}
