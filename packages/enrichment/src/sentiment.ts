/**
 * Sentiment Scoring
 *
 * VADER compound polarity for article descriptions, plus the seven-bucket
 * label mapping used wherever a score is shown.
 */

import vader from 'vader-sentiment';
import type { Article, ScoredArticle, SentimentLabel } from '@dugout/types';

export interface SentimentScorer {
    /** Compound polarity in [-1, 1]; 0 for empty text */
    score(text: string): number;
}

export class VaderSentimentScorer implements SentimentScorer {
    score(text: string): number {
        if (text.trim().length === 0) {
            return 0;
        }
        const { compound } = vader.SentimentIntensityAnalyzer.polarity_scores(text);
        if (!Number.isFinite(compound)) {
            return 0;
        }
        return Math.max(-1, Math.min(1, compound));
    }
}

/**
 * The text an article is scored on: its description, or the empty string.
 * The content field is never used.
 */
export function sentimentText(article: Article): string {
    return article.description || '';
}

export function scoreArticles(articles: readonly Article[], scorer: SentimentScorer): ScoredArticle[] {
    return articles.map(article => ({
        ...article,
        sentimentScore: scorer.score(sentimentText(article)),
    }));
}

/**
 * Bucket a compound score. Buckets compare the raw score; only the
 * strongly negative edge is judged at the three decimals a score is shown
 * with, so -0.6669 (shown as -0.667) is Strongly negative.
 */
export function categorizeScore(score: number): SentimentLabel {
    if (score <= -0.667 || Math.round(score * 1000) <= -667) return 'Strongly negative';
    if (score <= -0.334) return 'Moderately negative';
    if (score < 0) return 'Slightly negative';
    if (score === 0) return 'Neutral';
    if (score <= 0.333) return 'Slightly positive';
    if (score <= 0.666) return 'Moderately positive';
    return 'Strongly positive';
}
