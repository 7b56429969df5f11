/**
 * Article Types
 */

/** A news article normalized from the provider response */
export interface Article {
    title: string;
    description: string;
    content: string;
    publishedAt: string | null;
    author: string | null;
    url: string;
    sourceName: string | null;
}

export interface ScoredArticle extends Article {
    /** VADER compound score in [-1, 1]; set once, never recomputed */
    sentimentScore: number;
}

export type SentimentLabel =
    | 'Strongly negative'
    | 'Moderately negative'
    | 'Slightly negative'
    | 'Neutral'
    | 'Slightly positive'
    | 'Moderately positive'
    | 'Strongly positive';

/** Inclusive calendar window, both ends YYYY-MM-DD */
export interface DateWindow {
    from: string;
    to: string;
}

export interface NewsQuery {
    text: string;
    window: DateWindow;
    maxResults?: number;
}
