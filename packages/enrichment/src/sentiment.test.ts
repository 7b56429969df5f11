import { describe, it, expect } from 'vitest';
import type { Article } from '@dugout/types';
import { VaderSentimentScorer, categorizeScore, scoreArticles, sentimentText } from './sentiment.js';

function article(overrides: Partial<Article> = {}): Article {
    return {
        title: 'Headline',
        description: '',
        content: '',
        publishedAt: '2026-10-02T12:00:00Z',
        author: null,
        url: 'https://news.test/a',
        sourceName: 'Test Wire',
        ...overrides,
    };
}

describe('categorizeScore', () => {
    it.each([
        [-1, 'Strongly negative'],
        [-0.667, 'Strongly negative'],
        [-0.6669, 'Strongly negative'],
        [-0.6, 'Moderately negative'],
        [-0.334, 'Moderately negative'],
        [-0.3336, 'Slightly negative'],
        [-0.2, 'Slightly negative'],
        [-0.0004, 'Slightly negative'],
        [0, 'Neutral'],
        [0.0001, 'Slightly positive'],
        [0.0004, 'Slightly positive'],
        [0.2, 'Slightly positive'],
        [0.333, 'Slightly positive'],
        [0.3334, 'Moderately positive'],
        [0.5, 'Moderately positive'],
        [0.666, 'Moderately positive'],
        [0.667, 'Strongly positive'],
        [1, 'Strongly positive'],
    ])('labels %d as %s', (score, label) => {
        expect(categorizeScore(score)).toBe(label);
    });
});

describe('sentimentText', () => {
    it('uses the description', () => {
        expect(sentimentText(article({ description: 'Walk-off win' }))).toBe('Walk-off win');
    });

    it('never falls back to the content', () => {
        expect(sentimentText(article({ description: '', content: 'Great news everywhere' }))).toBe('');
    });
});

describe('VaderSentimentScorer', () => {
    const scorer = new VaderSentimentScorer();

    it('scores empty text as neutral', () => {
        expect(scorer.score('')).toBe(0);
        expect(scorer.score('   ')).toBe(0);
    });

    it('scores clearly positive and negative text by sign', () => {
        expect(scorer.score('A great win, the fans love this team!')).toBeGreaterThan(0);
        expect(scorer.score('A horrible, terrible loss. Awful defense.')).toBeLessThan(0);
    });

    it('keeps scores within [-1, 1]', () => {
        const score = scorer.score('Amazing amazing amazing wonderful fantastic superb excellent great!!!');
        expect(score).toBeGreaterThan(0);
        expect(score).toBeLessThanOrEqual(1);
    });
});

describe('scoreArticles', () => {
    it('attaches a score per article without mutating the input', () => {
        const seen: string[] = [];
        const scorer = {
            score(text: string): number {
                seen.push(text);
                return text.length > 0 ? 0.5 : 0;
            },
        };
        const input = [article({ description: 'Comeback victory' }), article({ content: 'ignored' })];

        const scored = scoreArticles(input, scorer);

        expect(seen).toEqual(['Comeback victory', '']);
        expect(scored.map(a => a.sentimentScore)).toEqual([0.5, 0]);
        expect(input[0]).not.toHaveProperty('sentimentScore');
    });
});
