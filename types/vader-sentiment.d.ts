// vader-sentiment ships no type declarations and has no @types package.
declare module 'vader-sentiment' {
    interface PolarityScores {
        neg: number;
        neu: number;
        pos: number;
        compound: number;
    }

    const vader: {
        SentimentIntensityAnalyzer: {
            polarity_scores(text: string): PolarityScores;
        };
    };

    export = vader;
}
