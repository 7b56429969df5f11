/**
 * Stats Rendering
 *
 * Player:  hitting block when the split has "avg", pitching when it has
 *          "era", otherwise every key/value pair
 * Team:    record, runs, home/away wins, streak
 */

import type { Entity, StatSplit, StatsPayload } from '@dugout/types';
import type { EnrichmentResult } from '@dugout/enrichment';
import { renderNews } from './news.js';
import { RULE_WIDTH, display } from './text.js';

export const NO_STATS_MESSAGE = 'No statistical data available.';

const HITTING: Array<[label: string, key: string]> = [
    ['Batting Average', 'avg'],
    ['Hits', 'hits'],
    ['Home Runs', 'homeRuns'],
    ['RBIs', 'rbi'],
    ['OPS', 'ops'],
];

const PITCHING: Array<[label: string, key: string]> = [
    ['ERA', 'era'],
    ['Wins', 'wins'],
    ['Losses', 'losses'],
    ['Strikeouts', 'strikeOuts'],
    ['WHIP', 'whip'],
];

export function renderReport(result: EnrichmentResult): string {
    const lines = [
        '',
        `--- Results for ${result.entity.name} ---`,
        ...renderStats(result.entity, result.stats),
        ...renderNews(result.entity.name, result.articles),
    ];

    if (result.statsStatus.status === 'upstream_failure') {
        lines.push('', `(stats unavailable: ${result.statsStatus.reason})`);
    }
    if (result.newsStatus.status === 'upstream_failure') {
        lines.push('', `(news unavailable: ${result.newsStatus.reason})`);
    }
    if (result.persisted.error) {
        lines.push('', `(articles not saved: ${result.persisted.error})`);
    }

    return lines.join('\n');
}

export function renderStats(entity: Entity, stats: StatsPayload): string[] {
    switch (entity.kind) {
        case 'player':
            return renderPlayerStats(entity.name, stats);
        case 'team':
            return renderTeamStats(entity.name, stats);
        case 'league':
            return ['', NO_STATS_MESSAGE];
    }
}

export function renderPlayerStats(name: string, stats: StatsPayload): string[] {
    const split = firstSplit(stats);
    if (!split) return ['', NO_STATS_MESSAGE];

    const teamName = split.team?.name || 'Unknown Team';
    const stat = split.stat;
    const lines = [
        '',
        '='.repeat(RULE_WIDTH),
        ` Stats for ${name} (${teamName}):`,
        '='.repeat(RULE_WIDTH),
    ];

    const block = 'avg' in stat ? HITTING : 'era' in stat ? PITCHING : null;
    if (block) {
        for (const [label, key] of block) {
            lines.push(`${label}: ${display(stat[key])}`);
        }
    } else {
        for (const [key, value] of Object.entries(stat)) {
            lines.push(`${key}: ${display(value)}`);
        }
    }

    return lines;
}

export function renderTeamStats(name: string, stats: StatsPayload): string[] {
    const split = firstSplit(stats);
    if (!split) return ['', NO_STATS_MESSAGE];

    const stat = split.stat;
    const streak = stat.currentStreak;
    const streakCode = typeof streak === 'object' && streak !== null && 'streakCode' in streak
        ? streak.streakCode
        : undefined;

    return [
        '',
        `--- Stats for ${name} (Team) ---`,
        `Record        : ${display(stat.wins)}-${display(stat.losses)} (${display(stat.winPct)})`,
        `Runs Scored   : ${display(stat.runsScored ?? stat.runs)}`,
        `Runs Against  : ${display(stat.runsAgainst)}`,
        `Home Wins     : ${display(stat.homeWins)}`,
        `Away Wins     : ${display(stat.awayWins)}`,
        `Streak        : ${display(streakCode)}`,
    ];
}

function firstSplit(stats: StatsPayload): StatSplit | undefined {
    return stats.stats?.[0]?.splits?.[0];
}
