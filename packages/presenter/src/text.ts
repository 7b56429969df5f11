/**
 * Text helpers
 */

export const RULE_WIDTH = 80;

/**
 * Greedy word wrap. Words longer than the width are split.
 */
export function wrapText(text: string, width: number): string[] {
    const lines: string[] = [];
    let current = '';

    for (let word of text.split(/\s+/).filter(w => w.length > 0)) {
        while (word.length > width) {
            if (current) {
                lines.push(current);
                current = '';
            }
            lines.push(word.slice(0, width));
            word = word.slice(width);
        }
        if (!word) continue;

        if (!current) {
            current = word;
        } else if (current.length + 1 + word.length <= width) {
            current += ` ${word}`;
        } else {
            lines.push(current);
            current = word;
        }
    }

    if (current) lines.push(current);
    return lines;
}

/** First `maxWords` words followed by an ellipsis */
export function snippet(text: string, maxWords = 30): string {
    const words = text.split(/\s+/).filter(w => w.length > 0);
    return `${words.slice(0, maxWords).join(' ')}...`;
}

export function display(value: unknown): string {
    if (value === undefined || value === null || value === '') return 'N/A';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}
