/**
 * CLI Session
 *
 * One-shot lookups and the interactive prompt loop. Input and output are
 * injected so the loop runs without a terminal.
 */

import type { DugoutPipeline, LookupResult } from '@dugout/enrichment';
import { renderReport } from '@dugout/presenter';

export const PROMPT = 'Enter full player or team name (type EXIT to quit): ';
export const INVALID_INPUT = 'Invalid input. Please enter a valid player or team name.';

export type Lookup = Pick<DugoutPipeline, 'lookup'>;

export interface SessionIO {
    /** Resolves to null when input is exhausted */
    ask(question: string): Promise<string | null>;
    print(text: string): void;
}

export async function runLookup(pipeline: Lookup, query: string, print: (text: string) => void): Promise<LookupResult> {
    const lookup = await pipeline.lookup(query, { requestId: `cli-${Date.now()}` });

    if (lookup.status === 'not_found') {
        print(INVALID_INPUT);
        if (lookup.suggestions.length > 0) {
            print(`Did you mean: ${lookup.suggestions.join(', ')}?`);
        }
        return lookup;
    }

    print(renderReport(lookup.result));
    return lookup;
}

/**
 * Prompt until the user types "exit" (any case) or input ends.
 */
export async function runInteractive(pipeline: Lookup, io: SessionIO): Promise<void> {
    for (;;) {
        const answer = await io.ask(`\n${PROMPT}`);
        if (answer === null) {
            return;
        }

        const query = answer.trim();
        if (query.toLowerCase() === 'exit') {
            io.print('Goodbye!');
            return;
        }
        if (query.length === 0) {
            io.print(INVALID_INPUT);
            continue;
        }

        await runLookup(pipeline, query, io.print);
    }
}
