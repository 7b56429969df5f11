#!/usr/bin/env -S npx tsx
/**
 * Dugout CLI
 *
 * Usage:
 *   npx tsx apps/cli/src/index.ts                 # interactive
 *   npx tsx apps/cli/src/index.ts "aaron judge"   # one lookup
 */

import 'dotenv/config';
import * as readline from 'readline';
import { loadConfig } from '@dugout/config';
import { createPipeline } from '@dugout/enrichment';
import { runInteractive, runLookup } from './session.js';

async function main(): Promise<void> {
    const config = loadConfig();
    const { pipeline } = createPipeline(config);

    const query = process.argv.slice(2).join(' ').trim();
    if (query) {
        const result = await runLookup(pipeline, query, text => console.log(text));
        if (result.status === 'not_found') {
            process.exitCode = 1;
        }
        return;
    }

    const rl = readline.createInterface({ input: process.stdin, terminal: false });
    const lines = rl[Symbol.asyncIterator]();

    try {
        await runInteractive(pipeline, {
            ask: async question => {
                process.stdout.write(question);
                const next = await lines.next();
                return next.done ? null : next.value;
            },
            print: text => console.log(text),
        });
    } finally {
        rl.close();
    }
}

main().catch(error => {
    console.error('[dugout] Fatal:', error);
    process.exitCode = 1;
});
