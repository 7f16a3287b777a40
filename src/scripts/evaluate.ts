#!/usr/bin/env node
/**
 * Evaluate - run the strategy AI evaluator over recorded observations or a
 * save file and print one line per tick.
 */

import { parseArgs, printHelp, type CliArgs } from './cli.js';
import { runEvaluation } from './evaluate_runner.js';

async function main(): Promise<void> {
    let args: CliArgs;
    try {
        args = parseArgs(process.argv.slice(2));
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        printHelp();
        process.exit(1);
    }

    if (args.help) {
        printHelp();
        return;
    }

    const run = await runEvaluation(args);
    for (const line of run.lines) {
        console.log(line);
    }

    if (args.export) {
        console.log(`[Evaluate] Exported ${run.session.diagnostics.size} diagnostics entries to ${args.export}`);
    }
}

main().catch((err) => {
    console.error('Unexpected error:', err);
    process.exit(1);
});
