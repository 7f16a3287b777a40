/**
 * CLI argument parsing for the evaluate tool.
 */

// ============================================================================
// Type Definitions
// ============================================================================

export interface CliArgs {
    // Observation sources (one is required)
    input: string | null;
    save: string | null;
    news: string | null;
    fetchNews: boolean;
    config: string | null;
    // Overrides diagnostics.history_capacity from the config file
    history: number | null;
    export: string | null;
    quiet: boolean;
    help: boolean;
}

// ============================================================================
// Argument Parser
// ============================================================================

/**
 * Parse command line arguments into a CliArgs object.
 *
 * @param argv - Command line arguments (without node and script path)
 * @throws Error if invalid arguments are provided
 */
export function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        input: null,
        save: null,
        news: null,
        fetchNews: false,
        config: null,
        history: null,
        export: null,
        quiet: false,
        help: false
    };

    let i = 0;
    while (i < argv.length) {
        const arg = argv[i];

        switch (arg) {
            // File arguments
            case '--input':
                args.input = requireStringValue(argv, i, '--input');
                i += 2;
                break;

            case '--save':
                args.save = requireStringValue(argv, i, '--save');
                i += 2;
                break;

            case '--news':
                args.news = requireStringValue(argv, i, '--news');
                i += 2;
                break;

            case '--fetch-news':
                args.fetchNews = true;
                i += 1;
                break;

            case '--config':
                args.config = requireStringValue(argv, i, '--config');
                i += 2;
                break;

            case '--export':
                args.export = requireStringValue(argv, i, '--export');
                i += 2;
                break;

            // Evaluation arguments
            case '--history':
                args.history = requireNumberValue(argv, i, '--history');
                if (args.history < 1) {
                    throw new Error(`--history must be at least 1, got ${args.history}`);
                }
                i += 2;
                break;

            case '--quiet':
                args.quiet = true;
                i += 1;
                break;

            case '--help':
                args.help = true;
                i += 1;
                break;

            default:
                throw new Error(`Unknown argument: ${arg}`);
        }
    }

    if (!args.help) {
        if (args.input && args.save) {
            throw new Error('--input and --save cannot be combined');
        }
        if (!args.input && !args.save) {
            throw new Error('One of --input or --save is required');
        }
        if (args.news && !args.save) {
            throw new Error('--news requires --save');
        }
        if (args.fetchNews && !args.save) {
            throw new Error('--fetch-news requires --save');
        }
        if (args.fetchNews && args.news) {
            throw new Error('--news and --fetch-news cannot be combined');
        }
    }

    return args;
}

/**
 * Get required string value for an argument.
 */
function requireStringValue(argv: string[], index: number, argName: string): string {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value for ${argName}`);
    }
    return value;
}

/**
 * Get required integer value for an argument.
 */
function requireNumberValue(argv: string[], index: number, argName: string): number {
    const str = requireStringValue(argv, index, argName);
    const num = Number(str);
    if (!Number.isInteger(num)) {
        throw new Error(`Invalid number for ${argName}: ${str}`);
    }
    return num;
}

// ============================================================================
// Help
// ============================================================================

/**
 * Print usage help to console.
 */
export function printHelp(): void {
    console.log(`
Evaluate - strategy AI decision evaluator

USAGE:
  npm run evaluate -- [OPTIONS]

INPUT OPTIONS:
  --input <file>          Observations as a JSON object, JSON array or JSONL
  --save <file>           Derive a single observation from a save (text or zip)
  --news <file>           With --save: infer opponent archetypes from news text
  --fetch-news            With --save: infer opponent archetypes from the live news feed
  --config <file>         Configuration JSON (defaults when omitted)

OUTPUT OPTIONS:
  --history <n>           Diagnostics history capacity
  --export <file>         Export the diagnostics history to JSONL
  --quiet                 Only print the selected action per tick

EXAMPLES:
  # Evaluate a recorded sequence of observations
  npm run evaluate -- --input ticks.jsonl --config ai.json

  # Evaluate a save and keep the diagnostics
  npm run evaluate -- --save autosave.sav --export history.jsonl

  # Evaluate a save against the current patch news
  npm run evaluate -- --save autosave.sav --fetch-news
`);
}
