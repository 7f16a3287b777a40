/**
 * Evaluation runner used by the evaluate CLI.
 *
 * Loads the configuration and observations named by the CLI arguments, runs
 * one session over them and formats one output line per tick.
 */

import { createSession, type EvaluatorLogger, type EvaluatorSession } from '../engine/session.js';
import { isRecord } from '../engine/sanitize.js';
import type { TickResult } from '../engine/types.js';
import type { CliArgs } from './cli.js';
import { fetchNewsSignals, type NewsFetcher } from './news_feed.js';
import { extractSaveMeta, inferMetaSignals } from './save_meta.js';
import {
    loadConfigurationFile,
    loadObservations,
    readSaveFile,
    readTextFile,
    writeTextFile
} from './state_loader.js';

export interface EvaluationRun {
    session: EvaluatorSession;
    lines: string[];
}

export interface RunOptions {
    logger?: EvaluatorLogger;
    // Used by --fetch-news; the global fetch when omitted
    fetcher?: NewsFetcher;
}

/**
 * Apply the --history override on top of a raw configuration. A malformed
 * configuration is left as is so the session reports it.
 */
export function withHistoryCapacity(rawConfiguration: unknown, capacity: number | null): unknown {
    if (capacity === null) return rawConfiguration;
    if (rawConfiguration === undefined) {
        return { diagnostics: { history_capacity: capacity } };
    }
    if (!isRecord(rawConfiguration)) return rawConfiguration;

    const diagnostics = isRecord(rawConfiguration.diagnostics) ? rawConfiguration.diagnostics : {};
    return {
        ...rawConfiguration,
        diagnostics: { ...diagnostics, history_capacity: capacity }
    };
}

export async function collectObservations(args: CliArgs, options: RunOptions = {}): Promise<unknown[]> {
    if (args.input) {
        return loadObservations(args.input);
    }
    if (args.save) {
        const observation = extractSaveMeta(readSaveFile(args.save));
        const signals = await collectMetaSignals(args, options);
        return [{ ...observation, steam_meta_signals: signals }];
    }
    return [];
}

async function collectMetaSignals(args: CliArgs, options: RunOptions): Promise<Record<string, number>> {
    if (args.news) {
        return inferMetaSignals(readTextFile(args.news));
    }
    if (args.fetchNews) {
        return fetchNewsSignals({ fetcher: options.fetcher, logger: options.logger });
    }
    return {};
}

export function formatTickLine(result: TickResult, quiet: boolean): string {
    if (quiet) {
        return `${result.tick}\t${result.selectedActionId}`;
    }
    return JSON.stringify({
        tick: result.tick,
        selected: result.selectedActionId,
        fallback: result.fallback,
        anomaly: result.anomaly,
        doctrine: result.doctrine?.id ?? null,
        fleet_policy: result.fleetPolicy?.id ?? null,
        components: result.scoreComponents,
        weights: result.weights,
        detected_archetypes: result.detectedArchetypes,
        issues: result.issues
    });
}

export async function runEvaluation(args: CliArgs, options: RunOptions = {}): Promise<EvaluationRun> {
    const logger = options.logger ?? console;
    const rawConfiguration = args.config ? loadConfigurationFile(args.config) : undefined;
    const session = createSession(withHistoryCapacity(rawConfiguration, args.history), { logger });

    const observations = await collectObservations(args, { ...options, logger });
    const lines = observations.map(observation =>
        formatTickLine(session.evaluate(observation), args.quiet)
    );

    if (args.export) {
        writeTextFile(args.export, session.diagnostics.toJsonl());
    }

    return { session, lines };
}
