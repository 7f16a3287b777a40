import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { strToU8, zipSync } from 'fflate';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseArgs } from '../../src/scripts/cli.js';
import {
    formatTickLine,
    runEvaluation,
    withHistoryCapacity
} from '../../src/scripts/evaluate_runner.js';
import { createSession } from '../../src/engine/session.js';
import { parseDiagnosticsJsonl } from '../../src/engine/diagnostics.js';
import { createRecordingLogger } from '../../src/engine/test-utils.js';

const SAVE_TEXT = 'country={ num_pops=20 num_planets=1 }\nresources={ energy=100 alloys=40 }';

describe('withHistoryCapacity', () => {
    it('leaves the configuration alone without an override', () => {
        const raw = { aggression_slider: 1.2 };
        expect(withHistoryCapacity(raw, null)).toBe(raw);
    });

    it('creates a configuration when none was loaded', () => {
        expect(withHistoryCapacity(undefined, 8)).toEqual({ diagnostics: { history_capacity: 8 } });
    });

    it('merges into an existing diagnostics section', () => {
        expect(withHistoryCapacity({ aggression_slider: 1.2, diagnostics: { history_capacity: 3 } }, 8)).toEqual({
            aggression_slider: 1.2,
            diagnostics: { history_capacity: 8 }
        });
    });

    it('keeps a malformed configuration so the session reports it', () => {
        expect(withHistoryCapacity('fast', 8)).toBe('fast');
    });
});

describe('formatTickLine', () => {
    it('prints tick and action in quiet mode', () => {
        const result = createSession().evaluate({ our_total_economy: 1000, enemy_total_economy: 2000, pop_growth_pressure: 0.9 });
        expect(formatTickLine(result, true)).toBe('0\teconomic_catch_up');
    });

    it('prints a JSON summary otherwise', () => {
        const result = createSession().evaluate({ our_total_economy: 1000, enemy_total_economy: 2000, pop_growth_pressure: 0.9 });
        const line = JSON.parse(formatTickLine(result, false));

        expect(line.tick).toBe(0);
        expect(line.selected).toBe('economic_catch_up');
        expect(line.doctrine).toBe('economic_catch_up');
        expect(line.fleet_policy).toBe('fleet_defensive_pickets');
        expect(line.issues).toEqual([]);
    });
});

describe('runEvaluation', () => {
    let tempDir: string;

    beforeAll(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'strat-ai-runner-'));
    });

    afterAll(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('evaluates every observation and exports the history', async () => {
        const input = path.join(tempDir, 'ticks.jsonl');
        const exportPath = path.join(tempDir, 'out', 'history.jsonl');
        fs.writeFileSync(input, [
            '{"our_total_economy": 1000, "enemy_total_economy": 2000, "pop_growth_pressure": 0.9}',
            '{"our_total_economy": 1000, "enemy_total_economy": 0}',
            '{"our_total_economy": 1000, "enemy_total_economy": 2000, "pop_growth_pressure": 0.9}'
        ].join('\n'));

        const run = await runEvaluation(
            parseArgs(['--input', input, '--history', '2', '--export', exportPath, '--quiet']),
            { logger: createRecordingLogger() }
        );

        expect(run.lines).toEqual(['0\teconomic_catch_up', '1\ttechnocratic', '2\teconomic_catch_up']);

        const exported = parseDiagnosticsJsonl(fs.readFileSync(exportPath, 'utf8'));
        expect(exported.meta.capacity).toBe(2);
        expect(exported.entries.map(entry => entry.tick)).toEqual([1, 2]);
    });

    it('applies the configuration file', async () => {
        const input = path.join(tempDir, 'aggressive.json');
        const config = path.join(tempDir, 'config.json');
        fs.writeFileSync(input, JSON.stringify({
            our_total_economy: 1000,
            enemy_total_economy: 2000,
            pop_growth_pressure: 0.9,
            steam_meta_signals: { aggressive_confidence: 0.8 }
        }));
        fs.writeFileSync(config, JSON.stringify({ aggression_slider: 2 }));

        const run = await runEvaluation(
            parseArgs(['--input', input, '--config', config, '--quiet']),
            { logger: createRecordingLogger() }
        );

        expect(run.lines).toEqual(['0\tdefensive_buildup']);
    });

    it('evaluates a save with news-derived archetypes', async () => {
        const save = path.join(tempDir, 'autosave.txt');
        const news = path.join(tempDir, 'news.txt');
        fs.writeFileSync(save, 'country={ num_pops=20 num_planets=1 }\nresources={ energy=100 alloys=40 }');
        fs.writeFileSync(news, 'Machine Age balance update');

        const run = await runEvaluation(parseArgs(['--save', save, '--news', news]), { logger: createRecordingLogger() });

        expect(run.lines).toHaveLength(1);
        const line = JSON.parse(run.lines[0]);
        expect(line.detected_archetypes).toEqual(['virtuality_confidence']);
        expect(line.issues).toEqual([]);
    });

    it('reads a zipped save like its plain-text gamestate', async () => {
        const text = path.join(tempDir, 'plain.txt');
        const archive = path.join(tempDir, 'zipped.sav');
        fs.writeFileSync(text, SAVE_TEXT);
        fs.writeFileSync(archive, zipSync({ meta: strToU8('version="4.0"'), gamestate: strToU8(SAVE_TEXT) }));

        const logger = createRecordingLogger();
        const fromText = await runEvaluation(parseArgs(['--save', text]), { logger });
        const fromArchive = await runEvaluation(parseArgs(['--save', archive]), { logger });

        expect(fromArchive.lines).toEqual(fromText.lines);
    });

    it('rejects an archive without a save entry', async () => {
        const archive = path.join(tempDir, 'empty.sav');
        fs.writeFileSync(archive, zipSync({ 'readme.txt': strToU8('nothing here') }));

        await expect(runEvaluation(parseArgs(['--save', archive]), { logger: createRecordingLogger() }))
            .rejects.toThrow('Save archive has no "gamestate" or "meta" entry');
    });

    it('takes archetypes from the fetched news feed', async () => {
        const save = path.join(tempDir, 'feed.txt');
        fs.writeFileSync(save, SAVE_TEXT);
        const fetcher = vi.fn(async () => ({
            ok: true,
            status: 200,
            json: async () => ({ appnews: { newsitems: [{ title: 'Genesis patch notes', contents: 'balance pass' }] } })
        }));

        const run = await runEvaluation(
            parseArgs(['--save', save, '--fetch-news']),
            { logger: createRecordingLogger(), fetcher }
        );

        expect(fetcher).toHaveBeenCalledTimes(1);
        expect(JSON.parse(run.lines[0]).detected_archetypes).toEqual(['bio_rush_confidence']);
    });

    it('evaluates with zero confidences when the news fetch fails', async () => {
        const save = path.join(tempDir, 'offline.txt');
        fs.writeFileSync(save, SAVE_TEXT);
        const logger = createRecordingLogger();

        const run = await runEvaluation(parseArgs(['--save', save, '--fetch-news']), {
            logger,
            fetcher: async () => {
                throw new Error('network unreachable');
            }
        });

        expect(JSON.parse(run.lines[0]).detected_archetypes).toEqual([]);
        expect(logger.warnings).toEqual(['[News] Fetch failed (network unreachable); using zero confidences']);
    });
});
