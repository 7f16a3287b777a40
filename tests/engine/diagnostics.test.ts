import { describe, it, expect } from 'vitest';
import {
    DiagnosticsRecorder,
    parseDiagnosticsJsonl,
    DIAGNOSTICS_FORMAT_VERSION
} from '../../src/engine/diagnostics.js';
import { createEmptyComponents } from '../../src/engine/scoring.js';
import { EVALUATOR_TABLES } from '../../src/data/schemas/index.js';
import type { DiagnosticsEntry } from '../../src/engine/types.js';

function createEntry(tick: number, overrides: Partial<DiagnosticsEntry> = {}): DiagnosticsEntry {
    return {
        tick,
        selectedActionId: 'expand_industry',
        fallback: false,
        anomaly: false,
        components: { ...createEmptyComponents(), economic_lead: -0.25 },
        weights: { ...EVALUATOR_TABLES.base_weights },
        detectedArchetypes: [],
        candidateScores: { expand_industry: 0.2, fortify_borders: 0.1 },
        issues: [],
        ...overrides
    };
}

describe('DiagnosticsRecorder', () => {
    it('keeps at most capacity entries, oldest first', () => {
        const recorder = new DiagnosticsRecorder(3);
        for (let tick = 0; tick < 5; tick++) {
            recorder.record(createEntry(tick));
        }

        expect(recorder.size).toBe(3);
        expect(recorder.capacity).toBe(3);
        expect(recorder.entries().map(entry => entry.tick)).toEqual([2, 3, 4]);
        expect(recorder.latest()?.tick).toBe(4);
    });

    it('returns null as latest when empty', () => {
        expect(new DiagnosticsRecorder(2).latest()).toBeNull();
    });

    it('rejects a capacity below one or fractional', () => {
        expect(() => new DiagnosticsRecorder(0)).toThrow('Diagnostics capacity must be a positive integer, got 0');
        expect(() => new DiagnosticsRecorder(1.5)).toThrow(RangeError);
    });

    it('stores a frozen copy of each entry', () => {
        const recorder = new DiagnosticsRecorder(2);
        const entry = createEntry(7, {
            issues: [{ kind: 'malformed-input', field: 'alloy_density', message: 'alloy_density: clamped' }]
        });

        recorder.record(entry);
        entry.selectedActionId = 'changed';
        entry.components.economic_lead = 1;

        const stored = recorder.entries()[0];
        expect(stored.selectedActionId).toBe('expand_industry');
        expect(stored.components.economic_lead).toBe(-0.25);
        expect(Object.isFrozen(stored)).toBe(true);
        expect(Object.isFrozen(stored.components)).toBe(true);
        expect(Object.isFrozen(stored.issues)).toBe(true);
        expect(Object.isFrozen(stored.issues[0])).toBe(true);
    });

    it('hands out a copy of the history', () => {
        const recorder = new DiagnosticsRecorder(2);
        recorder.record(createEntry(0));

        recorder.entries().push(createEntry(1));

        expect(recorder.size).toBe(1);
    });

    it('clears the history', () => {
        const recorder = new DiagnosticsRecorder(2);
        recorder.record(createEntry(0));
        recorder.clear();

        expect(recorder.size).toBe(0);
        expect(recorder.entries()).toEqual([]);
    });
});

describe('JSONL export', () => {
    it('writes a meta line followed by one line per entry', () => {
        const recorder = new DiagnosticsRecorder(5);
        recorder.record(createEntry(3));
        recorder.record(createEntry(4, { fallback: true, selectedActionId: 'hold' }));

        const lines = recorder.toJsonl().split('\n');
        expect(lines).toHaveLength(3);

        const meta = JSON.parse(lines[0]);
        expect(meta._meta).toBe(true);
        expect(meta.version).toBe(DIAGNOSTICS_FORMAT_VERSION);
        expect(meta.capacity).toBe(5);
        expect(meta.size).toBe(2);
        expect(meta.firstTick).toBe(3);
        expect(meta.lastTick).toBe(4);

        expect(JSON.parse(lines[2]).selectedActionId).toBe('hold');
    });

    it('writes only the meta line for an empty history', () => {
        const lines = new DiagnosticsRecorder(5).toJsonl().split('\n');

        expect(lines).toHaveLength(1);
        expect(JSON.parse(lines[0]).firstTick).toBeNull();
    });

    it('parses its own export', () => {
        const recorder = new DiagnosticsRecorder(5);
        recorder.record(createEntry(0));
        recorder.record(createEntry(1, { detectedArchetypes: ['aggressive_confidence'] }));

        const parsed = parseDiagnosticsJsonl(recorder.toJsonl());

        expect(parsed.meta.size).toBe(2);
        expect(parsed.entries).toEqual(recorder.entries());
    });
});

describe('parseDiagnosticsJsonl', () => {
    const metaLine = JSON.stringify({
        _meta: true,
        version: '1.0.0',
        capacity: 2,
        size: 1,
        firstTick: 0,
        lastTick: 0,
        recordedAt: '2026-01-01T00:00:00.000Z'
    });

    it('rejects an empty file', () => {
        expect(() => parseDiagnosticsJsonl('\n\n')).toThrow('Diagnostics log is empty');
    });

    it('rejects a missing meta line', () => {
        expect(() => parseDiagnosticsJsonl(JSON.stringify(createEntry(0)))).toThrow(/^Line 1: invalid meta line/);
    });

    it('reports the line of invalid JSON', () => {
        expect(() => parseDiagnosticsJsonl(`${metaLine}\n{not json`)).toThrow(/^Line 2: invalid JSON/);
    });

    it('reports the line of an invalid entry', () => {
        const entry = { ...createEntry(0), selectedActionId: 42 };
        expect(() => parseDiagnosticsJsonl(`${metaLine}\n\n${JSON.stringify(entry)}`))
            .toThrow(/^Line 3: invalid diagnostics entry/);
    });
});
