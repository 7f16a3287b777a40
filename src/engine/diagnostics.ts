/**
 * Diagnostics Recorder
 *
 * Bounded FIFO of per-tick decision records. Entries are frozen when
 * recorded; readers get them oldest-first through a read-only view.
 * Supports JSONL export for offline analysis.
 */

import { DiagnosticsEntrySchema, MetaLineSchema, type MetaLine } from './debug/schemas.js';
import type { DiagnosticsEntry } from './types.js';

export const DIAGNOSTICS_FORMAT_VERSION = '1.0.0';

/**
 * Read access to the recorder, handed out by the session.
 */
export interface DiagnosticsView {
    readonly capacity: number;
    readonly size: number;
    /** Oldest first */
    entries(): DiagnosticsEntry[];
    latest(): DiagnosticsEntry | null;
    toJsonl(): string;
}

function freezeEntry(entry: DiagnosticsEntry): DiagnosticsEntry {
    const copy: DiagnosticsEntry = {
        ...entry,
        components: { ...entry.components },
        weights: { ...entry.weights },
        detectedArchetypes: [...entry.detectedArchetypes],
        candidateScores: { ...entry.candidateScores },
        issues: entry.issues.map(issue => Object.freeze({ ...issue }))
    };
    Object.freeze(copy.components);
    Object.freeze(copy.weights);
    Object.freeze(copy.detectedArchetypes);
    Object.freeze(copy.candidateScores);
    Object.freeze(copy.issues);
    return Object.freeze(copy);
}

export class DiagnosticsRecorder implements DiagnosticsView {
    readonly capacity: number;
    private buffer: DiagnosticsEntry[] = [];

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Diagnostics capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    get size(): number {
        return this.buffer.length;
    }

    /**
     * Append an entry, evicting the oldest once capacity is exceeded.
     */
    record(entry: DiagnosticsEntry): void {
        this.buffer.push(freezeEntry(entry));
        while (this.buffer.length > this.capacity) {
            this.buffer.shift();
        }
    }

    entries(): DiagnosticsEntry[] {
        return [...this.buffer];
    }

    latest(): DiagnosticsEntry | null {
        return this.buffer[this.buffer.length - 1] ?? null;
    }

    clear(): void {
        this.buffer = [];
    }

    /**
     * Export to JSONL: meta line first, then one entry per line.
     */
    toJsonl(): string {
        const first = this.buffer[0];
        const last = this.latest();
        const meta: MetaLine = {
            _meta: true,
            version: DIAGNOSTICS_FORMAT_VERSION,
            capacity: this.capacity,
            size: this.buffer.length,
            firstTick: first ? first.tick : null,
            lastTick: last ? last.tick : null,
            recordedAt: new Date().toISOString()
        };

        const lines: string[] = [JSON.stringify(meta)];
        for (const entry of this.buffer) {
            lines.push(JSON.stringify(entry));
        }
        return lines.join('\n');
    }
}

export interface ParsedDiagnostics {
    meta: MetaLine;
    entries: DiagnosticsEntry[];
}

/**
 * Parse a file written by `toJsonl()`. Blank lines are skipped; any other
 * line that fails validation throws with its 1-based line number.
 */
export function parseDiagnosticsJsonl(text: string): ParsedDiagnostics {
    const lines = text.split('\n')
        .map((line, index) => ({ line: line.trim(), number: index + 1 }))
        .filter(({ line }) => line.length > 0);

    const header = lines[0];
    if (!header) {
        throw new Error('Diagnostics log is empty');
    }

    const meta = MetaLineSchema.safeParse(parseLine(header.line, header.number));
    if (!meta.success) {
        throw new Error(`Line ${header.number}: invalid meta line: ${meta.error.message}`);
    }

    const entries: DiagnosticsEntry[] = [];
    for (const { line, number } of lines.slice(1)) {
        const entry = DiagnosticsEntrySchema.safeParse(parseLine(line, number));
        if (!entry.success) {
            throw new Error(`Line ${number}: invalid diagnostics entry: ${entry.error.message}`);
        }
        entries.push(entry.data);
    }

    return { meta: meta.data, entries };
}

function parseLine(line: string, number: number): unknown {
    try {
        return JSON.parse(line);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`Line ${number}: invalid JSON: ${reason}`);
    }
}
