/**
 * State Loader
 *
 * Reads observation payloads, saves and configuration files from disk.
 * Payloads are returned unvalidated; the session sanitises them per tick.
 */

import fs from 'node:fs';
import path from 'node:path';
import { decodeSaveBytes } from './save_meta.js';

/**
 * Read a text file, resolving relative paths against the working directory.
 *
 * @throws Error if the file does not exist
 */
export function readTextFile(filePath: string): string {
    return fs.readFileSync(resolveExisting(filePath), 'utf8');
}

/**
 * Read a save file as text. Zip archives are unpacked.
 *
 * @throws Error if the file does not exist or is a broken archive
 */
export function readSaveFile(filePath: string): string {
    return decodeSaveBytes(fs.readFileSync(resolveExisting(filePath)));
}

function resolveExisting(filePath: string): string {
    const absPath = path.resolve(filePath);

    if (!fs.existsSync(absPath)) {
        throw new Error(`File not found: ${absPath}`);
    }

    return absPath;
}

/**
 * Split a payload into per-tick observations.
 *
 * Accepts a single JSON value, a JSON array (one element per tick) or JSONL
 * (one value per non-blank line).
 */
export function parseObservationPayload(content: string): unknown[] {
    const trimmed = content.trim();
    if (trimmed.length === 0) {
        return [];
    }

    let whole: unknown;
    try {
        whole = JSON.parse(trimmed);
    } catch {
        return parseJsonLines(trimmed);
    }
    return Array.isArray(whole) ? whole : [whole];
}

function parseJsonLines(content: string): unknown[] {
    const values: unknown[] = [];
    content.split('\n').forEach((line, index) => {
        const text = line.trim();
        if (text.length === 0) return;
        try {
            values.push(JSON.parse(text));
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new Error(`Line ${index + 1}: invalid JSON: ${reason}`);
        }
    });
    return values;
}

export function loadObservations(filePath: string): unknown[] {
    return parseObservationPayload(readTextFile(filePath));
}

/**
 * Load a raw configuration object. The session clamps and reports it.
 */
export function loadConfigurationFile(filePath: string): unknown {
    const content = readTextFile(filePath);
    try {
        return JSON.parse(content);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid configuration JSON in ${filePath}: ${reason}`);
    }
}

/**
 * Write a text file, creating parent directories as needed.
 */
export function writeTextFile(filePath: string, content: string): void {
    const absPath = path.resolve(filePath);
    const dir = path.dirname(absPath);

    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }

    fs.writeFileSync(absPath, content, 'utf8');
}
