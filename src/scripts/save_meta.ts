/**
 * Save Meta Extraction
 *
 * Derives an observation payload from save files using keyword and counter
 * heuristics. Saves are plain text or zip archives holding a `gamestate`
 * (or at least a `meta`) entry. The economy split is coarse: the enemy
 * aggregate is assumed 15% larger than ours.
 */

import { strFromU8, unzipSync } from 'fflate';
import type { Observation } from '../engine/types.js';

export type SaveFlag = 'bio_ascension' | 'machine_age_virtuality' | 'shattered_ring_origin';

const FLAG_PATTERNS: Record<SaveFlag, RegExp[]> = {
    bio_ascension: [/ap_engineered_evolution/, /ap_evolutionary_mastery/],
    machine_age_virtuality: [/virtuality/, /machine_age/],
    shattered_ring_origin: [/origin_shattered_ring/]
};

const POPS_PER_PLANET = 40;
const POPS_PER_CAPACITY_SLOT = 28;
const ENERGY_ECONOMY_SHARE = 0.35;
const ALLOY_ECONOMY_SHARE = 0.65;
const ENEMY_ECONOMY_FACTOR = 1.15;

// Confidence assigned when a news keyword is present
const NEWS_SIGNAL_CONFIDENCE = 0.65;

export type SaveObservation = Omit<Observation, 'steam_meta_signals'>;

// Archive entries holding save text, in order of preference
export const SAVE_ARCHIVE_ENTRIES = ['gamestate', 'meta'] as const;

/**
 * True for bytes starting with a zip local-file or end-of-central-directory
 * signature.
 */
export function isZipArchive(bytes: Uint8Array): boolean {
    return bytes.length >= 4
        && bytes[0] === 0x50
        && bytes[1] === 0x4b
        && ((bytes[2] === 0x03 && bytes[3] === 0x04) || (bytes[2] === 0x05 && bytes[3] === 0x06));
}

/**
 * Decode save bytes to text, unpacking zip archives.
 *
 * @throws Error if an archive is corrupt or holds no save entry
 */
export function decodeSaveBytes(bytes: Uint8Array): string {
    if (!isZipArchive(bytes)) {
        return strFromU8(bytes);
    }

    let entries: Record<string, Uint8Array>;
    try {
        entries = unzipSync(bytes, {
            filter: file => SAVE_ARCHIVE_ENTRIES.some(name => name === file.name)
        });
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid save archive: ${reason}`);
    }

    for (const name of SAVE_ARCHIVE_ENTRIES) {
        const entry = entries[name];
        if (entry !== undefined) {
            return strFromU8(entry);
        }
    }
    throw new Error(`Save archive has no ${SAVE_ARCHIVE_ENTRIES.map(name => `"${name}"`).join(' or ')} entry`);
}

export function ratio(numerator: number, denominator: number): number {
    if (denominator <= 0) return 0;
    return Math.max(0, Math.min(1, numerator / denominator));
}

function sumMatches(text: string, pattern: RegExp): number {
    let total = 0;
    for (const match of text.matchAll(pattern)) {
        const value = Number(match[1]);
        if (Number.isFinite(value)) {
            total += value;
        }
    }
    return total;
}

export function extractSaveMeta(text: string): SaveObservation {
    const lower = text.toLowerCase();

    const hasAny = (flag: SaveFlag): boolean => FLAG_PATTERNS[flag].some(pattern => pattern.test(lower));

    const pops = sumMatches(lower, /\bnum_pops\s*=\s*(\d+)/g);
    const planets = sumMatches(lower, /\bnum_planets\s*=\s*(\d+)/g);
    const alloys = sumMatches(lower, /\balloys\s*=\s*(-?\d+(?:\.\d+)?)/g);
    const energy = sumMatches(lower, /\benergy\s*=\s*(-?\d+(?:\.\d+)?)/g);

    const ours = Math.max(1, energy * ENERGY_ECONOMY_SHARE + alloys * ALLOY_ECONOMY_SHARE);

    return {
        our_total_economy: ours,
        enemy_total_economy: Math.max(1, ours * ENEMY_ECONOMY_FACTOR),
        pop_growth_pressure: ratio(pops, Math.max(1, planets * POPS_PER_PLANET)),
        planet_capacity_pressure: ratio(planets, Math.max(1, pops ? pops / POPS_PER_CAPACITY_SLOT : 1)),
        alloy_density: ratio(alloys, Math.max(1, energy + alloys)),
        bio_ascension: hasAny('bio_ascension'),
        machine_age_virtuality: hasAny('machine_age_virtuality'),
        shattered_ring_origin: hasAny('shattered_ring_origin')
    };
}

/**
 * Archetype confidences from a block of patch notes or news text.
 */
export function inferMetaSignals(newsText: string): Record<string, number> {
    const blob = newsText.toLowerCase();
    return {
        bio_rush_confidence: blob.includes('bio') || blob.includes('genesis') ? NEWS_SIGNAL_CONFIDENCE : 0,
        virtuality_confidence: blob.includes('machine') || blob.includes('virtual') ? NEWS_SIGNAL_CONFIDENCE : 0
    };
}
