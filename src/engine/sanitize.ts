/**
 * Lenient field readers for external payloads.
 *
 * Each read validates one field with zod. A missing field yields the
 * fallback silently; a wrongly typed field yields the fallback and an
 * issue; an out-of-range number is clamped and reported.
 */

import { z } from 'zod';
import type { EvaluationIssue, EvaluationIssueKind } from './types.js';

const FiniteNumberSchema = z.number().finite();
const BooleanSchema = z.boolean();

export interface NumberFieldOptions {
    min?: number;
    max?: number;
    integer?: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

export class FieldReader {
    constructor(
        private readonly source: Record<string, unknown>,
        private readonly issues: EvaluationIssue[],
        private readonly issueKind: EvaluationIssueKind,
        private readonly prefix: string = ''
    ) { }

    number(key: string, fallback: number, options: NumberFieldOptions = {}): number {
        const raw = this.source[key];
        if (raw === undefined) return fallback;

        const parsed = FiniteNumberSchema.safeParse(raw);
        if (!parsed.success) {
            this.report(key, `expected a finite number, received ${describeValue(raw)}; using default ${fallback}`);
            return fallback;
        }

        let value = parsed.data;
        if (options.integer && !Number.isInteger(value)) {
            const rounded = Math.round(value);
            this.report(key, `${value} is not an integer; rounded to ${rounded}`);
            value = rounded;
        }

        const min = options.min ?? -Infinity;
        const max = options.max ?? Infinity;
        const clamped = clamp(value, min, max);
        if (clamped !== value) {
            this.report(key, `${value} is outside [${min}, ${max}]; clamped to ${clamped}`);
        }
        return clamped;
    }

    boolean(key: string, fallback: boolean): boolean {
        const raw = this.source[key];
        if (raw === undefined) return fallback;

        const parsed = BooleanSchema.safeParse(raw);
        if (!parsed.success) {
            this.report(key, `expected a boolean, received ${describeValue(raw)}; using default ${fallback}`);
            return fallback;
        }
        return parsed.data;
    }

    oneOf<T extends string>(key: string, schema: z.ZodType<T>, fallback: T): T {
        const raw = this.source[key];
        if (raw === undefined) return fallback;

        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            const received = typeof raw === 'string' ? `"${raw}"` : describeValue(raw);
            this.report(key, `unsupported value ${received}; using default "${fallback}"`);
            return fallback;
        }
        return parsed.data;
    }

    /**
     * Reader over a nested object. A missing or malformed nested object
     * yields an empty reader so every field below takes its default.
     */
    nested(key: string): FieldReader {
        const raw = this.source[key];
        const path = this.path(key);
        if (raw !== undefined && !isRecord(raw)) {
            this.report(key, `expected an object, received ${describeValue(raw)}; using defaults`);
        }
        return new FieldReader(isRecord(raw) ? raw : {}, this.issues, this.issueKind, path);
    }

    entries(): [string, unknown][] {
        return Object.entries(this.source);
    }

    report(key: string, message: string): void {
        const field = this.path(key);
        this.issues.push({ kind: this.issueKind, field, message: `${field}: ${message}` });
    }

    private path(key: string): string {
        return this.prefix ? `${this.prefix}.${key}` : key;
    }
}
