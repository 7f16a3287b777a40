/**
 * News Feed
 *
 * Fetches recent patch news for the game and turns it into archetype
 * confidences. Best effort: any failure yields zero confidences.
 */

import { z } from 'zod';
import type { EvaluatorLogger } from '../engine/session.js';
import { inferMetaSignals } from './save_meta.js';

export const NEWS_FEED_URL = 'https://api.steampowered.com/ISteamNews/GetNewsForApp/v0002/?' + new URLSearchParams({
    appid: '281990',
    count: '5',
    maxlength: '500',
    format: 'json'
}).toString();

const USER_AGENT = 'strat-ai-evaluator/0.1';
const DEFAULT_TIMEOUT_MS = 5000;

export interface NewsResponse {
    ok: boolean;
    status: number;
    json(): Promise<unknown>;
}

export type NewsFetcher = (
    url: string,
    init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<NewsResponse>;

export interface NewsFeedOptions {
    fetcher?: NewsFetcher;
    timeoutMs?: number;
    logger?: EvaluatorLogger;
}

const NewsItemSchema = z.object({
    title: z.string().optional(),
    contents: z.string().optional()
});

const NewsPayloadSchema = z.object({
    appnews: z.object({
        newsitems: z.array(NewsItemSchema).default([])
    }).default({})
});

export const ZERO_NEWS_SIGNALS: Readonly<Record<string, number>> = Object.freeze({
    bio_rush_confidence: 0,
    virtuality_confidence: 0
});

/**
 * Title and body of every news item, joined into one blob.
 */
export function newsText(payload: unknown): string {
    const { appnews } = NewsPayloadSchema.parse(payload);
    return appnews.newsitems
        .map(item => `${item.title ?? ''} ${item.contents ?? ''}`)
        .join(' ');
}

export async function fetchNewsSignals(options: NewsFeedOptions = {}): Promise<Record<string, number>> {
    const { fetcher = fetch, timeoutMs = DEFAULT_TIMEOUT_MS, logger = console } = options;

    try {
        const response = await fetcher(NEWS_FEED_URL, {
            headers: { 'User-Agent': USER_AGENT },
            signal: AbortSignal.timeout(timeoutMs)
        });
        if (!response.ok) {
            throw new Error(`HTTP ${response.status}`);
        }
        return inferMetaSignals(newsText(await response.json()));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn(`[News] Fetch failed (${reason}); using zero confidences`);
        return { ...ZERO_NEWS_SIGNALS };
    }
}
