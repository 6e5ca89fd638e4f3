/**
 * Analyzer - aggregate statistics over a prompt collection
 */

import { STATS_PREVIEW_CHARS } from './config';
import { AnalysisReport, PromptCollection } from './prompt_types';

/** Length in Unicode code points, so astral characters count once. */
export function charLength(text: string): number {
    return Array.from(text).length;
}

export function preview(text: string, limit: number): string {
    const chars = Array.from(text);
    return chars.length > limit ? chars.slice(0, limit).join('') + '...' : text;
}

/**
 * Single pass in collection order. An empty collection reports zeros
 * throughout. On ties the first longest/shortest entry wins.
 */
export function analyze(collection: PromptCollection): AnalysisReport {
    const categories = new Map<string, number>();
    let totalEntries = 0;
    let sum = 0;
    let min = 0;
    let max = 0;
    let longest = '';
    let shortest = '';

    for (const [name, entries] of collection) {
        categories.set(name, entries.length);
        for (const entry of entries) {
            const len = charLength(entry.text);
            if (totalEntries === 0 || len > max) {
                max = len;
                longest = entry.text;
            }
            if (totalEntries === 0 || len < min) {
                min = len;
                shortest = entry.text;
            }
            sum += len;
            totalEntries++;
        }
    }

    return {
        totalEntries,
        categoryCount: collection.size,
        categories,
        length: {
            min,
            max,
            mean: totalEntries === 0 ? 0 : sum / totalEntries,
        },
        longestPreview: preview(longest, STATS_PREVIEW_CHARS),
        shortestPreview: preview(shortest, STATS_PREVIEW_CHARS),
    };
}
