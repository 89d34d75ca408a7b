import { unpackRgb } from './rasterStats.js';
import type { RgbTriple } from './types.js';

export type RankedColor = { color: RgbTriple; count: number };

/** Most frequent first; equal counts fall back to ascending packed RGB. */
export function rankColorCounts(counts: Map<number, number>, limit: number): RankedColor[] {
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1] || a[0] - b[0])
        .slice(0, limit)
        .map(([packed, count]) => ({ color: unpackRgb(packed), count }));
}
