// colorAnalyzer.ts
import WCAGContrast from 'wcag-contrast';
import type { AnalyzerSettings } from './config.js';
import { rankColorCounts } from './colorRanking.js';
import { packRgb, regionMoments, rgbToHex, type GrayImage } from './rasterStats.js';
import type { ColorProfile, RasterImage } from './types.js';

export function countColors(image: RasterImage): Map<number, number> {
    const counts = new Map<number, number>();
    const { data } = image;
    for (let p = 0; p < data.length; p += 3) {
        const key = packRgb(data[p], data[p + 1], data[p + 2]);
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return counts;
}

export function analyzeColors(
    image: RasterImage,
    gray: GrayImage,
    settings: Pick<AnalyzerSettings, 'maxDominantColors'>
): ColorProfile {
    const counts = countColors(image);
    const ranked = rankColorCounts(counts, settings.maxDominantColors);

    // WCAG ratio between the background (most frequent) and the runner-up colour.
    let dominantContrastRatio: number | null = null;
    if (ranked.length >= 2) {
        const [bg, fg] = [ranked[0].color, ranked[1].color];
        const ratio = WCAGContrast.hex(rgbToHex(...fg), rgbToHex(...bg));
        dominantContrastRatio = Math.round(ratio * 100) / 100;
    }

    return {
        dominant_colors: ranked.map(entry => entry.color),
        contrast_score: regionMoments(gray).std,
        color_diversity: counts.size,
        dominant_contrast_ratio: dominantContrastRatio,
    };
}
