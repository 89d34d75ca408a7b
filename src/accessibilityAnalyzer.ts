// accessibilityAnalyzer.ts
import type { AnalyzerSettings } from './config.js';
import { regionMoments, type GrayImage } from './rasterStats.js';
import type { AccessibilityProfile, LowContrastArea } from './types.js';

type BlockSettings = Pick<AnalyzerSettings, 'blockSize' | 'lowContrastBlockStd' | 'maxLowContrastAreasReported'>;

/**
 * Row-major scan of whole blocks only; a partial block at the right or
 * bottom edge is skipped.
 */
export function findLowContrastBlocks(gray: GrayImage, settings: BlockSettings): LowContrastArea[] {
    const { blockSize } = settings;
    const areas: LowContrastArea[] = [];

    for (let y = 0; y + blockSize <= gray.height; y += blockSize) {
        for (let x = 0; x + blockSize <= gray.width; x += blockSize) {
            const { std } = regionMoments(gray, x, y, blockSize, blockSize);
            if (std < settings.lowContrastBlockStd) {
                areas.push({ position: { x, y }, contrast_score: std });
            }
        }
    }
    return areas;
}

export function analyzeAccessibility(gray: GrayImage, settings: BlockSettings): AccessibilityProfile {
    const lowContrast = findLowContrastBlocks(gray, settings);
    return {
        overall_contrast_variance: regionMoments(gray).variance,
        low_contrast_areas_count: lowContrast.length,
        low_contrast_areas: lowContrast.slice(0, settings.maxLowContrastAreasReported),
    };
}
