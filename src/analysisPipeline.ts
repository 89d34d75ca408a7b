// analysisPipeline.ts
import { analyzeAccessibility } from './accessibilityAnalyzer.js';
import { analyzeColors } from './colorAnalyzer.js';
import type { PipelineConfig } from './config.js';
import { detectEdges } from './edgeDetection.js';
import { detectElements } from './elementDetector.js';
import { decodeImagePayload } from './imageDecoder.js';
import { analyzeLayout } from './layoutAnalyzer.js';
import { toGrayscale } from './rasterStats.js';
import { generateRecommendations } from './recommendationEngine.js';
import type { TextRecognizer } from './textAnalyzer.js';
import { analyzeText } from './textAnalyzer.js';
import type { AnalysisResult, RasterImage } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Pipeline');

export type PipelineDeps = {
    config: PipelineConfig;
    recognizer: TextRecognizer;
};

/**
 * Runs every analyzer over one decoded raster, then the recommendation rules.
 * The raster, grayscale copy and edge map are shared read-only.
 */
export async function analyzeRaster(image: RasterImage, deps: PipelineDeps): Promise<AnalysisResult> {
    const { config, recognizer } = deps;
    const settings = config.analyzers;
    const startedAt = Date.now();

    const gray = toGrayscale(image);
    const edges = detectEdges(gray, { low: settings.edgeLowThreshold, high: settings.edgeHighThreshold });

    const [colorAnalysis, elementDetection, textAnalysis, layoutAnalysis, accessibilityAnalysis] = await Promise.all([
        Promise.resolve(analyzeColors(image, gray, settings)),
        Promise.resolve(detectElements(edges, settings)),
        analyzeText(image, recognizer, settings, config.ocrTimeoutMs),
        Promise.resolve(analyzeLayout(edges)),
        Promise.resolve(analyzeAccessibility(gray, settings)),
    ]);

    const sections = {
        color_analysis: colorAnalysis,
        element_detection: elementDetection,
        text_analysis: textAnalysis,
        layout_analysis: layoutAnalysis,
        accessibility_analysis: accessibilityAnalysis,
    };
    const recommendations = generateRecommendations(sections, config.profile);

    log.info(
        `[${config.profileName}] ${image.width}x${image.height}: ` +
        `${elementDetection.total_elements} elements, ${textAnalysis.text_elements_count} words, ` +
        `${recommendations.length} recommendations in ${Date.now() - startedAt}ms`
    );

    return {
        timestamp: new Date().toISOString(),
        image_dimensions: { width: image.width, height: image.height },
        profile: config.profileName,
        ...sections,
        recommendations,
    };
}

/** Decode → analyze. A bad payload rejects with DecodeError before any analyzer runs. */
export async function analyzeScreenshot(payload: string, deps: PipelineDeps): Promise<AnalysisResult> {
    const { maxImageDimension, maxImagePixels } = deps.config;
    const image = await decodeImagePayload(payload, { maxImageDimension, maxImagePixels });
    return analyzeRaster(image, deps);
}
