// elementDetector.ts
import type { AnalyzerSettings } from './config.js';
import { findExternalContours } from './contourTracing.js';
import type { EdgeMap } from './edgeDetection.js';
import type { ElementDetection, ElementType, UIElement } from './types.js';

/**
 * Shape heuristic over a contour's bounding box. `area` is the contour's own
 * area, which is usually smaller than width × height. First match wins.
 */
export function classifyElement(width: number, height: number, area: number): ElementType {
    const aspectRatio = height > 0 ? width / height : 0;

    if (width < 50 && height < 50) return 'icon';
    if (aspectRatio > 3) return 'text_field';
    if (aspectRatio < 0.5) return 'vertical_element';
    if (aspectRatio >= 0.8 && aspectRatio <= 1.2 && area < 5000) return 'button';
    if (area > 10000) return 'container';
    return 'generic_element';
}

export function detectElements(
    edges: EdgeMap,
    settings: Pick<AnalyzerSettings, 'minElementArea' | 'maxElementsReported'>
): ElementDetection {
    const elements: UIElement[] = [];

    for (const contour of findExternalContours(edges)) {
        if (contour.area <= settings.minElementArea) continue;
        const { x, y, width, height } = contour.boundingBox;
        elements.push({
            type: classifyElement(width, height, contour.area),
            position: { x, y },
            dimensions: { width, height },
            area: width * height,
        });
    }

    return {
        total_elements: elements.length,
        elements: elements.slice(0, settings.maxElementsReported),
    };
}
