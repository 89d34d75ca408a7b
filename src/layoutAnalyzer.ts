// layoutAnalyzer.ts
import type { EdgeMap } from './edgeDetection.js';
import type { LayoutProfile, ZoneName } from './types.js';

type Span = [start: number, end: number];

/** Thirds at floor(n/3) and floor(2n/3); the last span takes the remainder. */
export function thirds(n: number): [Span, Span, Span] {
    const a = Math.floor(n / 3);
    const b = Math.floor((2 * n) / 3);
    return [[0, a], [a, b], [b, n]];
}

export function zonePixelCounts(width: number, height: number): Record<ZoneName, number> {
    const [top, middle, bottom] = thirds(height);
    const [left, center, right] = thirds(width);
    return {
        top: (top[1] - top[0]) * width,
        middle: (middle[1] - middle[0]) * width,
        bottom: (bottom[1] - bottom[0]) * width,
        left: (left[1] - left[0]) * height,
        center: (center[1] - center[0]) * height,
        right: (right[1] - right[0]) * height,
    };
}

function countEdges(edges: EdgeMap, rows: Span, cols: Span): number {
    let count = 0;
    for (let y = rows[0]; y < rows[1]; y++) {
        const row = y * edges.width;
        for (let x = cols[0]; x < cols[1]; x++) {
            count += edges.data[row + x];
        }
    }
    return count;
}

// ── Edge density per zone: rows and columns are two separate partitions, not a 3x3 grid ──
export function analyzeLayout(edges: EdgeMap): LayoutProfile {
    const { width, height } = edges;
    const allRows: Span = [0, height];
    const allCols: Span = [0, width];
    const [top, middle, bottom] = thirds(height);
    const [left, center, right] = thirds(width);
    const sizes = zonePixelCounts(width, height);

    const spans: Record<ZoneName, [Span, Span]> = {
        top: [top, allCols],
        middle: [middle, allCols],
        bottom: [bottom, allCols],
        left: [allRows, left],
        center: [allRows, center],
        right: [allRows, right],
    };

    const density = (zone: ZoneName): number => {
        const [rows, cols] = spans[zone];
        return sizes[zone] > 0 ? countEdges(edges, rows, cols) / sizes[zone] : 0;
    };

    const total = width * height;
    return {
        image_dimensions: { width, height },
        zone_densities: {
            top: density('top'),
            middle: density('middle'),
            bottom: density('bottom'),
            left: density('left'),
            center: density('center'),
            right: density('right'),
        },
        overall_density: total > 0 ? edges.edgeCount / total : 0,
    };
}
