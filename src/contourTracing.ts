// contourTracing.ts
import type { EdgeMap } from './edgeDetection.js';

export type Point = { x: number; y: number };
export type BoundingBox = { x: number; y: number; width: number; height: number };

export type Contour = {
    /** Outer boundary, pixel centres, traced clockwise */
    points: Point[];
    boundingBox: BoundingBox;
    /** Shoelace area of `points` */
    area: number;
};

// Clockwise with y pointing down, starting east.
const DIRS: ReadonlyArray<readonly [number, number]> = [
    [1, 0], [1, 1], [0, 1], [-1, 1], [-1, 0], [-1, -1], [0, -1], [1, -1],
];
const WEST = 4;

function directionOf(dx: number, dy: number): number {
    return DIRS.findIndex(([x, y]) => x === dx && y === dy);
}

export function polygonArea(points: Point[]): number {
    let twice = 0;
    for (let i = 0, j = points.length - 1; i < points.length; j = i++) {
        twice += points[j].x * points[i].y - points[i].x * points[j].y;
    }
    return Math.abs(twice) / 2;
}

export function pointInPolygon(px: number, py: number, polygon: Point[]): boolean {
    let inside = false;
    for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
        const a = polygon[i];
        const b = polygon[j];
        if ((a.y > py) !== (b.y > py) && px < ((b.x - a.x) * (py - a.y)) / (b.y - a.y) + a.x) {
            inside = !inside;
        }
    }
    return inside;
}

/**
 * Moore-neighbour boundary trace. `start` must be the first pixel of its
 * component in raster order, so its west neighbour is background.
 * Stops when the trace is back on `start` about to repeat its first move.
 */
export function traceBoundary(edges: EdgeMap, start: Point, maxSteps: number): Point[] {
    const { width: w, height: h, data } = edges;
    const isEdge = (x: number, y: number) => x >= 0 && y >= 0 && x < w && y < h && data[y * w + x] === 1;

    const points: Point[] = [start];
    let cx = start.x;
    let cy = start.y;
    let back = WEST;
    let second: Point | null = null;

    for (let step = 0; step < maxSteps; step++) {
        let found = -1;
        for (let k = 1; k <= 8; k++) {
            const d = (back + k) % 8;
            if (isEdge(cx + DIRS[d][0], cy + DIRS[d][1])) {
                found = d;
                break;
            }
        }
        if (found === -1) break; // isolated pixel

        const nx = cx + DIRS[found][0];
        const ny = cy + DIRS[found][1];
        // The last background neighbour swept becomes the backtrack of the next pixel.
        const lastChecked = (found + 7) % 8;
        const bx = cx + DIRS[lastChecked][0];
        const by = cy + DIRS[lastChecked][1];

        if (second === null) {
            second = { x: nx, y: ny };
        } else if (cx === start.x && cy === start.y && nx === second.x && ny === second.y) {
            points.pop();
            break;
        }

        points.push({ x: nx, y: ny });
        cx = nx;
        cy = ny;
        back = directionOf(bx - nx, by - ny);
    }
    return points;
}

/**
 * External contours of the 8-connected edge components, in raster discovery
 * order. Components that start inside an earlier external contour are nested
 * and dropped.
 */
export function findExternalContours(edges: EdgeMap): Contour[] {
    const { width: w, height: h, data } = edges;
    const visited = new Uint8Array(w * h);
    const contours: Contour[] = [];

    for (let i = 0; i < data.length; i++) {
        if (data[i] !== 1 || visited[i] === 1) continue;

        const sx = i % w;
        const sy = (i - sx) / w;

        // Flood-fill the component for its extent and size.
        let minX = sx, maxX = sx, minY = sy, maxY = sy, size = 0;
        const stack = [i];
        visited[i] = 1;
        for (let p = stack.pop(); p !== undefined; p = stack.pop()) {
            size++;
            const px = p % w;
            const py = (p - px) / w;
            if (px < minX) minX = px;
            if (px > maxX) maxX = px;
            if (py < minY) minY = py;
            if (py > maxY) maxY = py;
            for (const [dx, dy] of DIRS) {
                const nx = px + dx;
                const ny = py + dy;
                if (nx < 0 || ny < 0 || nx >= w || ny >= h) continue;
                const n = ny * w + nx;
                if (data[n] === 1 && visited[n] === 0) {
                    visited[n] = 1;
                    stack.push(n);
                }
            }
        }

        const nested = contours.some(c => {
            const b = c.boundingBox;
            return sx >= b.x && sx < b.x + b.width && sy >= b.y && sy < b.y + b.height
                && pointInPolygon(sx, sy, c.points);
        });
        if (nested) continue;

        const points = traceBoundary(edges, { x: sx, y: sy }, 4 * size + 16);
        contours.push({
            points,
            boundingBox: { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 },
            area: polygonArea(points),
        });
    }
    return contours;
}
