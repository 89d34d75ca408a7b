// edgeDetection.ts
import type { GrayImage } from './rasterStats.js';

export type EdgeMap = {
    readonly width: number;
    readonly height: number;
    /** 1 = edge pixel, 0 = background */
    readonly data: Uint8Array;
    readonly edgeCount: number;
};

export type EdgeThresholds = { low: number; high: number };

const TAN_22_5 = Math.tan(Math.PI / 8);
const TAN_67_5 = Math.tan((3 * Math.PI) / 8);

// ── Sobel 3x3, borders replicated, L1 magnitude ──
function sobelGradients(gray: GrayImage): { gx: Int32Array; gy: Int32Array; mag: Int32Array } {
    const { width: w, height: h, data } = gray;
    const gx = new Int32Array(w * h);
    const gy = new Int32Array(w * h);
    const mag = new Int32Array(w * h);

    for (let y = 0; y < h; y++) {
        const up = (y > 0 ? y - 1 : 0) * w;
        const row = y * w;
        const down = (y < h - 1 ? y + 1 : h - 1) * w;
        for (let x = 0; x < w; x++) {
            const l = x > 0 ? x - 1 : 0;
            const r = x < w - 1 ? x + 1 : w - 1;

            const dx =
                (data[up + r] + 2 * data[row + r] + data[down + r]) -
                (data[up + l] + 2 * data[row + l] + data[down + l]);
            const dy =
                (data[down + l] + 2 * data[down + x] + data[down + r]) -
                (data[up + l] + 2 * data[up + x] + data[up + r]);

            const i = row + x;
            gx[i] = dx;
            gy[i] = dy;
            mag[i] = Math.abs(dx) + Math.abs(dy);
        }
    }
    return { gx, gy, mag };
}

/**
 * Canny-style edge map: Sobel gradients, non-maximum suppression along the
 * quantized gradient direction, then hysteresis between `low` and `high`.
 */
export function detectEdges(gray: GrayImage, thresholds: EdgeThresholds): EdgeMap {
    const { width: w, height: h } = gray;
    const { gx, gy, mag } = sobelGradients(gray);
    const at = (x: number, y: number) => (x < 0 || y < 0 || x >= w || y >= h ? 0 : mag[y * w + x]);

    // 0 = suppressed, 1 = weak candidate, 2 = strong
    const state = new Uint8Array(w * h);
    const strong: number[] = [];

    for (let y = 0; y < h; y++) {
        for (let x = 0; x < w; x++) {
            const i = y * w + x;
            const m = mag[i];
            if (m <= thresholds.low) continue;

            const ax = Math.abs(gx[i]);
            const ay = Math.abs(gy[i]);
            let prev: number;
            let next: number;
            if (ay <= ax * TAN_22_5) {
                prev = at(x - 1, y);
                next = at(x + 1, y);
            } else if (ay > ax * TAN_67_5) {
                prev = at(x, y - 1);
                next = at(x, y + 1);
            } else if ((gx[i] < 0) !== (gy[i] < 0)) {
                prev = at(x + 1, y - 1);
                next = at(x - 1, y + 1);
            } else {
                prev = at(x - 1, y - 1);
                next = at(x + 1, y + 1);
            }
            // Ties go to the first pixel along the gradient so plateaus stay one pixel wide.
            if (!(m > prev && m >= next)) continue;

            if (m > thresholds.high) {
                state[i] = 2;
                strong.push(i);
            } else {
                state[i] = 1;
            }
        }
    }

    // Hysteresis: promote weak pixels 8-connected to a strong one.
    const stack = strong;
    for (let i = stack.pop(); i !== undefined; i = stack.pop()) {
        const x = i % w;
        const y = (i - x) / w;
        for (let dy = -1; dy <= 1; dy++) {
            for (let dx = -1; dx <= 1; dx++) {
                const nx = x + dx;
                const ny = y + dy;
                if (nx < 0 || ny < 0 || nx >= w || ny >= h) continue;
                const n = ny * w + nx;
                if (state[n] === 1) {
                    state[n] = 2;
                    stack.push(n);
                }
            }
        }
    }

    const data = new Uint8Array(w * h);
    let edgeCount = 0;
    for (let i = 0; i < data.length; i++) {
        if (state[i] === 2) {
            data[i] = 1;
            edgeCount++;
        }
    }
    return { width: w, height: h, data, edgeCount };
}
