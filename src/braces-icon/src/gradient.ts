import { createCanvas, createMask, fillDisc, fillRect } from './canvas.js';
import { Canvas, Mask, Rgb } from './types.js';

/** Diagonal gradient: each pixel sits at `(x + y) / (2 * size)` between the stops. */
export function createGradient(size: number, from: Rgb, to: Rgb): Canvas {
  const canvas = createCanvas(size);
  const d = canvas.data;
  const dr = to.r - from.r;
  const dg = to.g - from.g;
  const db = to.b - from.b;

  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      const ratio = (x + y) / (2 * size);
      const i = (y * size + x) * 4;
      d[i] = Math.round(from.r + dr * ratio);
      d[i + 1] = Math.round(from.g + dg * ratio);
      d[i + 2] = Math.round(from.b + db * ratio);
      d[i + 3] = 255;
    }
  }
  return canvas;
}

/**
 * Rounded rectangle covering the whole grid: two overlapping rectangles, each
 * inset by `radius` on one axis, plus a quarter disc in each corner.
 */
export function createRoundedMask(size: number, radius: number): Mask {
  const mask = createMask(size);
  const last = size - 1;

  fillRect(mask, radius, 0, last - radius, last);
  fillRect(mask, 0, radius, last, last - radius);

  fillDisc(mask, radius, radius, radius, { dx: -1, dy: -1 });
  fillDisc(mask, last - radius, radius, radius, { dx: 1, dy: -1 });
  fillDisc(mask, radius, last - radius, radius, { dx: -1, dy: 1 });
  fillDisc(mask, last - radius, last - radius, radius, { dx: 1, dy: 1 });

  return mask;
}

/** Copies `canvas` through `mask`; unmasked pixels become fully transparent. */
export function applyMask(canvas: Canvas, mask: Mask): Canvas {
  if (mask.size !== canvas.size) {
    throw new Error(`Mask size ${mask.size} does not match canvas size ${canvas.size}`);
  }

  const result = createCanvas(canvas.size);
  for (let p = 0; p < mask.data.length; p++) {
    if (mask.data[p] === 0) continue;
    result.data.set(canvas.data.subarray(p * 4, p * 4 + 4), p * 4);
  }
  return result;
}
