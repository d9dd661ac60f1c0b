import { Canvas, Mask, Rgba } from './types.js';

export function createCanvas(size: number): Canvas {
  return { size, data: new Uint8ClampedArray(size * size * 4) };
}

export function createMask(size: number): Mask {
  return { size, data: new Uint8Array(size * size) };
}

export function pixelAt(canvas: Canvas, x: number, y: number): Rgba {
  const i = (y * canvas.size + x) * 4;
  const d = canvas.data;
  return { r: d[i], g: d[i + 1], b: d[i + 2], a: d[i + 3] };
}

/** Sets every pixel in the inclusive box to 255, clipped to the mask. */
export function fillRect(mask: Mask, x1: number, y1: number, x2: number, y2: number): void {
  const left = Math.max(0, Math.ceil(x1));
  const top = Math.max(0, Math.ceil(y1));
  const right = Math.min(mask.size - 1, Math.floor(x2));
  const bottom = Math.min(mask.size - 1, Math.floor(y2));

  for (let y = top; y <= bottom; y++) {
    mask.data.fill(255, y * mask.size + left, y * mask.size + right + 1);
  }
}

/**
 * Sets every pixel whose centre lies within `radius` of (cx, cy).
 * `quadrant` restricts the fill to one side of each axis, e.g. `{ dx: -1, dy: -1 }`
 * keeps the upper-left quarter.
 */
export function fillDisc(
  mask: Mask,
  cx: number,
  cy: number,
  radius: number,
  quadrant?: { dx: 1 | -1; dy: 1 | -1 },
): void {
  const r2 = radius * radius;
  const left = Math.max(0, Math.ceil(cx - radius));
  const right = Math.min(mask.size - 1, Math.floor(cx + radius));
  const top = Math.max(0, Math.ceil(cy - radius));
  const bottom = Math.min(mask.size - 1, Math.floor(cy + radius));

  for (let y = top; y <= bottom; y++) {
    const dy = y - cy;
    if (quadrant && dy * quadrant.dy < 0) continue;
    for (let x = left; x <= right; x++) {
      const dx = x - cx;
      if (quadrant && dx * quadrant.dx < 0) continue;
      if (dx * dx + dy * dy <= r2) {
        mask.data[y * mask.size + x] = 255;
      }
    }
  }
}

/** Paints `color` source-over onto every covered pixel of `canvas`. */
export function composite(canvas: Canvas, coverage: Mask, color: Rgba): void {
  if (coverage.size !== canvas.size) {
    throw new Error(`Coverage size ${coverage.size} does not match canvas size ${canvas.size}`);
  }

  const sa = color.a / 255;
  const d = canvas.data;
  for (let p = 0; p < coverage.data.length; p++) {
    if (coverage.data[p] === 0) continue;
    const i = p * 4;
    const da = d[i + 3] / 255;
    const outA = sa + da * (1 - sa);
    if (outA === 0) continue;
    const keep = da * (1 - sa);
    d[i] = Math.round((color.r * sa + d[i] * keep) / outA);
    d[i + 1] = Math.round((color.g * sa + d[i + 1] * keep) / outA);
    d[i + 2] = Math.round((color.b * sa + d[i + 2] * keep) / outA);
    d[i + 3] = Math.round(outA * 255);
  }
}
