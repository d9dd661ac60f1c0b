import { composite, createMask, fillDisc } from './canvas.js';
import { ICON_DESIGN } from './design.js';
import { BraceSamples, BraceSpec, Canvas, CubicCurve, Point } from './types.js';

export interface BraceShape {
  /** Fraction of the height the top and bottom stems sit away from the centre. */
  stemOffset: number;
  /** Fraction of the height the tip protrudes. */
  tipExtend: number;
}

const DEFAULT_SHAPE: BraceShape = {
  stemOffset: ICON_DESIGN.stemOffset,
  tipExtend: ICON_DESIGN.tipExtend,
};

export function cubicBezier(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  const u = 1 - t;
  const a = u * u * u;
  const b = 3 * u * u * t;
  const c = 3 * u * t * t;
  const d = t * t * t;
  return {
    x: a * p0.x + b * p1.x + c * p2.x + d * p3.x,
    y: a * p0.y + b * p1.y + c * p2.y + d * p3.y,
  };
}

/**
 * Control points of both halves, relative to the brace centre. The top half
 * ends on the tip and the bottom half starts on it.
 */
export function braceCurves(height: number, facing: BraceSpec['facing'], shape: BraceShape = DEFAULT_SHAPE): {
  top: CubicCurve;
  bottom: CubicCurve;
} {
  const h = height / 2;
  const stem = height * shape.stemOffset;
  const tip = height * shape.tipExtend;
  const d = facing === 'left' ? -1 : 1;

  const tipPoint: Point = { x: d * tip, y: 0 };
  return {
    top: [
      { x: -d * stem, y: -h },
      { x: -d * stem, y: -h * 0.35 },
      { x: d * tip, y: -h * 0.15 },
      tipPoint,
    ],
    bottom: [
      tipPoint,
      { x: d * tip, y: h * 0.15 },
      { x: -d * stem, y: h * 0.35 },
      { x: -d * stem, y: h },
    ],
  };
}

function sampleCurve(curve: CubicCurve, center: Point, steps: number): Point[] {
  const points: Point[] = [];
  for (let i = 0; i <= steps; i++) {
    const p = cubicBezier(curve[0], curve[1], curve[2], curve[3], i / steps);
    points.push({ x: center.x + p.x, y: center.y + p.y });
  }
  return points;
}

export function sampleBrace(
  spec: Pick<BraceSpec, 'center' | 'height' | 'facing'>,
  steps: number = ICON_DESIGN.curveSteps,
  shape?: BraceShape,
): BraceSamples {
  const { top, bottom } = braceCurves(spec.height, spec.facing, shape);
  return {
    top: sampleCurve(top, spec.center, steps),
    bottom: sampleCurve(bottom, spec.center, steps),
  };
}

/**
 * Strokes the brace by stamping a disc at each sample into one coverage mask,
 * then paints the colour through it once.
 */
export function drawBrace(canvas: Canvas, spec: BraceSpec, steps?: number, shape?: BraceShape): void {
  const coverage = createMask(canvas.size);
  const radius = spec.lineWidth / 2;
  const { top, bottom } = sampleBrace(spec, steps, shape);

  for (const p of [...top, ...bottom]) {
    fillDisc(coverage, p.x, p.y, radius);
  }
  composite(canvas, coverage, spec.color);
}
