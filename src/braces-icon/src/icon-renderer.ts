import { drawBrace } from './brace.js';
import { composite, createMask, fillDisc } from './canvas.js';
import { ICON_DESIGN, IconDesign } from './design.js';
import { applyMask, createGradient, createRoundedMask } from './gradient.js';
import { BraceSpec, Canvas, Dot, Rgba } from './types.js';

export function drawDots(canvas: Canvas, dots: Dot[]): void {
  for (const dot of dots) {
    const coverage = createMask(canvas.size);
    fillDisc(coverage, dot.center.x, dot.center.y, dot.radius);
    composite(canvas, coverage, dot.color);
  }
}

/** A `{` at `cx - offset` and a `}` at `cx + offset`. */
function bracePair(size: number, design: IconDesign, offset: number, color: Rgba): [BraceSpec, BraceSpec] {
  const c = Math.floor(size / 2);
  const common = {
    height: size * design.braceHeight,
    lineWidth: size * design.lineWidth,
    color,
  };
  return [
    { ...common, center: { x: c - size * offset, y: c }, facing: 'left' },
    { ...common, center: { x: c + size * offset, y: c }, facing: 'right' },
  ];
}

export function layoutDots(size: number, design: IconDesign = ICON_DESIGN): Dot[] {
  const c = Math.floor(size / 2);
  const y = c + size * design.braceHeight * design.dotDrop;
  return [-1, 0, 1].map((i) => ({
    center: { x: c + i * size * design.dotSpacing, y },
    radius: size * design.dotRadius,
    color: design.solid,
  }));
}

/**
 * Renders the icon at `size`: rounded gradient base, solid inner braces,
 * dots, then the faded outer braces on top.
 */
export function renderIcon(size: number, design: IconDesign = ICON_DESIGN): Canvas {
  const base = createGradient(size, design.gradientFrom, design.gradientTo);
  const canvas = applyMask(base, createRoundedMask(size, Math.floor(size * design.cornerRadius)));

  for (const brace of bracePair(size, design, design.innerOffset, design.solid)) {
    drawBrace(canvas, brace, design.curveSteps, design);
  }
  drawDots(canvas, layoutDots(size, design));
  for (const brace of bracePair(size, design, design.outerOffset, design.faded)) {
    drawBrace(canvas, brace, design.curveSteps, design);
  }

  return canvas;
}
