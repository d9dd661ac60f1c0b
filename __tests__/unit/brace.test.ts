import { describe, it, expect } from 'vitest';
import { braceCurves, cubicBezier, drawBrace, sampleBrace } from '../../src/braces-icon/src/brace.js';
import { createCanvas, pixelAt } from '../../src/braces-icon/src/canvas.js';
import { Facing } from '../../src/braces-icon/src/types.js';

describe('cubicBezier', () => {
  const p0 = { x: 0, y: 0 };
  const p1 = { x: 0, y: 1 };
  const p2 = { x: 1, y: 1 };
  const p3 = { x: 1, y: 0 };

  it('passes through its end points', () => {
    expect(cubicBezier(p0, p1, p2, p3, 0)).toEqual(p0);
    expect(cubicBezier(p0, p1, p2, p3, 1)).toEqual(p3);
  });

  it('evaluates the midpoint', () => {
    expect(cubicBezier(p0, p1, p2, p3, 0.5)).toEqual({ x: 0.5, y: 0.75 });
  });
});

describe('braceCurves', () => {
  it('puts the stems behind the centre and the tip in front', () => {
    const { top, bottom } = braceCurves(100, 'right');

    expect(top[0]).toEqual({ x: -1, y: -50 });
    expect(top[3]).toEqual({ x: 22, y: 0 });
    expect(bottom[0]).toBe(top[3]);
    expect(bottom[3]).toEqual({ x: -1, y: 50 });
  });

  it('honours a custom shape', () => {
    const { top } = braceCurves(100, 'left', { stemOffset: 0.1, tipExtend: 0.3 });

    expect(top[0].x).toBe(10);
    expect(top[3].x).toBe(-30);
  });
});

describe('sampleBrace', () => {
  const center = { x: 50, y: 50 };

  it('samples each half at steps + 1 points', () => {
    const { top, bottom } = sampleBrace({ center, height: 100, facing: 'right' });

    expect(top).toHaveLength(201);
    expect(bottom).toHaveLength(201);
    expect(sampleBrace({ center, height: 100, facing: 'right' }, 10).top).toHaveLength(11);
  });

  it.each<Facing>(['left', 'right'])('joins both halves exactly at the tip (%s)', (facing) => {
    const { top, bottom } = sampleBrace({ center, height: 100, facing });
    const tip = top[top.length - 1];

    expect(bottom[0]).toEqual(tip);
    expect(tip).toEqual({ x: facing === 'left' ? 28 : 72, y: 50 });
  });

  it('starts on the top stem and ends on the bottom stem', () => {
    const { top, bottom } = sampleBrace({ center, height: 100, facing: 'right' });

    expect(top[0]).toEqual({ x: 49, y: 0 });
    expect(bottom[bottom.length - 1]).toEqual({ x: 49, y: 100 });
  });

  it('mirrors left and right braces about the centre', () => {
    const origin = { x: 0, y: 0 };
    const left = sampleBrace({ center: origin, height: 80, facing: 'left' });
    const right = sampleBrace({ center: origin, height: 80, facing: 'right' });

    for (const half of ['top', 'bottom'] as const) {
      left[half].forEach((p, i) => {
        expect(p.x === -right[half][i].x).toBe(true);
        expect(p.y).toBe(right[half][i].y);
      });
    }
  });

  it('mirrors about an off-origin centre', () => {
    const left = sampleBrace({ center, height: 80, facing: 'left' });
    const right = sampleBrace({ center, height: 80, facing: 'right' });

    left.top.forEach((p, i) => {
      expect(p.x - center.x).toBeCloseTo(center.x - right.top[i].x, 10);
    });
  });
});

describe('drawBrace', () => {
  const red = { r: 255, g: 0, b: 0, a: 255 };

  it('strokes the curve with the given width', () => {
    const canvas = createCanvas(100);
    drawBrace(canvas, { center: { x: 50, y: 50 }, height: 60, lineWidth: 6, color: red, facing: 'right' });

    // Tip at (63.2, 50), top stem at (49.4, 20)
    expect(pixelAt(canvas, 63, 50)).toEqual(red);
    expect(pixelAt(canvas, 49, 20)).toEqual(red);
    expect(pixelAt(canvas, 50, 50).a).toBe(0);
    expect(pixelAt(canvas, 0, 0).a).toBe(0);
  });

  it('keeps a translucent stroke at a uniform alpha where stamps overlap', () => {
    const canvas = createCanvas(100);
    const faded = { r: 255, g: 255, b: 255, a: 80 };
    drawBrace(canvas, { center: { x: 50, y: 50 }, height: 60, lineWidth: 6, color: faded, facing: 'left' });

    const alphas = new Set<number>();
    for (let p = 3; p < canvas.data.length; p += 4) {
      if (canvas.data[p] > 0) alphas.add(canvas.data[p]);
    }
    expect([...alphas]).toEqual([80]);
  });
});
