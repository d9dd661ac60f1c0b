import { Rgb, Rgba } from './types.js';

export interface IconDesign {
  gradientFrom: Rgb;
  gradientTo: Rgb;
  cornerRadius: number;
  braceHeight: number;
  lineWidth: number;
  stemOffset: number;
  tipExtend: number;
  curveSteps: number;
  innerOffset: number;
  outerOffset: number;
  solid: Rgba;
  faded: Rgba;
  dotRadius: number;
  dotSpacing: number;
  dotDrop: number;
}

const white = (a: number): Rgba => ({ r: 255, g: 255, b: 255, a });

// Lengths are fractions of the canvas size unless noted.
export const ICON_DESIGN: IconDesign = {
  gradientFrom: { r: 64, g: 192, b: 180 }, // teal
  gradientTo: { r: 80, g: 140, b: 200 }, // blue
  cornerRadius: 0.22,

  braceHeight: 0.55,
  lineWidth: 0.045,
  // Fractions of the brace height
  stemOffset: 0.01,
  tipExtend: 0.22,
  curveSteps: 200,

  innerOffset: 0.18,
  outerOffset: 0.28,
  solid: white(230),
  faded: white(80),

  dotRadius: 0.025,
  dotSpacing: 0.07,
  // Fraction of the brace height below the centre
  dotDrop: 0.48,
};

export const DEFAULT_SIZES = [1024, 512, 256, 128, 64, 32, 16];

export const DEFAULT_OUTPUT_DIR = 'assets';
