export interface Point {
  x: number;
  y: number;
}

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface Rgba extends Rgb {
  a: number;
}

/** Row-major RGBA pixels, 4 bytes per pixel. */
export interface Canvas {
  size: number;
  data: Uint8ClampedArray;
}

/** Single-channel coverage grid, 0 (outside) or 255 (inside). */
export interface Mask {
  size: number;
  data: Uint8Array;
}

/** `left` draws `{` (tip points left), `right` draws `}`. */
export type Facing = 'left' | 'right';

export interface BraceSpec {
  center: Point;
  height: number;
  lineWidth: number;
  color: Rgba;
  facing: Facing;
}

export interface Dot {
  center: Point;
  radius: number;
  color: Rgba;
}

export type CubicCurve = [Point, Point, Point, Point];

export interface BraceSamples {
  top: Point[];
  bottom: Point[];
}

export interface ExportIconsParams {
  outputDir?: string;
  sizes?: number[];
  log?: (message: string) => void;
}

export interface ExportedIcon {
  size: number;
  filePath: string;
  bytes: number;
}
