export { exportIcons, IconExporter } from './src/icon-exporter.js';
export { renderIcon, layoutDots, drawDots } from './src/icon-renderer.js';
export { createGradient, createRoundedMask, applyMask } from './src/gradient.js';
export { cubicBezier, braceCurves, sampleBrace, drawBrace } from './src/brace.js';
export type { BraceShape } from './src/brace.js';
export { createCanvas, createMask, pixelAt, fillRect, fillDisc, composite } from './src/canvas.js';
export { ICON_DESIGN, DEFAULT_SIZES, DEFAULT_OUTPUT_DIR } from './src/design.js';
export type { IconDesign } from './src/design.js';
export { IconGenerationError } from './src/errors.js';
export type { GenerationStep } from './src/errors.js';
export { parseExportOptions, ExportOptionsSchema } from './src/options.js';
export type * from './src/types.js';
