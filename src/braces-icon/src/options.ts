import os from 'os';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_OUTPUT_DIR, DEFAULT_SIZES } from './design.js';
import { IconGenerationError } from './errors.js';

export const ExportOptionsSchema = z.object({
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  sizes: z
    .array(z.number().int().positive())
    .min(1)
    .refine((sizes) => new Set(sizes).size === sizes.length, { message: 'Sizes must be unique' })
    .default(DEFAULT_SIZES),
});

export type ExportOptions = { outputDir: string; sizes: number[] };

export function expandHome(filepath: string): string {
  if (filepath.startsWith('~/') || filepath === '~') {
    return path.join(os.homedir(), filepath.slice(1));
  }
  return filepath;
}

export function parseExportOptions(args: unknown): ExportOptions {
  const parsed = ExportOptionsSchema.safeParse(args);
  if (!parsed.success) {
    throw new IconGenerationError('options', undefined, new Error(`Invalid options for export_icons: ${parsed.error}`));
  }
  return {
    outputDir: expandHome(parsed.data.outputDir),
    sizes: [...parsed.data.sizes],
  };
}
