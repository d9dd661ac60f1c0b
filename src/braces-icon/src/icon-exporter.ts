import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { atStep } from './errors.js';
import { renderIcon } from './icon-renderer.js';
import { ExportIconsParams, ExportedIcon, Canvas } from './types.js';
import { parseExportOptions } from './options.js';

export class IconExporter {
  private outputDir: string;
  private log: (message: string) => void;

  constructor(outputDir: string, log: (message: string) => void = console.log) {
    this.outputDir = outputDir;
    this.log = log;
  }

  async initialize(): Promise<void> {
    await atStep('mkdir', this.outputDir, () => fs.mkdir(this.outputDir, { recursive: true }));
  }

  getFilePath(size: number): string {
    return path.join(this.outputDir, `icon-${size}.png`);
  }

  /** Encodes the master as-is; smaller sizes are Lanczos downsamples of it. */
  private async encode(master: Canvas, size: number): Promise<Buffer> {
    const filePath = this.getFilePath(size);
    const image = sharp(Buffer.from(master.data.buffer, master.data.byteOffset, master.data.byteLength), {
      raw: { width: master.size, height: master.size, channels: 4 },
    });

    if (size === master.size) {
      return atStep('encode', filePath, () => image.png().toBuffer());
    }
    return atStep('resize', filePath, () =>
      image.resize(size, size, { kernel: sharp.kernel.lanczos3 }).png().toBuffer(),
    );
  }

  /** Renders once at the largest size and writes every size, largest first. */
  async exportAll(sizes: number[]): Promise<ExportedIcon[]> {
    const ordered = [...sizes].sort((a, b) => b - a);
    const masterSize = ordered[0];
    if (masterSize === undefined) {
      return [];
    }
    const master = await atStep('render', this.getFilePath(masterSize), () => renderIcon(masterSize));

    const written: ExportedIcon[] = [];
    for (const size of ordered) {
      const filePath = this.getFilePath(size);
      const png = await this.encode(master, size);
      await atStep('write', filePath, () => fs.writeFile(filePath, png));
      written.push({ size, filePath, bytes: png.length });
      this.log(`Created ${path.basename(filePath)}`);
    }
    return written;
  }
}

export async function exportIcons(params: ExportIconsParams = {}): Promise<ExportedIcon[]> {
  const { outputDir, sizes } = parseExportOptions(params);
  const exporter = new IconExporter(outputDir, params.log);
  await exporter.initialize();
  return exporter.exportAll(sizes);
}
