import path from 'node:path';

import type { ImageFormat } from '../contracts/image-codec.js';

const PRIMARY_EXTENSION: Record<ImageFormat, string> = {
  gif: 'gif',
  png: 'png',
  webp: 'webp',
  jpeg: 'jpg',
};

export function primaryExtension(format: ImageFormat): string {
  return PRIMARY_EXTENSION[format];
}

/**
 * Explicit output, then the input itself for in-place writes, then
 * `{name}.scaled.{ext}` next to the input.
 */
export function resolveOutputPath(options: {
  readonly inputPath: string;
  readonly outputPath?: string;
  readonly inPlace: boolean;
  readonly format: ImageFormat;
}): string {
  if (options.outputPath !== undefined) {
    return options.outputPath;
  }

  if (options.inPlace) {
    return options.inputPath;
  }

  const { dir, name } = path.parse(options.inputPath);
  return path.join(dir, `${name}.scaled.${primaryExtension(options.format)}`);
}
