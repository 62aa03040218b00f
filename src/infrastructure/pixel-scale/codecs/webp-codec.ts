import sharp from 'sharp';

import { createFrame, type ImageFrame } from '@domain/pixel-scale/index.js';

import { normalizeDelayMs } from './binary.js';
import { decodeWithCanvas } from './canvas-codec.js';

/**
 * Still WebP goes through the canvas decoder. Animated WebP is expanded by libvips, which
 * stacks the composited pages vertically in one raw RGBA buffer.
 */
export async function decodeWebp(buffer: Buffer): Promise<ImageFrame[]> {
  const metadata = await sharp(buffer).metadata();
  const pages = metadata.pages ?? 1;

  if (pages <= 1) {
    return [await decodeWithCanvas(buffer)];
  }

  const { data, info } = await sharp(buffer, { animated: true })
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const width = info.width;
  const pageHeight = metadata.pageHeight ?? info.height / pages;
  const frameBytes = width * pageHeight * 4;

  return Array.from({ length: pages }, (_, index) =>
    createFrame(
      width,
      pageHeight,
      new Uint8ClampedArray(data.subarray(index * frameBytes, (index + 1) * frameBytes)),
      { delayMs: normalizeDelayMs(metadata.delay?.[index]), disposalType: 0 },
    ),
  );
}
