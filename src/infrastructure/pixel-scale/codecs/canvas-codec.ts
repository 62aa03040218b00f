import { createCanvas, ImageData, loadImage } from '@napi-rs/canvas';

import { createFrame, type ImageFrame } from '@domain/pixel-scale/index.js';

export type CanvasFormat = 'webp' | 'jpeg';

const ENCODE_QUALITY: Record<CanvasFormat, number> = {
  webp: 100,
  jpeg: 95,
};

/**
 * Decodes the first frame of anything Skia can read (still WebP, JPEG).
 */
export async function decodeWithCanvas(buffer: Buffer): Promise<ImageFrame> {
  const image = await loadImage(buffer);
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(image, 0, 0);
  const { data } = ctx.getImageData(0, 0, image.width, image.height);

  return createFrame(image.width, image.height, new Uint8ClampedArray(data), {
    delayMs: 0,
    disposalType: 0,
  });
}

export async function encodeWithCanvas(frame: ImageFrame, format: CanvasFormat): Promise<Buffer> {
  const canvas = createCanvas(frame.width, frame.height);
  const ctx = canvas.getContext('2d');
  ctx.putImageData(new ImageData(new Uint8ClampedArray(frame.data), frame.width, frame.height), 0, 0);

  return format === 'webp'
    ? canvas.encode('webp', ENCODE_QUALITY.webp)
    : canvas.encode('jpeg', ENCODE_QUALITY.jpeg);
}
