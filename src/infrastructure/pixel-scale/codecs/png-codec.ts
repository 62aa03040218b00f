import { PNG } from 'pngjs';
import UPNG from 'upng-js';

import { createFrame, type ImageFrame } from '@domain/pixel-scale/index.js';

import { normalizeDelayMs, toArrayBuffer } from './binary.js';

const STILL_METADATA = { delayMs: 0, disposalType: 0 } as const;
const SIGNATURE_LENGTH = 8;
const CHUNK_OVERHEAD = 12;

/**
 * True when an `acTL` chunk precedes the image data, which makes the file an APNG.
 */
export function isAnimatedPng(buffer: Buffer): boolean {
  let offset = SIGNATURE_LENGTH;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const type = buffer.toString('latin1', offset + 4, offset + 8);
    if (type === 'acTL') {
      return true;
    }
    if (type === 'IDAT' || type === 'IEND') {
      return false;
    }
    offset += CHUNK_OVERHEAD + length;
  }

  return false;
}

/**
 * Reads the default image only.
 */
export function decodePng(buffer: Buffer): ImageFrame {
  const png = PNG.sync.read(buffer);
  return createFrame(png.width, png.height, new Uint8ClampedArray(png.data), STILL_METADATA);
}

/**
 * Every APNG frame composited onto the full canvas by `toRGBA8`, with its delay. Disposal
 * is already applied, so frames report none.
 */
export function decodeApng(buffer: Buffer): ImageFrame[] {
  const image = UPNG.decode(toArrayBuffer(buffer));
  const pictures = UPNG.toRGBA8(image);

  return pictures.map((picture, index) => {
    const frame = image.frames[index];
    return createFrame(image.width, image.height, new Uint8ClampedArray(picture), {
      delayMs: normalizeDelayMs(frame?.delay),
      disposalType: 0,
    });
  });
}

export function encodePng(frame: ImageFrame): Buffer {
  const png = new PNG({ width: frame.width, height: frame.height });
  png.data = Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength);
  return PNG.sync.write(png);
}
