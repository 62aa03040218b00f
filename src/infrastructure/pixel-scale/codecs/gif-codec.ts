import { applyPalette, GIFEncoder, type Palette, quantize } from 'gifenc';
import { decompressFrames, parseGIF, type ParsedFrame } from 'gifuct-js';

import { createFrame, type ImageFrame } from '@domain/pixel-scale/index.js';

import { normalizeDelayMs, toArrayBuffer } from './binary.js';

const MAX_PALETTE_SIZE = 256;
const ALPHA_THRESHOLD = 128;
const TRANSPARENT_ENTRY = [0, 0, 0];
const DISPOSE_RESTORE_BACKGROUND = 2;
const REPEAT_FOREVER = 0;
const PLAY_ONCE = -1;

export interface DecodedGif {
  readonly width: number;
  readonly height: number;
  readonly frames: ImageFrame[];
}

/**
 * Palette indices for one frame. `transparentIndex` is a palette slot of its own, never
 * shared with an opaque colour.
 */
export interface IndexedFrame {
  readonly palette: Palette;
  readonly indices: Uint8Array;
  readonly transparentIndex: number | null;
}

export function decodeGif(buffer: Buffer): DecodedGif {
  const gif = parseGIF(toArrayBuffer(buffer));
  const parsedFrames = decompressFrames(gif, true);
  const width = gif.lsd.width;
  const height = gif.lsd.height;

  return {
    width,
    height,
    frames: expandToFullFrames(parsedFrames, width, height),
  };
}

/**
 * Multi-frame output always loops forever: the source repeat count is not read.
 */
export function encodeGif(frames: readonly ImageFrame[]): Buffer {
  const [first] = frames;
  if (!first) {
    throw new RangeError('Cannot encode a GIF without frames');
  }

  const { width, height } = first;
  const encoder = GIFEncoder();
  const repeat = frames.length > 1 ? REPEAT_FOREVER : PLAY_ONCE;

  for (const frame of frames) {
    const { palette, indices, transparentIndex } = indexFrame(frame.data);
    encoder.writeFrame(indices, width, height, {
      palette,
      delay: frame.metadata.delayMs,
      repeat,
      // Frames are full pictures, so transparent pixels must not show the previous one.
      dispose: DISPOSE_RESTORE_BACKGROUND,
      transparent: transparentIndex !== null,
      transparentIndex: transparentIndex ?? 0,
    });
  }

  encoder.finish();
  return Buffer.from(encoder.bytes());
}

/**
 * Exact palette when the frame has at most 256 colours (a transparent slot counts as one),
 * gifenc quantization otherwise.
 */
export function indexFrame(data: Uint8ClampedArray): IndexedFrame {
  return indexExactly(data) ?? indexByQuantizing(data);
}

function isTransparent(data: Uint8ClampedArray, offset: number): boolean {
  return (data[offset + 3] ?? 0) < ALPHA_THRESHOLD;
}

function indexExactly(data: Uint8ClampedArray): IndexedFrame | null {
  const palette: Palette = [];
  const lookup = new Map<number, number>();
  const indices = new Uint8Array(data.length / 4);
  let transparentIndex: number | null = null;

  for (let pixel = 0, offset = 0; offset < data.length; pixel += 1, offset += 4) {
    if (isTransparent(data, offset)) {
      if (transparentIndex === null) {
        if (palette.length === MAX_PALETTE_SIZE) {
          return null;
        }
        transparentIndex = palette.length;
        palette.push([...TRANSPARENT_ENTRY]);
      }
      indices[pixel] = transparentIndex;
      continue;
    }

    const red = data[offset] ?? 0;
    const green = data[offset + 1] ?? 0;
    const blue = data[offset + 2] ?? 0;
    const color = (red << 16) | (green << 8) | blue;

    let index = lookup.get(color);
    if (index === undefined) {
      if (palette.length === MAX_PALETTE_SIZE) {
        return null;
      }
      index = palette.length;
      lookup.set(color, index);
      palette.push([red, green, blue]);
    }
    indices[pixel] = index;
  }

  return { palette, indices, transparentIndex };
}

function indexByQuantizing(data: Uint8ClampedArray): IndexedFrame {
  let hasTransparency = false;
  for (let offset = 0; offset < data.length; offset += 4) {
    if (isTransparent(data, offset)) {
      hasTransparency = true;
      break;
    }
  }

  const palette = quantize(data, hasTransparency ? MAX_PALETTE_SIZE - 1 : MAX_PALETTE_SIZE);
  const indices = applyPalette(data, palette);
  if (!hasTransparency) {
    return { palette, indices, transparentIndex: null };
  }

  const transparentIndex = palette.length;
  palette.push([...TRANSPARENT_ENTRY]);
  for (let pixel = 0, offset = 0; offset < data.length; pixel += 1, offset += 4) {
    if (isTransparent(data, offset)) {
      indices[pixel] = transparentIndex;
    }
  }

  return { palette, indices, transparentIndex };
}

/**
 * gifuct-js yields per-frame patches; replay them onto a full canvas so that every
 * frame is a complete picture of the animation at that point.
 */
function expandToFullFrames(frames: ParsedFrame[], width: number, height: number): ImageFrame[] {
  let previous = new Uint8ClampedArray(width * height * 4);

  return frames.map((frame) => {
    const beforeDrawing = new Uint8ClampedArray(previous);
    const working = new Uint8ClampedArray(previous);
    const { dims, patch } = frame;

    if (patch) {
      compositePatch(working, patch, dims, width, height);
    }

    const disposalType = frame.disposalType ?? 0;

    switch (disposalType) {
      case 2: {
        const cleared = new Uint8ClampedArray(working);
        clearPatch(cleared, dims, width, height);
        previous = cleared;
        break;
      }
      case 3: {
        previous = beforeDrawing;
        break;
      }
      default: {
        previous = working;
        break;
      }
    }

    // gifuct-js already reports the graphic control delay in milliseconds.
    return createFrame(width, height, new Uint8ClampedArray(working), {
      delayMs: normalizeDelayMs(frame.delay),
      disposalType,
    });
  });
}

function compositePatch(
  destination: Uint8ClampedArray,
  patch: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;

  for (let y = 0; y < patchHeight; y += 1) {
    const destY = top + y;
    if (destY >= height) {
      break;
    }

    for (let x = 0; x < patchWidth; x += 1) {
      const destX = left + x;
      if (destX >= width) {
        break;
      }

      const patchIndex = (y * patchWidth + x) * 4;
      const alpha = patch[patchIndex + 3] ?? 0;
      if (alpha === 0) {
        continue;
      }

      const destIndex = (destY * width + destX) * 4;
      destination.set(patch.subarray(patchIndex, patchIndex + 3), destIndex);
      destination[destIndex + 3] = alpha;
    }
  }
}

function clearPatch(
  destination: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;
  const right = Math.min(width, left + patchWidth);

  for (let destY = top; destY < Math.min(height, top + patchHeight); destY += 1) {
    if (right > left) {
      destination.fill(0, (destY * width + left) * 4, (destY * width + right) * 4);
    }
  }
}
