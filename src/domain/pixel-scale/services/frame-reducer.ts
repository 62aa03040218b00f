import { CHANNELS, type Frame } from '../value-objects/frame.js';

import { assertDividingFactor } from './preconditions.js';

/**
 * Collapses every `factor x factor` block to its top-left pixel. All four channels are
 * copied as-is, nothing is averaged. Frames left out of detection get the same treatment
 * even though their blocks may not be uniform.
 */
export function reduceFrame<TMetadata>(frame: Frame<TMetadata>, factor: number): Frame<TMetadata> {
  assertDividingFactor(frame, factor);

  if (factor === 1) {
    return { ...frame, data: new Uint8ClampedArray(frame.data) };
  }

  const width = frame.width / factor;
  const height = frame.height / factor;
  const source = frame.data;
  const data = new Uint8ClampedArray(width * height * CHANNELS);

  for (let y = 0; y < height; y += 1) {
    const sourceRow = y * factor * frame.width;
    for (let x = 0; x < width; x += 1) {
      const from = (sourceRow + x * factor) * CHANNELS;
      data.set(source.subarray(from, from + CHANNELS), (y * width + x) * CHANNELS);
    }
  }

  return {
    width,
    height,
    data,
    metadata: frame.metadata,
  };
}

export function reduceFrames<TMetadata>(
  frames: readonly Frame<TMetadata>[],
  factor: number,
): Frame<TMetadata>[] {
  return frames.map((frame) => reduceFrame(frame, factor));
}
