import type { DetectionMode, DetectionResult } from '../value-objects/detection-result.js';
import { CHANNELS, type Frame, samePixel } from '../value-objects/frame.js';

import { assertDividingFactor, assertFrameSequence } from './preconditions.js';

/**
 * Every factor that divides both sides, largest first. Always ends with 1.
 */
export function candidateFactors(width: number, height: number): number[] {
  const candidates: number[] = [];

  for (let factor = Math.min(width, height); factor >= 1; factor -= 1) {
    if (width % factor === 0 && height % factor === 0) {
      candidates.push(factor);
    }
  }

  return candidates;
}

/**
 * True when every `factor x factor` block on the aligned lattice repeats its top-left pixel.
 * Stops at the first block that does not. `factor` must divide both sides.
 */
export function isFrameUniformAt(frame: Frame, factor: number): boolean {
  assertDividingFactor(frame, factor);

  if (factor === 1) {
    return true;
  }

  const { width, height, data } = frame;
  const rowStride = width * CHANNELS;

  for (let blockY = 0; blockY < height; blockY += factor) {
    for (let blockX = 0; blockX < width; blockX += factor) {
      const origin = blockY * rowStride + blockX * CHANNELS;

      for (let y = blockY; y < blockY + factor; y += 1) {
        let offset = y * rowStride + blockX * CHANNELS;
        for (let x = 0; x < factor; x += 1, offset += CHANNELS) {
          if (!samePixel(data, origin, offset)) {
            return false;
          }
        }
      }
    }
  }

  return true;
}

/**
 * Largest factor at which every frame is uniform, scanning candidates from the largest down.
 * An image upscaled by n is also uniform at every divisor of n, so the first hit is the true one.
 */
export function detectBlockFactor(frames: readonly Frame[]): number {
  assertFrameSequence(frames);
  const [first] = frames;

  for (const factor of candidateFactors(first.width, first.height)) {
    if (factor === 1) {
      break;
    }

    if (frames.every((frame) => isFrameUniformAt(frame, factor))) {
      return factor;
    }
  }

  return 1;
}

/**
 * Every candidate at which `frame` is uniform. A candidate dividing one already accepted is
 * accepted without a scan. Used by the worker pool, which intersects the answers per frame.
 */
export function uniformFactors(frame: Frame, candidates: readonly number[]): number[] {
  const accepted: number[] = [];

  for (const factor of candidates) {
    const impliedByLarger = accepted.some((larger) => larger % factor === 0);
    if (impliedByLarger || isFrameUniformAt(frame, factor)) {
      accepted.push(factor);
    }
  }

  return accepted;
}

export function selectFramesForDetection<TFrame extends Frame>(
  frames: readonly TFrame[],
  mode: DetectionMode,
): TFrame[] {
  return mode === 'first-frame' ? frames.slice(0, 1) : [...frames];
}

export function createDetectionResult(
  frames: readonly Frame[],
  factor: number,
  analyzedFrames: number,
): DetectionResult {
  assertFrameSequence(frames);
  const [{ width, height }] = frames;
  assertDividingFactor({ width, height }, factor);

  return {
    factor,
    source: { width, height },
    output: { width: width / factor, height: height / factor },
    analyzedFrames,
  };
}
