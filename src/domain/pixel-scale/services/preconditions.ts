import { PreconditionViolationError } from '@/shared/errors/precondition-violation.error.js';

import type { Frame } from '../value-objects/frame.js';

export function assertFrameSequence<TMetadata>(
  frames: readonly Frame<TMetadata>[],
): asserts frames is readonly [Frame<TMetadata>, ...Frame<TMetadata>[]] {
  const [first] = frames;
  if (!first) {
    throw new PreconditionViolationError(
      'pixel-scale.precondition.empty-frames',
      'At least one frame is required',
    );
  }

  frames.forEach((frame, index) => {
    if (frame.width !== first.width || frame.height !== first.height) {
      throw new PreconditionViolationError(
        'pixel-scale.precondition.frame-size-mismatch',
        `Frame ${index} is ${frame.width}x${frame.height}, expected ${first.width}x${first.height}`,
        { index, expected: { width: first.width, height: first.height } },
      );
    }
  });
}

export function assertDividingFactor(frame: Pick<Frame, 'width' | 'height'>, factor: number): void {
  if (
    !Number.isInteger(factor) ||
    factor < 1 ||
    frame.width % factor !== 0 ||
    frame.height % factor !== 0
  ) {
    throw new PreconditionViolationError(
      'pixel-scale.precondition.invalid-factor',
      `Factor ${factor} does not divide ${frame.width}x${frame.height}`,
      { factor, width: frame.width, height: frame.height },
    );
  }
}
