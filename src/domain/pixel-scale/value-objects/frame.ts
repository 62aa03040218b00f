/**
 * One RGBA pixel. Channels are compared exactly, alpha included.
 */
export type Pixel = readonly [r: number, g: number, b: number, a: number];

export const CHANNELS = 4;

/**
 * A decoded still image: `width * height` pixels stored row-major as RGBA bytes.
 *
 * `metadata` belongs to whoever produced the frame (a codec, a test) and is carried
 * through reduction untouched.
 */
export interface Frame<TMetadata = unknown> {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
  readonly metadata: TMetadata;
}

/**
 * Timing attached to frames decoded from an animation.
 */
export interface AnimationFrameMetadata {
  readonly delayMs: number;
  readonly disposalType: number;
}

export function createFrame<TMetadata>(
  width: number,
  height: number,
  data: Uint8ClampedArray,
  metadata: TMetadata,
): Frame<TMetadata> {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new RangeError(`Frame dimensions must be positive integers, got ${width}x${height}`);
  }

  if (data.length !== width * height * CHANNELS) {
    throw new RangeError(
      `Frame data holds ${data.length} bytes, expected ${width * height * CHANNELS} for ${width}x${height}`,
    );
  }

  return { width, height, data, metadata };
}

export function samePixel(data: Uint8ClampedArray, a: number, b: number): boolean {
  return (
    data[a] === data[b] &&
    data[a + 1] === data[b + 1] &&
    data[a + 2] === data[b + 2] &&
    data[a + 3] === data[b + 3]
  );
}
