import type { Pixel } from '@domain/pixel-scale/index.js';
import { describe, expect, it } from 'vitest';

import { decodeGif, encodeGif, indexFrame } from '@/infrastructure/pixel-scale/index.js';

import { BLUE, CLEAR, flatGrid, frameFromGrid, gridFromFrame, GREEN, RED, YELLOW } from '../../../../helpers/frames.js';

function sixteenColourSprite(): Pixel[][] {
  const colours = Array.from({ length: 16 }, (_, index): Pixel => [index * 16, 255 - index * 16, (index * 37) % 256, 255]);
  return Array.from({ length: 16 }, (_, y) =>
    Array.from({ length: 16 }, (_, x): Pixel => colours[(x + y) % 16] ?? CLEAR),
  );
}

/** 17 x 16 distinct colours, more than one palette holds. */
function manyColourSprite(): Pixel[][] {
  return Array.from({ length: 16 }, (_, y) =>
    Array.from({ length: 17 }, (_, x): Pixel => [x * 15, y * 16, 128, 255]),
  );
}

describe('gif round trip', () => {
  it('keeps the exact colours of a small sprite', () => {
    const sprite = [
      [RED, GREEN],
      [BLUE, YELLOW],
    ];

    const [frame] = decodeGif(encodeGif([frameFromGrid(sprite)])).frames;

    expect(frame && gridFromFrame(frame)).toEqual(sprite);
  });

  it('keeps the exact colours of a sixteen colour sprite', () => {
    const sprite = sixteenColourSprite();

    const [frame] = decodeGif(encodeGif([frameFromGrid(sprite)])).frames;

    expect(frame && gridFromFrame(frame)).toEqual(sprite);
  });

  it('keeps an opaque colour close to magenta opaque next to transparency', () => {
    const nearMagenta: Pixel = [250, 0, 250, 255];
    const sprite = [
      [nearMagenta, CLEAR],
      [CLEAR, nearMagenta],
    ];

    const [frame] = decodeGif(encodeGif([frameFromGrid(sprite)])).frames;

    expect(frame && gridFromFrame(frame)).toEqual(sprite);
  });

  it('does not let the previous frame show through transparent pixels', () => {
    const frames = [
      frameFromGrid([[RED, RED]], { delayMs: 80, disposalType: 0 }),
      frameFromGrid([[BLUE, CLEAR]], { delayMs: 120, disposalType: 0 }),
    ];

    const decoded = decodeGif(encodeGif(frames)).frames;

    expect(decoded.map(gridFromFrame)).toEqual([[[RED, RED]], [[BLUE, CLEAR]]]);
    expect(decoded.map((frame) => frame.metadata.delayMs)).toEqual([80, 120]);
  });

  it('quantizes sprites with more than 256 colours', () => {
    const sprite = manyColourSprite();

    const [frame] = decodeGif(encodeGif([frameFromGrid(sprite)])).frames;

    expect(frame?.width).toBe(17);
    expect(frame?.height).toBe(16);
    const alphas = frame ? gridFromFrame(frame).flat().map((pixel) => pixel[3]) : [];
    expect(new Set(alphas)).toEqual(new Set([255]));
  });
});

describe('encodeGif', () => {
  it('writes a looping animation for several frames', () => {
    const buffer = encodeGif([frameFromGrid(flatGrid(2, 2, RED)), frameFromGrid(flatGrid(2, 2, BLUE))]);

    expect(buffer.subarray(0, 6).toString('latin1')).toBe('GIF89a');
    expect(buffer.includes('NETSCAPE2.0')).toBe(true);
  });

  it('omits the loop extension for a single frame', () => {
    const buffer = encodeGif([frameFromGrid(flatGrid(2, 2, GREEN))]);

    expect(buffer.subarray(0, 6).toString('latin1')).toBe('GIF89a');
    expect(buffer.includes('NETSCAPE2.0')).toBe(false);
  });

  it('refuses to encode without frames', () => {
    expect(() => encodeGif([])).toThrow(RangeError);
  });
});

describe('indexFrame', () => {
  it('gives transparency a palette slot of its own', () => {
    const black: Pixel = [0, 0, 0, 255];
    const { data } = frameFromGrid([
      [RED, CLEAR],
      [black, RED],
    ]);

    expect(indexFrame(data)).toEqual({
      palette: [
        [255, 0, 0],
        [0, 0, 0],
        [0, 0, 0],
      ],
      indices: new Uint8Array([0, 1, 2, 0]),
      transparentIndex: 1,
    });
  });

  it('leaves no transparent slot for opaque frames', () => {
    const { data } = frameFromGrid([[GREEN, GREEN, BLUE]]);

    expect(indexFrame(data)).toEqual({
      palette: [
        [0, 255, 0],
        [0, 0, 255],
      ],
      indices: new Uint8Array([0, 0, 1]),
      transparentIndex: null,
    });
  });

  it('falls back to at most 256 entries when colours overflow the palette', () => {
    const { palette, indices, transparentIndex } = indexFrame(frameFromGrid(manyColourSprite()).data);

    expect(palette.length).toBeLessThanOrEqual(256);
    expect(indices).toHaveLength(17 * 16);
    expect(transparentIndex).toBeNull();
  });
});
