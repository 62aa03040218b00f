import { describe, expect, it } from 'vitest';

import { detectImageFormat, formatFromPath, sniffImageFormat } from '@/infrastructure/pixel-scale/index.js';

describe('sniffImageFormat', () => {
  it.each([
    ['gif', Buffer.from('GIF89a\x01\x00', 'latin1')],
    ['png', Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])],
    ['webp', Buffer.from('RIFF\x24\x00\x00\x00WEBPVP8 ', 'latin1')],
    ['jpeg', Buffer.from([0xff, 0xd8, 0xff, 0xe0])],
  ] as const)('recognises %s', (format, buffer) => {
    expect(sniffImageFormat(buffer)).toBe(format);
  });

  it('needs the WEBP tag after a RIFF header', () => {
    expect(sniffImageFormat(Buffer.from('RIFF\x24\x00\x00\x00WAVE', 'latin1'))).toBeNull();
  });

  it('returns null for short or unknown input', () => {
    expect(sniffImageFormat(Buffer.alloc(0))).toBeNull();
    expect(sniffImageFormat(Buffer.from('BM'))).toBeNull();
  });
});

describe('detectImageFormat', () => {
  it('reports the leading bytes of unknown input', () => {
    expect(() => detectImageFormat(Buffer.from('BM'))).toThrowError(
      expect.objectContaining({ code: 'codec.unsupported-format', metadata: { signature: '424d' } }),
    );
  });
});

describe('formatFromPath', () => {
  it.each([
    ['sprite.png', 'png'],
    ['sprite.APNG', 'png'],
    ['anim/walk.gif', 'gif'],
    ['tile.webp', 'webp'],
    ['photo.jpg', 'jpeg'],
    ['photo.JPEG', 'jpeg'],
  ] as const)('maps %s to %s', (filePath, format) => {
    expect(formatFromPath(filePath)).toBe(format);
  });

  it('rejects unknown extensions', () => {
    expect(() => formatFromPath('sprite.bmp')).toThrowError(
      expect.objectContaining({ code: 'codec.unsupported-extension', message: 'Cannot pick an output format for extension ".bmp"' }),
    );
  });

  it('rejects paths without an extension', () => {
    expect(() => formatFromPath('sprite')).toThrowError(
      expect.objectContaining({ message: 'Cannot pick an output format for extension "(none)"' }),
    );
  });
});
