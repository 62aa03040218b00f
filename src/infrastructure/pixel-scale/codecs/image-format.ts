import path from 'node:path';

import type { ImageFormat } from '@domain/pixel-scale/index.js';

import { AppError } from '@/shared/errors/app-error.js';

const EXTENSION_FORMATS: Record<string, ImageFormat> = {
  '.gif': 'gif',
  '.png': 'png',
  '.apng': 'png',
  '.webp': 'webp',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
};

function startsWith(buffer: Buffer, signature: readonly number[], offset = 0): boolean {
  return signature.every((byte, index) => buffer[offset + index] === byte);
}

export function sniffImageFormat(buffer: Buffer): ImageFormat | null {
  if (startsWith(buffer, [0x47, 0x49, 0x46, 0x38])) {
    return 'gif';
  }

  if (startsWith(buffer, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return 'png';
  }

  if (startsWith(buffer, [0x52, 0x49, 0x46, 0x46]) && startsWith(buffer, [0x57, 0x45, 0x42, 0x50], 8)) {
    return 'webp';
  }

  if (startsWith(buffer, [0xff, 0xd8, 0xff])) {
    return 'jpeg';
  }

  return null;
}

export function detectImageFormat(buffer: Buffer): ImageFormat {
  const format = sniffImageFormat(buffer);
  if (!format) {
    throw AppError.unsupported('codec.unsupported-format', 'Unsupported or unrecognised image format', {
      signature: buffer.subarray(0, 12).toString('hex'),
    });
  }
  return format;
}

export function formatFromPath(filePath: string): ImageFormat {
  const extension = path.extname(filePath).toLowerCase();
  const format = EXTENSION_FORMATS[extension];
  if (!format) {
    throw AppError.unsupported(
      'codec.unsupported-extension',
      `Cannot pick an output format for extension "${extension || '(none)'}"`,
      { path: filePath },
    );
  }
  return format;
}
