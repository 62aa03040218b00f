import type { DecodedImage, ImageCodec, ImageFormat, ImageFrame } from '@domain/pixel-scale/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { decodeWithCanvas, encodeWithCanvas } from './canvas-codec.js';
import { decodeGif, encodeGif } from './gif-codec.js';
import { detectImageFormat } from './image-format.js';
import { decodeApng, decodePng, encodePng, isAnimatedPng } from './png-codec.js';
import { decodeWebp } from './webp-codec.js';

export class MultiFormatImageCodec implements ImageCodec {
  private readonly logger = createChildLogger({ module: 'MultiFormatImageCodec' });

  public async decode(buffer: Buffer): Promise<DecodedImage> {
    const format = detectImageFormat(buffer);

    try {
      const frames = await this.decodeFrames(buffer, format);
      const [first] = frames;
      if (!first) {
        throw new Error(`The ${format} image contains no frames`);
      }

      this.logger.debug(
        { format, width: first.width, height: first.height, frameCount: frames.length },
        'Decoded image',
      );

      return {
        format,
        width: first.width,
        height: first.height,
        frames,
        animated: frames.length > 1,
      };
    } catch (error) {
      throw AppError.fromError(
        error instanceof Error ? error : new Error(String(error)),
        'codec.decode-failed',
        { format },
      );
    }
  }

  public async encode(frames: readonly ImageFrame[], format: ImageFormat): Promise<Buffer> {
    const [first] = frames;
    if (!first) {
      throw new RangeError('Cannot encode an image without frames');
    }

    switch (format) {
      case 'gif': {
        return encodeGif(frames);
      }
      case 'png': {
        return encodePng(first);
      }
      case 'webp':
      case 'jpeg': {
        return encodeWithCanvas(first, format);
      }
      default: {
        const exhaustive: never = format;
        throw AppError.unsupported('codec.unsupported-format', 'Unsupported output format', {
          format: exhaustive,
        });
      }
    }
  }

  private async decodeFrames(buffer: Buffer, format: ImageFormat): Promise<ImageFrame[]> {
    switch (format) {
      case 'gif': {
        return decodeGif(buffer).frames;
      }
      case 'png': {
        return isAnimatedPng(buffer) ? decodeApng(buffer) : [decodePng(buffer)];
      }
      case 'webp': {
        return decodeWebp(buffer);
      }
      case 'jpeg': {
        return [await decodeWithCanvas(buffer)];
      }
      default: {
        const exhaustive: never = format;
        throw AppError.unsupported('codec.unsupported-format', 'Unsupported input format', {
          format: exhaustive,
        });
      }
    }
  }
}
