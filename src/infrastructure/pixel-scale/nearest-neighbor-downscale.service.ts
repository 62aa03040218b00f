import { promises as fs } from 'node:fs';
import path from 'node:path';
import { performance } from 'node:perf_hooks';

import {
  type BlockScanExecutor,
  createDetectionResult,
  type DecodedImage,
  type DownscaleJob,
  type DownscaleOutcome,
  type ImageCodec,
  type ImageFormat,
  type PixelScaleService,
  reduceFrames,
  resolveOutputPath,
  selectFramesForDetection,
  sequentialBlockScan,
} from '@domain/pixel-scale/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { calculateFrameTimingStats } from '@/shared/media/frameTiming.js';

import { formatFromPath } from './codecs/image-format.js';
import { MultiFormatImageCodec } from './codecs/multi-format-image-codec.js';

interface NearestNeighborDownscaleOptions {
  readonly codec?: ImageCodec;
  readonly scanner?: BlockScanExecutor;
}

export class NearestNeighborDownscaleService implements PixelScaleService {
  private readonly logger = createChildLogger({ module: 'NearestNeighborDownscaleService' });

  private readonly codec: ImageCodec;

  private readonly scanner: BlockScanExecutor;

  public constructor(options: NearestNeighborDownscaleOptions = {}) {
    this.codec = options.codec ?? new MultiFormatImageCodec();
    this.scanner = options.scanner ?? sequentialBlockScan;
  }

  public async downscale(job: DownscaleJob): Promise<DownscaleOutcome> {
    const startedAt = performance.now();

    const decodeStarted = performance.now();
    const image = await this.decodeInput(job);
    const decodeTimeMs = performance.now() - decodeStarted;
    const outputFormat = job.outputPath === undefined ? image.format : formatFromPath(job.outputPath);

    const detectStarted = performance.now();
    const analyzed = selectFramesForDetection(image.frames, job.detectionMode);
    const factor = await this.scanner.detect(analyzed);
    const detection = createDetectionResult(image.frames, factor, analyzed.length);
    const detectTimeMs = performance.now() - detectStarted;

    const timing = calculateFrameTimingStats(image.frames.map((frame) => frame.metadata.delayMs));

    this.logger.debug(
      { jobId: job.id, factor, analyzedFrames: analyzed.length, frameCount: image.frames.length },
      'Block factor detected',
    );

    const scaled = !job.analyzeOnly && factor > 1;
    if (!scaled) {
      return {
        detection,
        inputFormat: image.format,
        timing,
        scaled,
        metrics: {
          decodeTimeMs,
          detectTimeMs,
          reduceTimeMs: 0,
          encodeTimeMs: 0,
          totalTimeMs: performance.now() - startedAt,
          outputSizeBytes: 0,
        },
      };
    }

    const reduceStarted = performance.now();
    const reduced = reduceFrames(this.framesForOutput(image, outputFormat), factor);
    const reduceTimeMs = performance.now() - reduceStarted;

    const encodeStarted = performance.now();
    const encoded = await this.codec.encode(reduced, outputFormat);
    const encodeTimeMs = performance.now() - encodeStarted;

    const outputPath = resolveOutputPath({
      inputPath: job.inputPath,
      outputPath: job.outputPath,
      inPlace: job.writesInPlace,
      format: outputFormat,
    });
    await this.writeOutput(outputPath, encoded);

    return {
      detection,
      inputFormat: image.format,
      timing,
      scaled,
      output: {
        path: outputPath,
        format: outputFormat,
        frameCount: reduced.length,
      },
      metrics: {
        decodeTimeMs,
        detectTimeMs,
        reduceTimeMs,
        encodeTimeMs,
        totalTimeMs: performance.now() - startedAt,
        outputSizeBytes: encoded.byteLength,
      },
    };
  }

  private async decodeInput(job: DownscaleJob): Promise<DecodedImage> {
    const buffer = await fs.readFile(job.inputPath).catch((error: unknown) => {
      throw AppError.fromError(
        error instanceof Error ? error : new Error(String(error)),
        'pixel-scale.read-failed',
        { path: job.inputPath },
      );
    });

    return this.codec.decode(buffer);
  }

  private framesForOutput(image: DecodedImage, outputFormat: ImageFormat): DecodedImage['frames'] {
    if (!image.animated || outputFormat === 'gif') {
      return image.frames;
    }

    this.logger.warn(
      { inputFormat: image.format, outputFormat, frameCount: image.frames.length },
      `animated ${outputFormat.toUpperCase()} images are not supported, writing still image instead`,
    );
    return image.frames.slice(0, 1);
  }

  private async writeOutput(outputPath: string, data: Buffer): Promise<void> {
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, data);
    } catch (error) {
      throw AppError.fromError(
        error instanceof Error ? error : new Error(String(error)),
        'pixel-scale.write-failed',
        { path: outputPath },
      );
    }
  }
}
