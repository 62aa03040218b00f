import type { DownscaleJob } from '../entities/downscale-job.js';
import type { DetectionResult } from '../value-objects/detection-result.js';

import type { ImageFormat } from './image-codec.js';

export interface AnimationTiming {
  readonly frameCount: number;
  readonly durationMs: number;
  readonly averageDelayMs: number;
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  readonly stdDeviationMs: number;
  readonly fps: number;
}

export interface DownscaleMetrics {
  readonly decodeTimeMs: number;
  readonly detectTimeMs: number;
  readonly reduceTimeMs: number;
  readonly encodeTimeMs: number;
  readonly totalTimeMs: number;
  readonly outputSizeBytes: number;
}

export interface DownscaleOutput {
  readonly path: string;
  readonly format: ImageFormat;
  readonly frameCount: number;
}

export interface DownscaleOutcome {
  readonly detection: DetectionResult;
  readonly inputFormat: ImageFormat;
  readonly timing: AnimationTiming;
  readonly metrics: DownscaleMetrics;
  /** False when nothing was written: analyze-only jobs and factor 1. */
  readonly scaled: boolean;
  readonly output?: DownscaleOutput;
}

export interface PixelScaleService {
  downscale(job: DownscaleJob): Promise<DownscaleOutcome>;
}
