import type { DownscaleOutcome, PixelScaleService } from '@domain/pixel-scale/index.js';
import { DownscaleJob } from '@domain/pixel-scale/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { PreconditionViolationError } from '@/shared/errors/precondition-violation.error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import type { DownscaleImageCommand } from '../commands/downscale-image.command.js';
import {
  downscaleImageCommandSchema,
  type DownscaleImagePayload,
  type ValidatedDownscaleImagePayload,
} from '../dto/downscale-image.dto.js';

export class DownscaleImageHandler {
  private readonly logger = createChildLogger({ module: 'DownscaleImageHandler' });

  public constructor(private readonly service: PixelScaleService) {}

  public async execute(command: DownscaleImageCommand): Promise<DownscaleOutcome> {
    const payload = this.validate(command.payload);

    this.logger.info({ jobId: payload.id, input: payload.input }, 'Starting pixel-art downscale');

    try {
      const job = DownscaleJob.create({
        id: payload.id,
        inputPath: payload.input,
        outputPath: payload.output,
        inPlace: payload.inPlace,
        detectionMode: payload.onlyAnalyzeFirst ? 'first-frame' : 'all-frames',
        analyzeOnly: payload.analyzeOnly,
        createdAt: new Date(),
      });

      const outcome = await this.service.downscale(job);

      this.logger.info(
        {
          jobId: payload.id,
          factor: outcome.detection.factor,
          scaled: outcome.scaled,
          durationMs: outcome.metrics.totalTimeMs,
          outputSizeBytes: outcome.metrics.outputSizeBytes,
        },
        'Pixel-art downscale completed',
      );

      return outcome;
    } catch (error) {
      this.logger.error({ jobId: payload.id, error }, 'Pixel-art downscale failed');
      if (error instanceof PreconditionViolationError) {
        throw error;
      }
      throw AppError.fromUnknown(error, 'pixel-scale.failure');
    }
  }

  private validate(payload: DownscaleImagePayload): ValidatedDownscaleImagePayload {
    const parsed = downscaleImageCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('pixel-scale.invalid-payload', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid downscale payload received');
      throw error;
    }

    return parsed.data;
  }
}
