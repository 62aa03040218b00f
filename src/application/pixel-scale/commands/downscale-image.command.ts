import type { DownscaleImagePayload } from '../dto/downscale-image.dto.js';

export class DownscaleImageCommand {
  public readonly payload: DownscaleImagePayload;

  public constructor(payload: DownscaleImagePayload) {
    this.payload = payload;
  }
}
