import type { DetectionMode } from '../value-objects/detection-result.js';

export interface DownscaleJobProps {
  readonly id: string;
  readonly inputPath: string;
  readonly outputPath?: string;
  readonly inPlace: boolean;
  readonly detectionMode: DetectionMode;
  readonly analyzeOnly: boolean;
  readonly createdAt: Date;
}

export class DownscaleJob {
  public readonly id: string;

  public readonly inputPath: string;

  public readonly outputPath?: string;

  public readonly inPlace: boolean;

  public readonly detectionMode: DetectionMode;

  public readonly analyzeOnly: boolean;

  public readonly createdAt: Date;

  private constructor(props: DownscaleJobProps) {
    this.id = props.id;
    this.inputPath = props.inputPath;
    this.outputPath = props.outputPath;
    this.inPlace = props.inPlace;
    this.detectionMode = props.detectionMode;
    this.analyzeOnly = props.analyzeOnly;
    this.createdAt = props.createdAt;
  }

  public static create(props: DownscaleJobProps): DownscaleJob {
    if (props.inputPath.trim().length === 0) {
      throw new Error('Downscale job requires an input path');
    }

    if (props.outputPath !== undefined && props.outputPath.trim().length === 0) {
      throw new Error('Output path must not be empty when provided');
    }

    return new DownscaleJob(props);
  }

  /** An explicit output path always wins over writing in place. */
  public get writesInPlace(): boolean {
    return this.inPlace && this.outputPath === undefined;
  }
}
