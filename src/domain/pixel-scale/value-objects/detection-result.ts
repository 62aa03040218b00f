export type DetectionMode = 'all-frames' | 'first-frame';

export interface FrameDimensions {
  readonly width: number;
  readonly height: number;
}

export interface DetectionResult {
  readonly factor: number;
  readonly source: FrameDimensions;
  readonly output: FrameDimensions;
  readonly analyzedFrames: number;
}
