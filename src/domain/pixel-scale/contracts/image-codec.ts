import type { AnimationFrameMetadata, Frame } from '../value-objects/frame.js';

export type ImageFormat = 'gif' | 'png' | 'webp' | 'jpeg';

export type ImageFrame = Frame<AnimationFrameMetadata>;

export interface DecodedImage {
  readonly format: ImageFormat;
  readonly width: number;
  readonly height: number;
  readonly frames: readonly ImageFrame[];
  readonly animated: boolean;
}

export interface ImageCodec {
  decode(buffer: Buffer): Promise<DecodedImage>;
  encode(frames: readonly ImageFrame[], format: ImageFormat): Promise<Buffer>;
}
