import { detectBlockFactor } from '../services/block-factor-detector.js';
import type { Frame } from '../value-objects/frame.js';

/**
 * Runs block-factor detection. Implementations must return exactly what the
 * sequential descending scan returns for the same frames.
 */
export interface BlockScanExecutor {
  detect(frames: readonly Frame[]): Promise<number>;
}

export const sequentialBlockScan: BlockScanExecutor = {
  detect: async (frames) => detectBlockFactor(frames),
};
