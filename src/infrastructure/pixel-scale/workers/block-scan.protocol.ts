import { uniformFactors } from '@domain/pixel-scale/index.js';

export interface ScanFrameMessage {
  readonly type: 'scanFrame';
  readonly taskId: number;
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
  readonly candidates: readonly number[];
}

export interface ShutdownMessage {
  readonly type: 'shutdown';
}

export type BlockScanRequest = ScanFrameMessage | ShutdownMessage;

export interface FrameScannedMessage {
  readonly type: 'frameScanned';
  readonly taskId: number;
  readonly uniformFactors: number[];
}

export interface ScanFailedMessage {
  readonly type: 'scanFailed';
  readonly taskId: number;
  readonly message: string;
}

export type BlockScanResponse = FrameScannedMessage | ScanFailedMessage;

export function handleScanFrame(message: ScanFrameMessage): BlockScanResponse {
  try {
    // Structured clone may hand over a plain Uint8Array.
    const data =
      message.data instanceof Uint8ClampedArray ? message.data : new Uint8ClampedArray(message.data);
    const factors = uniformFactors(
      { width: message.width, height: message.height, data, metadata: undefined },
      message.candidates,
    );
    return { type: 'frameScanned', taskId: message.taskId, uniformFactors: factors };
  } catch (error) {
    return {
      type: 'scanFailed',
      taskId: message.taskId,
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

export function isBlockScanResponse(message: unknown): message is BlockScanResponse {
  if (typeof message !== 'object' || message === null || !('type' in message) || !('taskId' in message)) {
    return false;
  }

  return (
    (message.type === 'frameScanned' || message.type === 'scanFailed') &&
    typeof message.taskId === 'number'
  );
}
