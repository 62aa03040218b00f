import { Worker } from 'node:worker_threads';

import {
  assertFrameSequence,
  type BlockScanExecutor,
  candidateFactors,
  type Frame,
} from '@domain/pixel-scale/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { type BlockScanRequest, isBlockScanResponse } from './block-scan.protocol.js';

/**
 * The slice of `worker_threads.Worker` the pool relies on.
 */
export interface BlockScanWorker {
  postMessage(message: BlockScanRequest): void;
  on(event: 'message' | 'error' | 'exit', listener: (payload: unknown) => void): unknown;
  terminate(): Promise<number>;
}

export type BlockScanWorkerFactory = () => BlockScanWorker;

interface PendingScan {
  readonly worker: BlockScanWorker;
  readonly resolve: (factors: number[]) => void;
  readonly reject: (error: Error) => void;
}

const defaultWorkerFactory: BlockScanWorkerFactory = () =>
  new Worker(new URL('./block-scan.worker.js', import.meta.url));

/**
 * Spreads per-frame uniformity scans over worker threads. Each worker reports every
 * candidate its frame is uniform at; the largest candidate common to all frames is the
 * factor, the same one the sequential descending scan finds.
 */
export class BlockScanPool implements BlockScanExecutor {
  private readonly logger = createChildLogger({ module: 'BlockScanPool' });

  private readonly workers: BlockScanWorker[];

  private readonly pending = new Map<number, PendingScan>();

  private roundRobinIndex = 0;

  private nextTaskId = 1;

  private destroyed = false;

  public constructor(size: number, createWorker: BlockScanWorkerFactory = defaultWorkerFactory) {
    const poolSize = Math.max(1, Math.floor(size));
    this.workers = Array.from({ length: poolSize }, () => this.attach(createWorker()));
  }

  public get size(): number {
    return this.workers.length;
  }

  public async detect(frames: readonly Frame[]): Promise<number> {
    assertFrameSequence(frames);
    const [first] = frames;
    const candidates = candidateFactors(first.width, first.height).filter((factor) => factor > 1);

    if (candidates.length === 0) {
      return 1;
    }

    const perFrame = await Promise.all(frames.map((frame) => this.scan(frame, candidates)));
    const accepted = candidates.find((factor) => perFrame.every((factors) => factors.includes(factor)));

    this.logger.debug(
      { frames: frames.length, candidates: candidates.length, factor: accepted ?? 1 },
      'Parallel block scan finished',
    );

    return accepted ?? 1;
  }

  public async destroy(): Promise<void> {
    this.destroyed = true;

    for (const [taskId, task] of this.pending) {
      this.pending.delete(taskId);
      task.reject(new Error('Block scan pool was destroyed before the scan finished'));
    }

    const workers = this.workers.splice(0);
    await Promise.all(
      workers.map(async (worker) => {
        worker.postMessage({ type: 'shutdown' });
        await worker.terminate();
      }),
    );
  }

  private scan(frame: Frame, candidates: readonly number[]): Promise<number[]> {
    const taskId = this.nextTaskId;
    this.nextTaskId += 1;

    return new Promise<number[]>((resolve, reject) => {
      const worker = this.pickWorker();
      this.pending.set(taskId, { worker, resolve, reject });
      worker.postMessage({
        type: 'scanFrame',
        taskId,
        width: frame.width,
        height: frame.height,
        data: frame.data,
        candidates,
      });
    });
  }

  private attach(worker: BlockScanWorker): BlockScanWorker {
    worker.on('message', (message) => this.onMessage(message));
    worker.on('error', (error) => this.onWorkerError(worker, error));
    worker.on('exit', (code) => this.onWorkerExit(worker, code));
    return worker;
  }

  private onMessage(message: unknown): void {
    if (!isBlockScanResponse(message)) {
      this.logger.debug({ message }, 'Ignoring unexpected block scan message');
      return;
    }

    const task = this.pending.get(message.taskId);
    if (!task) {
      return;
    }
    this.pending.delete(message.taskId);

    if (message.type === 'scanFailed') {
      task.reject(
        AppError.fromError(new Error(message.message), 'pixel-scale.worker-scan-failed', {
          taskId: message.taskId,
        }),
      );
      return;
    }

    task.resolve(message.uniformFactors);
  }

  private onWorkerError(worker: BlockScanWorker, payload: unknown): void {
    const error = payload instanceof Error ? payload : new Error(String(payload));
    this.logger.error({ error }, 'Block scan worker failed');
    this.retire(worker, error);
  }

  private onWorkerExit(worker: BlockScanWorker, code: unknown): void {
    if (this.destroyed) {
      return;
    }

    this.logger.warn({ code }, 'Block scan worker exited');
    this.retire(worker, new Error(`Block scan worker exited with code ${String(code)}`));
  }

  /** Takes a dead worker out of the rotation and fails whatever it still owed. */
  private retire(worker: BlockScanWorker, error: Error): void {
    const index = this.workers.indexOf(worker);
    if (index !== -1) {
      this.workers.splice(index, 1);
      this.roundRobinIndex = this.workers.length === 0 ? 0 : this.roundRobinIndex % this.workers.length;
    }

    for (const [taskId, task] of this.pending) {
      if (task.worker === worker) {
        this.pending.delete(taskId);
        task.reject(error);
      }
    }
  }

  private pickWorker(): BlockScanWorker {
    const worker = this.workers[this.roundRobinIndex];
    if (!worker) {
      throw new Error('Block scan pool has no live workers');
    }
    this.roundRobinIndex = (this.roundRobinIndex + 1) % this.workers.length;
    return worker;
  }
}
