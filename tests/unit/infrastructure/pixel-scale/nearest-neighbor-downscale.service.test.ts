import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {
  type DecodedImage,
  DownscaleJob,
  type DownscaleJobProps,
  type Frame,
  type ImageCodec,
} from '@domain/pixel-scale/index.js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { decodePng, encodePng, NearestNeighborDownscaleService } from '@/infrastructure/pixel-scale/index.js';

import {
  BLUE,
  flatGrid,
  frameFromGrid,
  gridFromFrame,
  GREEN,
  noisyGrid,
  RED,
  upscaleGrid,
  YELLOW,
} from '../../../helpers/frames.js';

const QUADRANTS = [
  [RED, GREEN],
  [BLUE, YELLOW],
];

function createJob(overrides: Partial<DownscaleJobProps> & Pick<DownscaleJobProps, 'inputPath'>): DownscaleJob {
  return DownscaleJob.create({
    id: 'job-id',
    inPlace: false,
    detectionMode: 'all-frames',
    analyzeOnly: false,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  });
}

function createFakeCodec(image: DecodedImage) {
  const decode = vi.fn(async (_buffer: Buffer) => image);
  const encode = vi.fn(async (..._args: Parameters<ImageCodec['encode']>) => Buffer.from('encoded'));
  const codec: ImageCodec = { decode, encode };
  return { codec, decode, encode };
}

function animatedImage(): DecodedImage {
  const frames = [
    frameFromGrid(upscaleGrid(QUADRANTS, 2), { delayMs: 100, disposalType: 1 }),
    frameFromGrid(flatGrid(4, 4, RED), { delayMs: 50, disposalType: 1 }),
  ];
  return { format: 'gif', width: 4, height: 4, frames, animated: true };
}

describe('NearestNeighborDownscaleService', () => {
  let workdir: string;
  let inputPath: string;

  beforeEach(async () => {
    workdir = await fs.mkdtemp(path.join(os.tmpdir(), 'pixel-unscale-'));
    inputPath = path.join(workdir, 'sprite.png');
  });

  afterEach(async () => {
    await fs.rm(workdir, { recursive: true, force: true });
  });

  async function writeInput(grid: Parameters<typeof frameFromGrid>[0]): Promise<void> {
    await fs.writeFile(inputPath, encodePng(frameFromGrid(grid)));
  }

  it('writes the reduced image next to the input', async () => {
    await writeInput(upscaleGrid(QUADRANTS, 2));
    const service = new NearestNeighborDownscaleService();

    const outcome = await service.downscale(createJob({ inputPath }));

    const expectedPath = path.join(workdir, 'sprite.scaled.png');
    expect(outcome.scaled).toBe(true);
    expect(outcome.inputFormat).toBe('png');
    expect(outcome.detection).toEqual({
      factor: 2,
      source: { width: 4, height: 4 },
      output: { width: 2, height: 2 },
      analyzedFrames: 1,
    });
    expect(outcome.output).toEqual({ path: expectedPath, format: 'png', frameCount: 1 });

    const written = await fs.readFile(expectedPath);
    expect(outcome.metrics.outputSizeBytes).toBe(written.byteLength);
    expect(gridFromFrame(decodePng(written))).toEqual(QUADRANTS);
  });

  it('overwrites the input when working in place', async () => {
    await writeInput(upscaleGrid(QUADRANTS, 3));
    const service = new NearestNeighborDownscaleService();

    const outcome = await service.downscale(createJob({ inputPath, inPlace: true }));

    expect(outcome.output?.path).toBe(inputPath);
    expect(gridFromFrame(decodePng(await fs.readFile(inputPath)))).toEqual(QUADRANTS);
  });

  it('creates missing directories for an explicit output path', async () => {
    await writeInput(upscaleGrid(QUADRANTS, 2));
    const outputPath = path.join(workdir, 'nested', 'small.png');
    const service = new NearestNeighborDownscaleService();

    await service.downscale(createJob({ inputPath, outputPath }));

    expect(gridFromFrame(decodePng(await fs.readFile(outputPath)))).toEqual(QUADRANTS);
  });

  it('only reports dimensions when analyzing', async () => {
    await writeInput(upscaleGrid(QUADRANTS, 2));
    const service = new NearestNeighborDownscaleService();

    const outcome = await service.downscale(createJob({ inputPath, analyzeOnly: true }));

    expect(outcome.scaled).toBe(false);
    expect(outcome.output).toBeUndefined();
    expect(outcome.detection.output).toEqual({ width: 2, height: 2 });
    expect(outcome.metrics.outputSizeBytes).toBe(0);
    await expect(fs.readdir(workdir)).resolves.toEqual(['sprite.png']);
  });

  it('writes nothing when no scaling is found', async () => {
    await writeInput(noisyGrid(4, 4));
    const service = new NearestNeighborDownscaleService();

    const outcome = await service.downscale(createJob({ inputPath }));

    expect(outcome.scaled).toBe(false);
    expect(outcome.detection.factor).toBe(1);
    expect(outcome.output).toBeUndefined();
    await expect(fs.readdir(workdir)).resolves.toEqual(['sprite.png']);
  });

  it('keeps every frame when writing a GIF', async () => {
    await fs.writeFile(inputPath, 'GIF89a');
    const { codec, encode } = createFakeCodec(animatedImage());
    const service = new NearestNeighborDownscaleService({ codec });

    const outcome = await service.downscale(createJob({ inputPath, outputPath: path.join(workdir, 'walk.gif') }));

    expect(outcome.detection.factor).toBe(2);
    expect(outcome.timing.frameCount).toBe(2);
    expect(outcome.timing.durationMs).toBe(150);
    expect(encode).toHaveBeenCalledTimes(1);
    const [frames, format] = encode.mock.calls[0] ?? [];
    expect(format).toBe('gif');
    expect(frames?.map((frame) => [frame.width, frame.height, frame.metadata.delayMs])).toEqual([
      [2, 2, 100],
      [2, 2, 50],
    ]);
    await expect(fs.readFile(path.join(workdir, 'walk.gif'), 'utf8')).resolves.toBe('encoded');
  });

  it('keeps only the first frame of an animation written to a still format', async () => {
    await fs.writeFile(inputPath, 'GIF89a');
    const { codec, encode } = createFakeCodec(animatedImage());
    const service = new NearestNeighborDownscaleService({ codec });

    const outcome = await service.downscale(createJob({ inputPath, outputPath: path.join(workdir, 'walk.png') }));

    const [frames, format] = encode.mock.calls[0] ?? [];
    expect(format).toBe('png');
    expect(frames).toHaveLength(1);
    const reduced = frames?.[0];
    expect(reduced && gridFromFrame(reduced)).toEqual(QUADRANTS);
    expect(outcome.output).toEqual({ path: path.join(workdir, 'walk.png'), format: 'png', frameCount: 1 });
  });

  it('analyzes only the first frame when asked to', async () => {
    await fs.writeFile(inputPath, 'GIF89a');
    const image = animatedImage();
    const detect = vi.fn(async (_frames: readonly Frame[]) => 4);
    const { codec } = createFakeCodec({
      ...image,
      frames: [frameFromGrid(flatGrid(4, 4, BLUE)), ...image.frames],
    });
    const service = new NearestNeighborDownscaleService({ codec, scanner: { detect } });

    const outcome = await service.downscale(
      createJob({ inputPath, detectionMode: 'first-frame', analyzeOnly: true }),
    );

    expect(detect).toHaveBeenCalledTimes(1);
    expect(detect.mock.calls[0]?.[0]).toHaveLength(1);
    expect(outcome.detection.factor).toBe(4);
    expect(outcome.detection.analyzedFrames).toBe(1);
  });

  it('reports unreadable input', async () => {
    const service = new NearestNeighborDownscaleService();

    await expect(service.downscale(createJob({ inputPath: path.join(workdir, 'missing.png') }))).rejects.toMatchObject({
      code: 'pixel-scale.read-failed',
      metadata: { path: path.join(workdir, 'missing.png') },
    });
  });

  it('rejects an output extension it cannot encode', async () => {
    await writeInput(upscaleGrid(QUADRANTS, 2));
    const service = new NearestNeighborDownscaleService();

    await expect(
      service.downscale(createJob({ inputPath, outputPath: path.join(workdir, 'sprite.bmp') })),
    ).rejects.toMatchObject({ code: 'codec.unsupported-extension' });
  });
});
