#!/usr/bin/env node
import { randomUUID } from 'node:crypto';

import type { DownscaleOutcome } from '@domain/pixel-scale/index.js';

import { DownscaleImageCommand, DownscaleImageHandler } from '@/application/pixel-scale/index.js';
import { BlockScanPool, NearestNeighborDownscaleService } from '@/infrastructure/pixel-scale/index.js';
import { BaseError } from '@/shared/errors/base.error.js';

import { type CliInvocation, type CliOptions, CliUsageError, parseArgs, USAGE } from './arguments.js';

async function run(options: CliOptions): Promise<number> {
  const pool = options.jobs > 1 ? new BlockScanPool(options.jobs) : undefined;
  const handler = new DownscaleImageHandler(new NearestNeighborDownscaleService({ scanner: pool }));

  try {
    const outcome = await handler.execute(
      new DownscaleImageCommand({
        id: randomUUID(),
        input: options.input,
        output: options.output,
        inPlace: options.inPlace,
        onlyAnalyzeFirst: options.onlyAnalyzeFirst,
        analyzeOnly: options.analyzeOnly,
      }),
    );
    return report(outcome, options);
  } finally {
    await pool?.destroy();
  }
}

function report(outcome: DownscaleOutcome, options: CliOptions): number {
  const { source, output } = outcome.detection;

  if (options.analyzeOnly) {
    console.log(`${output.width}x${output.height}`);
    return 0;
  }

  if (!outcome.scaled || !outcome.output) {
    console.error('failed to detect pixel art scaling');
    return 1;
  }

  console.log(`resizing ${source.width} x ${source.height} -> ${output.width} x ${output.height}`);
  console.log(`written ${JSON.stringify(outcome.output.path)}`);
  return 0;
}

function readInvocation(argv: readonly string[]): CliInvocation | null {
  try {
    return parseArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`pixel-unscale: ${error.message}\n\n${USAGE}`);
      return null;
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const invocation = readInvocation(process.argv.slice(2));
  if (!invocation) {
    process.exitCode = 2;
    return;
  }

  if (invocation.kind === 'help') {
    console.log(USAGE);
    return;
  }

  process.exitCode = await run(invocation.options);
}

main().catch((error: unknown) => {
  const message = error instanceof BaseError && error.exposeMessage
    ? `${error.message} (${error.code})`
    : error instanceof Error
      ? error.message
      : String(error);
  console.error(`pixel-unscale: ${message}`);
  process.exitCode = 1;
});
