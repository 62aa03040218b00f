const PRECISION = 3;

function round(value: number): number {
  const factor = 10 ** PRECISION;
  return Math.round(value * factor) / factor;
}

export interface FrameTimingStats {
  frameCount: number;
  durationMs: number;
  averageDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  stdDeviationMs: number;
  fps: number;
}

export function calculateFrameTimingStats(delaysMs: readonly number[]): FrameTimingStats {
  if (delaysMs.length === 0) {
    return {
      frameCount: 0,
      durationMs: 0,
      averageDelayMs: 0,
      minDelayMs: 0,
      maxDelayMs: 0,
      stdDeviationMs: 0,
      fps: 0,
    };
  }

  const total = delaysMs.reduce((sum, delay) => sum + delay, 0);
  const average = total / delaysMs.length;
  const min = Math.min(...delaysMs);
  const max = Math.max(...delaysMs);
  const variance =
    delaysMs.reduce((acc, delay) => acc + (delay - average) ** 2, 0) / delaysMs.length;
  const stdDeviation = Math.sqrt(variance);
  const fps = average > 0 ? 1000 / average : 0;

  return {
    frameCount: delaysMs.length,
    durationMs: round(total),
    averageDelayMs: round(average),
    minDelayMs: round(min),
    maxDelayMs: round(max),
    stdDeviationMs: round(stdDeviation),
    fps: round(fps),
  };
}
