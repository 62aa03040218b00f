const DEFAULT_DELAY_MS = 100;

/** Copies the viewed bytes into a standalone ArrayBuffer, as the pure-JS decoders expect. */
export function toArrayBuffer(view: Uint8Array | Uint8ClampedArray): ArrayBuffer {
  const copy = new ArrayBuffer(view.byteLength);
  new Uint8Array(copy).set(view);
  return copy;
}

/** A missing or zero delay plays at 100 ms. */
export function normalizeDelayMs(delayMs: number | undefined): number {
  if (delayMs === undefined || !Number.isFinite(delayMs) || delayMs <= 0) {
    return DEFAULT_DELAY_MS;
  }

  return delayMs;
}
