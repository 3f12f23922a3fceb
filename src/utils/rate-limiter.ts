/**
 * Inclusive bounds, in milliseconds, for the pause a worker takes before each request.
 */
export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export const NO_DELAY: DelayRange = { minMs: 0, maxMs: 0 };

/**
 * Draw a delay uniformly from [minMs, maxMs].
 * Returns 0 when maxMs is 0 so callers can skip pacing entirely.
 */
export function uniformDelay(range: DelayRange): number {
  if (range.maxMs <= 0) return 0;
  const min = Math.min(range.minMs, range.maxMs);
  return Math.floor(min + Math.random() * (range.maxMs - min + 1));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Pause before a request with a jittered delay.
 *
 * @returns The delay that was applied, in milliseconds
 */
export async function paceRequest(range: DelayRange): Promise<number> {
  const delay = uniformDelay(range);
  if (delay > 0) {
    await sleep(delay);
  }
  return delay;
}
