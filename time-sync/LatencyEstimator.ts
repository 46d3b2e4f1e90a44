/**
 * One-way Latency Estimator
 *
 * Symmetric two-leg estimate over four timestamps:
 * - t1/t4 are read on the sending side, t2/t3 on the receiving side
 * - offset = ((t2 - t1) + (t3 - t4)) / 2 cancels the unknown clock offset
 *   under the assumption that forward and return transit take equally long
 * - the result is never clamped; a negative delay means the assumption failed
 */

import { CycleTimestamps, LatencyEstimate, Clock } from './types';
import { MS_PER_SECOND, MIN_PLAUSIBLE_DELAY_MS } from './constants';

export function estimateLatency({ t1, t2, t3, t4 }: CycleTimestamps): LatencyEstimate {
  const offset = ((t2 - t1) + (t3 - t4)) / 2;
  const correctedT2 = t2 - offset;
  const delay = correctedT2 - t1;

  return { offset, correctedT2, delay, delayMs: delay * MS_PER_SECOND };
}

export function isPlausible(estimate: LatencyEstimate): boolean {
  return Number.isFinite(estimate.delayMs) && estimate.delayMs >= MIN_PLAUSIBLE_DELAY_MS;
}

/**
 * Summary statistics over raw delay samples (ms).
 * An empty sample set reports zeros.
 */
export function summarizeDelays(samplesMs: readonly number[]): { meanMs: number; minMs: number; maxMs: number; count: number } {
  if (samplesMs.length === 0) {
    return { meanMs: 0, minMs: 0, maxMs: 0, count: 0 };
  }

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const sample of samplesMs) {
    sum += sample;
    if (sample < min) min = sample;
    if (sample > max) max = sample;
  }

  return { meanMs: sum / samplesMs.length, minMs: min, maxMs: max, count: samplesMs.length };
}

// Unix seconds with millisecond resolution, matching what the agents stamp
export const wallClock: Clock = () => Date.now() / MS_PER_SECOND;
