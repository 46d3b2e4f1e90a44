/**
 * Latency Module - Public API
 *
 * Four-timestamp symmetric estimator for relay cycles.
 */

export { estimateLatency, isPlausible, summarizeDelays, wallClock } from './LatencyEstimator';
export { MS_PER_SECOND, MIN_PLAUSIBLE_DELAY_MS } from './constants';

export type {
  CycleTimestamps,
  LatencyEstimate,
  WallClockSeconds,
  ClockOffsetSeconds,
  Clock
} from './types';
