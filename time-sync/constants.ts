/**
 * Latency estimation constants
 */

export const MS_PER_SECOND = 1000;

// Delays below this are outside what the symmetric estimator can produce
// for an honest network and are flagged in diagnostics
export const MIN_PLAUSIBLE_DELAY_MS = 0;
