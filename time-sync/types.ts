/**
 * Type definitions for latency estimation
 */

// Agent or relay wall-clock reading in Unix seconds (float)
export type WallClockSeconds = number;

// Clock offset in seconds (actuation clock minus measurement clock)
export type ClockOffsetSeconds = number;

// The four timestamps of one relay cycle, taken on three machines
export interface CycleTimestamps {
  t1: WallClockSeconds; // measurement agent send time
  t2: WallClockSeconds; // actuation agent receipt time
  t3: WallClockSeconds; // actuation agent reply-send time
  t4: WallClockSeconds; // relay receipt time of the acknowledgement
}

// Result of the symmetric estimator for one cycle
export interface LatencyEstimate {
  offset: ClockOffsetSeconds;
  correctedT2: WallClockSeconds;
  delay: number;   // seconds
  delayMs: number; // milliseconds
}

// Wall-clock source, injectable for tests
export type Clock = () => WallClockSeconds;
