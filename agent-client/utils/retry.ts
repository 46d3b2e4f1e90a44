const BACKOFF_MULTIPLIER = 2;

// Calculate exponential backoff delay
export function calculateBackoff(attempt: number, baseDelay: number, maxDelay: number): number {
  return Math.min(baseDelay * Math.pow(BACKOFF_MULTIPLIER, attempt), maxDelay);
}
