import { CONFIG } from '../../shared/config';
import { describeError } from '../../shared/errors';
import { relayLogger } from '../../shared/RelayLogger';
import { Position } from '../../websocket-bridge/types/Interfaces';
import { PositionProvider } from '../types';

export type PositionSource = () => Promise<Position | null>;

/**
 * Polls a fix source on a fixed interval and serves the latest result.
 * A failed poll clears the fix.
 */
export class PollingPositionProvider implements PositionProvider {
  private current: Position | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private polling = false;

  constructor(
    private readonly source: PositionSource,
    private readonly intervalMs: number = CONFIG.AGENT.POSITION_POLL_INTERVAL_MS,
  ) {}

  start(): void {
    if (this.pollTimer) return;
    void this.poll();
    this.pollTimer = setInterval(() => void this.poll(), this.intervalMs);
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  latest(): Position | null {
    return this.current;
  }

  // One poll; overlapping polls are skipped
  async poll(): Promise<void> {
    if (this.polling) return;
    this.polling = true;
    try {
      this.current = await this.source();
    } catch (error) {
      relayLogger.warn(`Position poll failed: ${describeError(error)}`, undefined, 'POSITION');
      this.current = null;
    } finally {
      this.polling = false;
    }
  }
}

// Fixed location, for agents without a receiver
export class StaticPositionProvider implements PositionProvider {
  constructor(private readonly position: Position | null) {}

  latest(): Position | null {
    return this.position;
  }
}
